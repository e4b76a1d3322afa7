/**
 * PaymentHistory - one supporter's payments up to an as-of date
 *
 * Built fresh per query and never mutated. Ordered ascending by date; payments
 * sharing a date are ordered by the TieBreak policy. first/last/secondLast are
 * O(1) reads.
 */

import { MonthDate } from '../calendar/MonthDate';
import { InvalidArgumentError } from '../../types/ReportErrors';
import { DEFAULT_TIE_BREAK, Payment, TieBreak } from '../../types/SupporterTypes';

function compareProgram(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

export class PaymentHistory {
  private constructor(private readonly payments: readonly Payment[]) {}

  /**
   * History of `payments` on or before `asOf` (all of them when asOf is
   * omitted). Input order only matters for same-day payments.
   */
  static asOf(
    payments: readonly Payment[],
    asOf?: MonthDate,
    tieBreak: TieBreak = DEFAULT_TIE_BREAK
  ): PaymentHistory {
    const indexed = payments
      .map((payment, index) => ({ payment, index }))
      .filter(({ payment }) => asOf === undefined || !payment.date.isAfter(asOf));

    indexed.sort((a, b) => {
      const byDate = a.payment.date.compare(b.payment.date);
      if (byDate !== 0) return byDate;
      if (tieBreak === 'program') {
        const byProgram = compareProgram(a.payment.program, b.payment.program);
        if (byProgram !== 0) return byProgram;
      }
      return a.index - b.index;
    });

    return new PaymentHistory(indexed.map(({ payment }) => payment));
  }

  static empty(): PaymentHistory {
    return new PaymentHistory([]);
  }

  get size(): number {
    return this.payments.length;
  }

  isEmpty(): boolean {
    return this.payments.length === 0;
  }

  first(): Payment {
    if (this.payments.length === 0) {
      throw new InvalidArgumentError('first() requires a non-empty payment history', 'EMPTY_HISTORY');
    }
    return this.payments[0];
  }

  last(): Payment {
    if (this.payments.length === 0) {
      throw new InvalidArgumentError('last() requires a non-empty payment history', 'EMPTY_HISTORY');
    }
    return this.payments[this.payments.length - 1];
  }

  /** Callers must check size >= 2 first. */
  secondLast(): Payment {
    if (this.payments.length < 2) {
      throw new InvalidArgumentError(
        `secondLast() requires at least 2 payments, history has ${this.payments.length}`,
        'INSUFFICIENT_HISTORY'
      );
    }
    return this.payments[this.payments.length - 2];
  }

  toArray(): readonly Payment[] {
    return this.payments;
  }
}
