/**
 * StatusEngine - supporter lifecycle status and return lateness
 *
 * Pure functions of (payment history, as-of date). Decision order for status:
 * LOST → LAPSED → NEW → ACTIVE, first match wins.
 */

import { MonthDate } from '../calendar/MonthDate';
import { calculateLapseDate } from './LapseCalculator';
import { resolveCadence } from './CadenceResolver';
import { PaymentHistory } from './PaymentHistory';
import { Cadence, SupporterStatus } from '../../types/SupporterTypes';

export interface StatusEngineConfig {
  /** Days past the lapse date at which a supporter is Lost. Default 365. */
  lostThresholdDays?: number;
  /** Days past the lapse date at which a supporter is Lapsed. Default 0. */
  lapsedThresholdDays?: number;
}

export const DEFAULT_LOST_THRESHOLD_DAYS = 365;
export const DEFAULT_LAPSED_THRESHOLD_DAYS = 0;

/**
 * True when `date` falls in the month ending at `asOf`:
 * after the 1st of the previous month, up to and including asOf.
 */
export function isInCurrentMonthWindow(date: MonthDate, asOf: MonthDate): boolean {
  return asOf.adjustMonth(-1, 1).isBefore(date) && !date.isAfter(asOf);
}

export class StatusEngine {
  private readonly lostThresholdDays: number;
  private readonly lapsedThresholdDays: number;

  constructor(config: StatusEngineConfig = {}) {
    this.lostThresholdDays = config.lostThresholdDays ?? DEFAULT_LOST_THRESHOLD_DAYS;
    this.lapsedThresholdDays = config.lapsedThresholdDays ?? DEFAULT_LAPSED_THRESHOLD_DAYS;
  }

  cadence(history: PaymentHistory): Cadence {
    return resolveCadence(history.toArray());
  }

  /** Lapse date of the most recent payment. */
  lapseDate(history: PaymentHistory): MonthDate {
    return calculateLapseDate(history.last().date, this.cadence(history));
  }

  /**
   * Lapse date of the second-to-last payment. Cadence comes from the whole
   * history, not from the history as of that payment.
   */
  secondLastLapseDate(history: PaymentHistory): MonthDate {
    return calculateLapseDate(history.secondLast().date, this.cadence(history));
  }

  /** Null when there are no payments. */
  status(history: PaymentHistory, asOf: MonthDate): SupporterStatus | null {
    if (history.isEmpty()) {
      return null;
    }

    const daysPastDue = asOf.diffInDays(this.lapseDate(history));

    if (daysPastDue >= this.lostThresholdDays) {
      return SupporterStatus.LOST;
    }
    if (daysPastDue >= this.lapsedThresholdDays) {
      return SupporterStatus.LAPSED;
    }
    if (isInCurrentMonthWindow(history.first().date, asOf)) {
      return SupporterStatus.NEW;
    }
    return SupporterStatus.ACTIVE;
  }

  /**
   * Months overdue when this month's payment was made, rounded up.
   * 0 for brand-new supporters, on-time renewals, and anyone without a
   * payment this month.
   */
  monthsExpiredAtReturn(history: PaymentHistory, asOf: MonthDate): number {
    if (history.isEmpty()) {
      return 0;
    }

    if (isInCurrentMonthWindow(history.first().date, asOf)) {
      // started paying this month: a signup, not a return
      return 0;
    }

    const last = history.last().date;
    if (!isInCurrentMonthWindow(last, asOf)) {
      return 0;
    }

    // first is outside the window and last is inside, so size >= 2
    const pastLapseDate = this.secondLastLapseDate(history);
    if (!last.isAfter(pastLapseDate)) {
      return 0;
    }

    // paying in the lapse month itself still counts as one month lapsed
    return last.monthIndex() - pastLapseDate.monthIndex() + 1;
  }
}
