import { MonthDate } from '../calendar/MonthDate';
import { PaymentRecordSchema } from '../../types/PaymentSchemas';
import { StoreError } from '../../types/ReportErrors';
import { Payment, PaymentRecord, SupporterCadence } from '../../types/SupporterTypes';

/**
 * Source of payment records. Implementations return records in any order;
 * PaymentHistory filters and orders them.
 */
export interface PaymentStore {
  /** Payments of one supporter, on or before asOf when given. */
  paymentsFor(entity: string, asOf?: MonthDate): Promise<Payment[]>;

  /**
   * Distinct supporters, in first-seen order, with at least one payment whose
   * program ends with `:<cadence>` for one of `cadences`. Undefined means all
   * supporters; an empty list means none.
   */
  listSupporters(cadences?: readonly SupporterCadence[]): Promise<string[]>;

  /** Date of the earliest payment, null when there are none. */
  earliestPaymentDate(): Promise<MonthDate | null>;
}

/** Validate a raw stored item and convert it to a Payment. */
export function toPayment(item: unknown): Payment {
  const parsed = PaymentRecordSchema.safeParse(item);
  if (!parsed.success) {
    throw new StoreError(
      `Malformed payment record: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      parsed.error,
      'MALFORMED_RECORD'
    );
  }
  const record: PaymentRecord = parsed.data;
  let date: MonthDate;
  try {
    date = MonthDate.parse(record.date);
  } catch (error) {
    throw new StoreError(`Invalid payment date for ${record.entity}: ${record.date}`, error, 'MALFORMED_RECORD');
  }
  return {
    entity: record.entity,
    date,
    payee: record.payee,
    program: record.program,
    amount: record.amount,
  };
}
