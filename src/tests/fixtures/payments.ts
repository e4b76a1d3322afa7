import { MonthDate } from '../../services/calendar/MonthDate';
import { PaymentHistory } from '../../services/lifecycle/PaymentHistory';
import { Payment, TieBreak } from '../../types/SupporterTypes';

export const MONTHLY_PROGRAM = 'Sustainer:Monthly';
export const ANNUAL_PROGRAM = 'Gala:Annual';

export function d(value: string): MonthDate {
  return MonthDate.parse(value);
}

export function payment(
  date: string,
  program: string | null = MONTHLY_PROGRAM,
  overrides: Partial<Payment> = {}
): Payment {
  return {
    entity: 'supporter-1',
    date: d(date),
    payee: 'Test Payee',
    program,
    amount: '25.00',
    ...overrides,
  };
}

export function historyOf(payments: Payment[], asOf?: string, tieBreak?: TieBreak): PaymentHistory {
  return PaymentHistory.asOf(payments, asOf ? d(asOf) : undefined, tieBreak);
}
