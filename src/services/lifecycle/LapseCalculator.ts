/**
 * Lapse Calculator
 *
 * A payment covers one cadence period. The supporter stays current through the
 * end of the month in which that period ends and lapses on the 1st of the
 * month after.
 */

import { MonthDate } from '../calendar/MonthDate';
import { Cadence, SupporterCadence } from '../../types/SupporterTypes';

/**
 * Date on which coverage from a payment on `lastPaymentDate` lapses.
 * Anything other than Monthly (Annual or unknown) is treated as annual.
 */
export function calculateLapseDate(lastPaymentDate: MonthDate, cadence: Cadence): MonthDate {
  const coverageEnd = cadence === SupporterCadence.MONTHLY
    ? lastPaymentDate.nextMonth()
    : lastPaymentDate.nextYear();
  return coverageEnd.roundMonthUp();
}
