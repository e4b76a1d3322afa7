/**
 * Supporter Types - lifecycle classification of recurring supporters
 *
 * Payments are supplied by a PaymentStore; the status engine works on one
 * supporter's ordered history at a time and never stores derived values.
 */

import type { MonthDate } from '../services/calendar/MonthDate';

/**
 * Supporter lifecycle status
 */
export enum SupporterStatus {
  NEW = 'New',
  ACTIVE = 'Active',
  LAPSED = 'Lapsed',
  LOST = 'Lost',
}

/**
 * Payment cadence, taken from the trailing token of a program label
 * (e.g. "Sustainer:Monthly").
 */
export enum SupporterCadence {
  MONTHLY = 'Monthly',
  ANNUAL = 'Annual',
}

/** Cadence of a history; null when no payment carries a recognised label. */
export type Cadence = SupporterCadence | null;

/** Separator between a program name and its cadence token. */
export const PROGRAM_CADENCE_SEPARATOR = ':';

/**
 * Payment record as persisted (dates in YYYY-MM-DD form).
 */
export interface PaymentRecord {
  entity: string;
  date: string;
  payee: string;
  program: string | null;
  amount: string;
}

/**
 * Payment as seen by the status engine
 */
export interface Payment {
  entity: string;
  date: MonthDate;
  payee: string;
  program: string | null;
  amount: string;
}

/**
 * Ordering of payments that share a date.
 * - insertion: keep the order the store returned them in
 * - program: order by program label (unlabelled first), then insertion
 */
export type TieBreak = 'insertion' | 'program';

export const DEFAULT_TIE_BREAK: TieBreak = 'insertion';

export const SUPPORTER_STATUS_ORDER: SupporterStatus[] = [
  SupporterStatus.NEW,
  SupporterStatus.ACTIVE,
  SupporterStatus.LAPSED,
  SupporterStatus.LOST,
];

export const SUPPORTER_CADENCES: SupporterCadence[] = [
  SupporterCadence.ANNUAL,
  SupporterCadence.MONTHLY,
];
