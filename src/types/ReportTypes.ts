/**
 * Report Types - monthly supporter reports
 */

import { SupporterCadence, SupporterStatus } from './SupporterTypes';

/** Highest expiry bucket; everything over a year lands here. */
export const MAX_EXPIRY_BUCKET = 5;

/**
 * Returning-supporters row. expiredByBucket[i] counts supporters in bucket
 * i + 1 (1 = 0-3 months expired, ..., 5 = over a year).
 */
export interface ReturningReportRow {
  month: string;
  totalNew: number;
  expiredByBucket: number[];
}

export type StatusCounts = Record<SupporterStatus, number>;

/** Status counts per cadence population for one month. */
export interface StatusReportRow {
  month: string;
  counts: Record<SupporterCadence, StatusCounts>;
}

export const RETURNING_REPORT_HEADER: readonly string[] = [
  'Month',
  'Total New',
  'Were 0-3mo expired',
  'Were 3-6mo expired',
  'Were 6-9mo expired',
  'Were 9-12mo expired',
  'Were >1yr expired',
];
