/**
 * Report configuration from environment, with an in-memory override for tests
 * and embedding callers.
 */

import { DEFAULT_TIE_BREAK, TieBreak } from '../types/SupporterTypes';
import { DEFAULT_LOST_THRESHOLD_DAYS } from '../services/lifecycle/StatusEngine';

export interface ReportConfig {
  paymentsTableName: string;
  region: string;
  tieBreak: TieBreak;
  lostThresholdDays: number;
}

const DEFAULT_TABLE_NAME = 'supporter-payments';
const DEFAULT_REGION = 'us-west-2';

let override: Partial<ReportConfig> | null = null;

function parseTieBreak(value: string | undefined): TieBreak {
  if (value === undefined || value === '') return DEFAULT_TIE_BREAK;
  if (value === 'insertion' || value === 'program') return value;
  throw new Error(`Invalid TIE_BREAK: ${value} (expected insertion or program)`);
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${value} (expected a positive integer)`);
  }
  return parsed;
}

/** Fail-fast: invalid env values throw rather than falling back. */
export function getReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const fromEnv: ReportConfig = {
    paymentsTableName: env.PAYMENTS_TABLE_NAME || DEFAULT_TABLE_NAME,
    region: env.AWS_REGION || DEFAULT_REGION,
    tieBreak: parseTieBreak(env.TIE_BREAK),
    lostThresholdDays: parsePositiveInt('LOST_THRESHOLD_DAYS', env.LOST_THRESHOLD_DAYS, DEFAULT_LOST_THRESHOLD_DAYS),
  };
  return override ? { ...fromEnv, ...override } : fromEnv;
}

export function setReportConfig(config: Partial<ReportConfig> | null): void {
  override = config;
}
