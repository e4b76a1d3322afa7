/**
 * SupporterReportService - monthly returning-supporter and status reports
 *
 * Each cadence population (Annual, Monthly) is evaluated separately and the
 * counts are summed, so a supporter who appears in both populations is counted
 * in both. Payments are loaded once per supporter per run and re-filtered as
 * of each month.
 */

import { MonthDate } from '../calendar/MonthDate';
import { Logger } from '../core/Logger';
import { PaymentHistory } from '../lifecycle/PaymentHistory';
import { StatusEngine } from '../lifecycle/StatusEngine';
import { PaymentStore } from '../payments/PaymentStore';
import { ReportRange } from './ReportArguments';
import { returningReportToCsv, statusReportToCsv } from './ReportCsv';
import {
  MAX_EXPIRY_BUCKET,
  ReturningReportRow,
  StatusCounts,
  StatusReportRow,
} from '../../types/ReportTypes';
import {
  DEFAULT_TIE_BREAK,
  Payment,
  SUPPORTER_CADENCES,
  SupporterCadence,
  SupporterStatus,
  TieBreak,
} from '../../types/SupporterTypes';

export interface SupporterReportServiceConfig {
  logger: Logger;
  paymentStore: PaymentStore;
  statusEngine?: StatusEngine;
  tieBreak?: TieBreak;
}

type Population = Map<SupporterCadence, Payment[][]>;

/** Months as-of dates from start to end inclusive: start, then the 1st of each following month. */
export function* iterateMonths(start: MonthDate, end: MonthDate): Generator<MonthDate> {
  let month = start;
  while (!month.isAfter(end)) {
    yield month;
    month = month.roundMonthUp();
  }
}

/** 0 → 0, 1-3 → 1, 4-6 → 2, 7-9 → 3, 10-12 → 4, 13+ → 5 */
export function expiryBucket(monthsExpired: number): number {
  return Math.min(Math.floor((monthsExpired + 2) / 3), MAX_EXPIRY_BUCKET);
}

function emptyStatusCounts(): StatusCounts {
  return {
    [SupporterStatus.NEW]: 0,
    [SupporterStatus.ACTIVE]: 0,
    [SupporterStatus.LAPSED]: 0,
    [SupporterStatus.LOST]: 0,
  };
}

export class SupporterReportService {
  private logger: Logger;
  private paymentStore: PaymentStore;
  private statusEngine: StatusEngine;
  private tieBreak: TieBreak;

  constructor(config: SupporterReportServiceConfig) {
    this.logger = config.logger;
    this.paymentStore = config.paymentStore;
    this.statusEngine = config.statusEngine ?? new StatusEngine();
    this.tieBreak = config.tieBreak ?? DEFAULT_TIE_BREAK;
  }

  async returningReport(start: MonthDate, end: MonthDate): Promise<ReturningReportRow[]> {
    const population = await this.loadPopulation();
    const rows: ReturningReportRow[] = [];

    for (const month of iterateMonths(start, end)) {
      let totalNew = 0;
      const expiredByBucket = new Array<number>(MAX_EXPIRY_BUCKET).fill(0);

      for (const histories of population.values()) {
        for (const payments of histories) {
          const history = PaymentHistory.asOf(payments, month, this.tieBreak);
          if (this.statusEngine.status(history, month) === SupporterStatus.NEW) {
            totalNew++;
          }
          const bucket = expiryBucket(this.statusEngine.monthsExpiredAtReturn(history, month));
          if (bucket > 0) {
            expiredByBucket[bucket - 1]++;
          }
        }
      }

      rows.push({ month: month.toMonthString(), totalNew, expiredByBucket });
      this.logger.child({ month: month.toMonthString() }).debug('Month evaluated', { totalNew, expiredByBucket });
    }

    this.logger.info('Returning report generated', {
      start: start.toString(),
      end: end.toString(),
      months: rows.length,
    });
    return rows;
  }

  async statusReport(start: MonthDate, end: MonthDate): Promise<StatusReportRow[]> {
    const population = await this.loadPopulation();
    const rows: StatusReportRow[] = [];

    for (const month of iterateMonths(start, end)) {
      const counts: Record<SupporterCadence, StatusCounts> = {
        [SupporterCadence.ANNUAL]: emptyStatusCounts(),
        [SupporterCadence.MONTHLY]: emptyStatusCounts(),
      };

      for (const [cadence, histories] of population) {
        for (const payments of histories) {
          const status = this.statusEngine.status(
            PaymentHistory.asOf(payments, month, this.tieBreak),
            month
          );
          // no payments yet as of this month: not counted
          if (status !== null) {
            counts[cadence][status]++;
          }
        }
      }

      rows.push({ month: month.toMonthString(), counts });
      this.logger.child({ month: month.toMonthString() }).debug('Month evaluated', { counts });
    }

    this.logger.info('Status report generated', {
      start: start.toString(),
      end: end.toString(),
      months: rows.length,
    });
    return rows;
  }

  /** Run the requested report over the range and render it as CSV. */
  async generateCsv(range: ReportRange): Promise<string> {
    switch (range.report) {
      case 'returning':
        return returningReportToCsv(await this.returningReport(range.start, range.end));
      case 'status':
        return statusReportToCsv(await this.statusReport(range.start, range.end));
    }
  }

  /**
   * Payments of every supporter in each cadence population. A supporter in
   * both populations is fetched once.
   */
  private async loadPopulation(): Promise<Population> {
    const paymentsByEntity = new Map<string, Payment[]>();
    const population: Population = new Map();

    for (const cadence of SUPPORTER_CADENCES) {
      const entities = await this.paymentStore.listSupporters([cadence]);
      const histories: Payment[][] = [];
      for (const entity of entities) {
        let payments = paymentsByEntity.get(entity);
        if (!payments) {
          payments = await this.paymentStore.paymentsFor(entity);
          paymentsByEntity.set(entity, payments);
        }
        histories.push(payments);
      }
      population.set(cadence, histories);
      this.logger.debug('Population loaded', { cadence, supporters: entities.length });
    }

    return population;
  }
}
