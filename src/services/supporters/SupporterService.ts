/**
 * SupporterService - lifecycle queries for one supporter against a PaymentStore
 *
 * Loads the supporter's payments as of the query date and hands the history to
 * the StatusEngine. Nothing is cached between calls.
 */

import { MonthDate } from '../calendar/MonthDate';
import { Logger } from '../core/Logger';
import { PaymentHistory } from '../lifecycle/PaymentHistory';
import { StatusEngine } from '../lifecycle/StatusEngine';
import { PaymentStore } from '../payments/PaymentStore';
import { Cadence, DEFAULT_TIE_BREAK, SupporterStatus, TieBreak } from '../../types/SupporterTypes';

export interface SupporterServiceConfig {
  logger: Logger;
  paymentStore: PaymentStore;
  statusEngine?: StatusEngine;
  tieBreak?: TieBreak;
}

export class SupporterService {
  private logger: Logger;
  private paymentStore: PaymentStore;
  private statusEngine: StatusEngine;
  private tieBreak: TieBreak;

  constructor(config: SupporterServiceConfig) {
    this.logger = config.logger;
    this.paymentStore = config.paymentStore;
    this.statusEngine = config.statusEngine ?? new StatusEngine();
    this.tieBreak = config.tieBreak ?? DEFAULT_TIE_BREAK;
  }

  /**
   * Payment history as of a date (defaults to today)
   */
  async history(entity: string, asOf: MonthDate = MonthDate.today()): Promise<PaymentHistory> {
    try {
      const payments = await this.paymentStore.paymentsFor(entity, asOf);
      return PaymentHistory.asOf(payments, asOf, this.tieBreak);
    } catch (error) {
      this.logger.error('Failed to load payment history', {
        entity,
        asOf: asOf.toString(),
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async status(entity: string, asOf: MonthDate = MonthDate.today()): Promise<SupporterStatus | null> {
    const history = await this.history(entity, asOf);
    const status = this.statusEngine.status(history, asOf);
    this.logger.debug('Supporter status evaluated', { entity, asOf: asOf.toString(), status });
    return status;
  }

  async monthsExpiredAtReturn(entity: string, asOf: MonthDate = MonthDate.today()): Promise<number> {
    const history = await this.history(entity, asOf);
    return this.statusEngine.monthsExpiredAtReturn(history, asOf);
  }

  /** Null when the supporter has no payments as of the date. */
  async lapseDate(entity: string, asOf: MonthDate = MonthDate.today()): Promise<MonthDate | null> {
    const history = await this.history(entity, asOf);
    return history.isEmpty() ? null : this.statusEngine.lapseDate(history);
  }

  async cadence(entity: string, asOf: MonthDate = MonthDate.today()): Promise<Cadence> {
    const history = await this.history(entity, asOf);
    return this.statusEngine.cadence(history);
  }
}
