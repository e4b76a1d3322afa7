/**
 * DynamoPaymentStore - payments table in DynamoDB
 *
 * Table layout:
 * - PK: entity
 * - SK: payment_key = `${date}#${payment_id}`, so a key-range query returns a
 *   supporter's payments up to a date in date order
 * - attributes: date (YYYY-MM-DD), payee, program (may be absent), amount
 */

import { DynamoDBDocumentClient, QueryCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { MonthDate } from '../calendar/MonthDate';
import { Logger } from '../core/Logger';
import { PaymentStore, toPayment } from './PaymentStore';
import { programHasCadence } from '../lifecycle/CadenceResolver';
import { StoreError } from '../../types/ReportErrors';
import { Payment, SupporterCadence } from '../../types/SupporterTypes';

/** Sorts after any payment id suffix, so `${date}#~` bounds that whole day. */
const PAYMENT_KEY_UPPER_SUFFIX = '#~';

export type PaymentsDocumentClient = Pick<DynamoDBDocumentClient, 'send'>;

export class DynamoPaymentStore implements PaymentStore {
  constructor(
    private dynamoClient: PaymentsDocumentClient,
    private tableName: string,
    private logger: Logger
  ) {}

  async paymentsFor(entity: string, asOf?: MonthDate): Promise<Payment[]> {
    const payments: Payment[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.dynamoClient.send(new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: asOf
            ? 'entity = :entity AND payment_key <= :upper'
            : 'entity = :entity',
          ExpressionAttributeValues: asOf
            ? { ':entity': entity, ':upper': `${asOf.toString()}${PAYMENT_KEY_UPPER_SUFFIX}` }
            : { ':entity': entity },
          ExclusiveStartKey: exclusiveStartKey,
        }));

        for (const item of result.Items ?? []) {
          payments.push(toPayment(item));
        }
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw this.wrap('Failed to query payments', error, { entity, asOf: asOf?.toString() });
    }

    this.logger.debug('Payments loaded', { entity, count: payments.length });
    return payments;
  }

  async listSupporters(cadences?: readonly SupporterCadence[]): Promise<string[]> {
    if (cadences !== undefined && cadences.length === 0) {
      return [];
    }

    const seen = new Set<string>();
    const supporters: string[] = [];

    await this.scanAll(['entity', 'program'], (payment) => {
      if (seen.has(payment.entity)) {
        return;
      }
      const matches = cadences === undefined
        || cadences.some((cadence) => programHasCadence(payment.program, cadence));
      if (matches) {
        seen.add(payment.entity);
        supporters.push(payment.entity);
      }
    });

    this.logger.debug('Supporters listed', { cadences, count: supporters.length });
    return supporters;
  }

  async earliestPaymentDate(): Promise<MonthDate | null> {
    let earliest: MonthDate | null = null;
    await this.scanAll(['entity'], (payment) => {
      if (earliest === null || payment.date.isBefore(earliest)) {
        earliest = payment.date;
      }
    });
    return earliest;
  }

  /** Scans the projected attributes (date is always included). */
  private async scanAll(attributes: readonly string[], visit: (payment: Payment) => void): Promise<void> {
    let exclusiveStartKey: Record<string, unknown> | undefined;
    const projection = [...attributes, '#date'].join(', ');

    try {
      do {
        const result = await this.dynamoClient.send(new ScanCommand({
          TableName: this.tableName,
          ProjectionExpression: projection,
          ExpressionAttributeNames: { '#date': 'date' },
          ExclusiveStartKey: exclusiveStartKey,
        }));

        for (const item of result.Items ?? []) {
          visit(toPayment(item));
        }
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw this.wrap('Failed to scan payments', error, { projection });
    }
  }

  private wrap(message: string, error: unknown, meta: Record<string, unknown>): Error {
    if (error instanceof StoreError) {
      return error;
    }
    this.logger.error(message, {
      ...meta,
      tableName: this.tableName,
      error: error instanceof Error ? error.message : String(error),
    });
    return new StoreError(`${message}: ${error instanceof Error ? error.message : String(error)}`, error);
  }
}
