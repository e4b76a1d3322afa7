/**
 * DynamoPaymentStore Unit Tests
 */

import { DynamoPaymentStore } from '../../../services/payments/DynamoPaymentStore';
import { Logger } from '../../../services/core/Logger';
import { QueryCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { createDynamoDBPage, mockDynamoDBDocumentClient, resetAllMocks } from '../../__mocks__/aws-sdk-clients';
import { StoreError } from '../../../types/ReportErrors';
import { SupporterCadence } from '../../../types/SupporterTypes';
import { d } from '../../fixtures/payments';

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: {
    from: jest.fn(() => mockDynamoDBDocumentClient),
  },
  QueryCommand: jest.fn(),
  ScanCommand: jest.fn(),
}));

const queryInput = (call: number) => (QueryCommand as unknown as jest.Mock).mock.calls[call][0];
const scanInput = (call: number) => (ScanCommand as unknown as jest.Mock).mock.calls[call][0];

describe('DynamoPaymentStore', () => {
  let store: DynamoPaymentStore;
  let logger: Logger;

  beforeEach(() => {
    resetAllMocks();
    (QueryCommand as unknown as jest.Mock).mockClear();
    (ScanCommand as unknown as jest.Mock).mockClear();
    logger = new Logger('DynamoPaymentStoreTest');
    store = new DynamoPaymentStore(mockDynamoDBDocumentClient, 'test-payments-table', logger);
  });

  describe('paymentsFor', () => {
    it('should query by entity up to the end of the as-of day', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([
        { entity: 'supporter-1', date: '2024-03-10', payee: 'Test Payee', program: 'Sustainer:Monthly', amount: '10.00' },
      ]));

      const payments = await store.paymentsFor('supporter-1', d('2024-04-10'));

      expect(queryInput(0)).toEqual({
        TableName: 'test-payments-table',
        KeyConditionExpression: 'entity = :entity AND payment_key <= :upper',
        ExpressionAttributeValues: { ':entity': 'supporter-1', ':upper': '2024-04-10#~' },
        ExclusiveStartKey: undefined,
      });
      expect(payments).toHaveLength(1);
      expect(payments[0].date.toString()).toBe('2024-03-10');
      expect(payments[0].program).toBe('Sustainer:Monthly');
    });

    it('should query the whole partition without an as-of date', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([]));

      const payments = await store.paymentsFor('supporter-1');

      expect(queryInput(0).KeyConditionExpression).toBe('entity = :entity');
      expect(queryInput(0).ExpressionAttributeValues).toEqual({ ':entity': 'supporter-1' });
      expect(payments).toEqual([]);
    });

    it('should follow LastEvaluatedKey across pages', async () => {
      const lastKey = { entity: 'supporter-1', payment_key: '2024-01-10#p1' };
      mockDynamoDBDocumentClient.send
        .mockResolvedValueOnce(createDynamoDBPage([{ entity: 'supporter-1', date: '2024-01-10' }], lastKey))
        .mockResolvedValueOnce(createDynamoDBPage([{ entity: 'supporter-1', date: '2024-02-10' }]));

      const payments = await store.paymentsFor('supporter-1');

      expect(mockDynamoDBDocumentClient.send).toHaveBeenCalledTimes(2);
      expect(queryInput(1).ExclusiveStartKey).toEqual(lastKey);
      expect(payments.map((p) => p.date.toString())).toEqual(['2024-01-10', '2024-02-10']);
    });

    it('should default missing payee, program and amount', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([
        { entity: 'supporter-1', date: '2024-01-10' },
      ]));

      const [payment] = await store.paymentsFor('supporter-1');

      expect(payment.payee).toBe('');
      expect(payment.program).toBeNull();
      expect(payment.amount).toBe('');
    });

    it('should reject malformed records', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([{ entity: 'supporter-1' }]));

      await expect(store.paymentsFor('supporter-1')).rejects.toMatchObject({
        error_class: 'STORE',
        error_code: 'MALFORMED_RECORD',
      });
    });

    it('should reject impossible dates', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([
        { entity: 'supporter-1', date: '2023-02-30' },
      ]));

      await expect(store.paymentsFor('supporter-1')).rejects.toThrow(
        'Invalid payment date for supporter-1: 2023-02-30'
      );
    });

    it('should wrap client failures in StoreError', async () => {
      const errorSpy = jest.spyOn(logger, 'error');
      mockDynamoDBDocumentClient.send.mockRejectedValue(new Error('Throttled'));

      const promise = store.paymentsFor('supporter-1');

      await expect(promise).rejects.toBeInstanceOf(StoreError);
      await expect(promise).rejects.toMatchObject({
        message: 'Failed to query payments: Throttled',
        error_code: 'STORE_FAILED',
      });
      expect(errorSpy).toHaveBeenCalledWith('Failed to query payments', expect.objectContaining({
        entity: 'supporter-1',
        tableName: 'test-payments-table',
        error: 'Throttled',
      }));
    });
  });

  describe('listSupporters', () => {
    const items = [
      { entity: 'a', date: '2024-01-01', program: 'X:Monthly' },
      { entity: 'b', date: '2024-01-02', program: 'Y:Annual' },
      { entity: 'a', date: '2024-02-01', program: 'X:Monthly' },
      { entity: 'c', date: '2024-01-03' },
      { entity: 'd', date: '2024-01-04', program: 'Z:Monthly' },
      { entity: 'b', date: '2024-03-02', program: 'W:Monthly' },
    ];

    it('should return distinct supporters with a matching program, in first-seen order', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage(items));

      const supporters = await store.listSupporters([SupporterCadence.MONTHLY]);

      expect(supporters).toEqual(['a', 'd', 'b']);
      expect(scanInput(0)).toEqual({
        TableName: 'test-payments-table',
        ProjectionExpression: 'entity, program, #date',
        ExpressionAttributeNames: { '#date': 'date' },
        ExclusiveStartKey: undefined,
      });
    });

    it('should return every supporter without a cadence filter', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage(items));

      expect(await store.listSupporters()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should return nothing for an empty cadence list without scanning', async () => {
      expect(await store.listSupporters([])).toEqual([]);
      expect(mockDynamoDBDocumentClient.send).not.toHaveBeenCalled();
    });

    it('should scan every page', async () => {
      mockDynamoDBDocumentClient.send
        .mockResolvedValueOnce(createDynamoDBPage([items[0]], { entity: 'a' }))
        .mockResolvedValueOnce(createDynamoDBPage([items[1]]));

      expect(await store.listSupporters([SupporterCadence.ANNUAL])).toEqual(['b']);
      expect(scanInput(1).ExclusiveStartKey).toEqual({ entity: 'a' });
    });

    it('should wrap scan failures', async () => {
      mockDynamoDBDocumentClient.send.mockRejectedValue(new Error('AccessDenied'));

      await expect(store.listSupporters()).rejects.toThrow('Failed to scan payments: AccessDenied');
    });
  });

  describe('earliestPaymentDate', () => {
    it('should return the earliest date across pages', async () => {
      mockDynamoDBDocumentClient.send
        .mockResolvedValueOnce(createDynamoDBPage([
          { entity: 'a', date: '2024-02-01' },
          { entity: 'b', date: '2019-03-17' },
        ], { entity: 'b' }))
        .mockResolvedValueOnce(createDynamoDBPage([{ entity: 'c', date: '2020-01-01' }]));

      const earliest = await store.earliestPaymentDate();

      expect(earliest?.toString()).toBe('2019-03-17');
      expect(scanInput(0).ProjectionExpression).toBe('entity, #date');
    });

    it('should return null for an empty table', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue(createDynamoDBPage([]));

      expect(await store.earliestPaymentDate()).toBeNull();
    });
  });
});
