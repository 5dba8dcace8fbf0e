import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DynamoTransactionStore } from '../../src/adapters/dynamoTransactionStore';
import { TransientError } from '../../src/domain/errors';
import { createTransaction } from '../../src/domain/transactions';
import { DetailKeys } from '../../src/types/transaction';

const mockPutItem = vi.fn();
const mockQueryItems = vi.fn();
const mockDeleteItem = vi.fn();

vi.mock('../../src/lib/dynamodb', () => ({
  putItem: (...args: unknown[]) => mockPutItem(...args),
  queryItems: (...args: unknown[]) => mockQueryItems(...args),
  deleteItem: (...args: unknown[]) => mockDeleteItem(...args),
  isConditionalCheckFailed: (err: unknown) => err instanceof Error && err.name === 'ConditionalCheckFailedException',
}));

function conditionalFailure(): Error {
  const err = new Error('The conditional request failed');
  err.name = 'ConditionalCheckFailedException';
  return err;
}

const captured = createTransaction({
  type: 'CAPTURE',
  provider: 'STRIPE',
  paymentMethod: 'CARD',
  amount: 20,
  currency: 'USD',
  details: { [DetailKeys.GATEWAY_TRANSACTION_ID]: 'pi_1' },
});

describe('DynamoTransactionStore', () => {
  let store: DynamoTransactionStore;

  beforeEach(() => {
    vi.resetAllMocks();
    store = new DynamoTransactionStore({ tableName: 'Transactions', appendMaxRetries: 3, claimTtlSeconds: 60 });
  });

  describe('list', () => {
    it('reads every page in order and rebuilds the transactions', async () => {
      mockQueryItems
        .mockResolvedValueOnce({
          items: [
            {
              PK: 'ORDER#o1',
              SK: 'TXN#00000001',
              recordType: 'TRANSACTION',
              seq: 1,
              type: 'AUTHORIZE',
              provider: 'STRIPE',
              paymentMethod: 'CARD',
              amount: 20,
              currency: 'USD',
              timestamp: '2026-01-01T00:00:00.000Z',
              details: { AUTHORIZATION_ID: 'pi_1', UNRELATED: 'x' },
            },
          ],
          lastEvaluatedKey: { PK: 'ORDER#o1', SK: 'TXN#00000001' },
        })
        .mockResolvedValueOnce({
          items: [
            {
              PK: 'ORDER#o1',
              SK: 'TXN#00000002',
              recordType: 'TRANSACTION',
              seq: 2,
              type: 'CAPTURE',
              provider: 'STRIPE',
              paymentMethod: 'CARD',
              amount: 20,
              currency: 'USD',
              timestamp: '2026-01-01T00:01:00.000Z',
              details: { GATEWAY_TRANSACTION_ID: 'pi_1' },
            },
          ],
        });

      const transactions = await store.list('o1');

      expect(mockQueryItems).toHaveBeenNthCalledWith(
        1,
        'Transactions',
        'PK = :pk AND begins_with(SK, :prefix)',
        { ':pk': 'ORDER#o1', ':prefix': 'TXN#' },
        { scanIndexForward: true, exclusiveStartKey: undefined }
      );
      expect(mockQueryItems.mock.calls[1][3]).toEqual({
        scanIndexForward: true,
        exclusiveStartKey: { PK: 'ORDER#o1', SK: 'TXN#00000001' },
      });
      expect(transactions).toEqual([
        {
          amount: 20,
          currency: 'USD',
          timestamp: '2026-01-01T00:00:00.000Z',
          type: 'AUTHORIZE',
          paymentMethod: 'CARD',
          provider: 'STRIPE',
          details: { AUTHORIZATION_ID: 'pi_1' },
        },
        {
          amount: 20,
          currency: 'USD',
          timestamp: '2026-01-01T00:01:00.000Z',
          type: 'CAPTURE',
          paymentMethod: 'CARD',
          provider: 'STRIPE',
          details: { GATEWAY_TRANSACTION_ID: 'pi_1' },
        },
      ]);
    });

    it('rejects records that are not transactions', async () => {
      mockQueryItems.mockResolvedValueOnce({ items: [{ PK: 'ORDER#o1', SK: 'TXN#00000001', type: 'VOID' }] });
      await expect(store.list('o1')).rejects.toThrow();
    });
  });

  describe('append', () => {
    it('writes the next sequence number under a conditional put', async () => {
      mockQueryItems.mockResolvedValueOnce({ items: [{ seq: 4 }] });
      mockPutItem.mockResolvedValueOnce(undefined);

      await store.append('o1', captured);

      expect(mockQueryItems).toHaveBeenCalledWith(
        'Transactions',
        'PK = :pk AND begins_with(SK, :prefix)',
        { ':pk': 'ORDER#o1', ':prefix': 'TXN#' },
        { scanIndexForward: false, limit: 1 }
      );
      expect(mockPutItem).toHaveBeenCalledWith(
        'Transactions',
        {
          PK: 'ORDER#o1',
          SK: 'TXN#00000005',
          recordType: 'TRANSACTION',
          seq: 5,
          type: 'CAPTURE',
          provider: 'STRIPE',
          paymentMethod: 'CARD',
          amount: 20,
          currency: 'USD',
          timestamp: captured.timestamp,
          details: { GATEWAY_TRANSACTION_ID: 'pi_1' },
        },
        'attribute_not_exists(SK)'
      );
    });

    it('retries with a fresh sequence when another writer won', async () => {
      mockQueryItems.mockResolvedValueOnce({ items: [] }).mockResolvedValueOnce({ items: [{ seq: 1 }] });
      mockPutItem.mockRejectedValueOnce(conditionalFailure()).mockResolvedValueOnce(undefined);

      await store.append('o1', captured);

      expect(mockPutItem).toHaveBeenCalledTimes(2);
      expect(mockPutItem.mock.calls[0][1]).toMatchObject({ SK: 'TXN#00000001', seq: 1 });
      expect(mockPutItem.mock.calls[1][1]).toMatchObject({ SK: 'TXN#00000002', seq: 2 });
    });

    it('gives up after the configured number of attempts', async () => {
      mockQueryItems.mockResolvedValue({ items: [] });
      mockPutItem.mockRejectedValue(conditionalFailure());

      await expect(store.append('o1', captured)).rejects.toBeInstanceOf(TransientError);
      expect(mockPutItem).toHaveBeenCalledTimes(3);
    });

    it('does not retry other failures', async () => {
      mockQueryItems.mockResolvedValue({ items: [] });
      mockPutItem.mockRejectedValueOnce(new Error('ProvisionedThroughputExceeded'));

      await expect(store.append('o1', captured)).rejects.toThrow('ProvisionedThroughputExceeded');
      expect(mockPutItem).toHaveBeenCalledTimes(1);
    });
  });

  describe('step claims', () => {
    it('claims a step once', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      try {
        mockPutItem.mockResolvedValueOnce(undefined).mockRejectedValueOnce(conditionalFailure());

        expect(await store.claimStep('o1', 'CAPTURE')).toBe(true);
        expect(await store.claimStep('o1', 'CAPTURE')).toBe(false);

        expect(mockPutItem).toHaveBeenNthCalledWith(
          1,
          'Transactions',
          {
            PK: 'ORDER#o1',
            SK: 'STEP#CAPTURE',
            recordType: 'STEP_CLAIM',
            step: 'CAPTURE',
            claimedAt: '2026-01-01T00:00:00.000Z',
            ttl: 1767225660,
          },
          'attribute_not_exists(SK)'
        );
      } finally {
        vi.useRealTimers();
      }
    });

    it('propagates unexpected claim failures', async () => {
      mockPutItem.mockRejectedValueOnce(new Error('AccessDenied'));
      await expect(store.claimStep('o1', 'REFUND#1')).rejects.toThrow('AccessDenied');
    });

    it('releases a step by deleting its claim', async () => {
      mockDeleteItem.mockResolvedValueOnce(undefined);
      await store.releaseStep('o1', 'REFUND#1');
      expect(mockDeleteItem).toHaveBeenCalledWith('Transactions', { PK: 'ORDER#o1', SK: 'STEP#REFUND#1' });
    });
  });
});
