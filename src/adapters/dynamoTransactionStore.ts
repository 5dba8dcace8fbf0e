/**
 * Transaction store on a single DynamoDB table, one partition per order.
 * Appends and step claims use attribute_not_exists(SK) as the lock.
 */

import { z } from 'zod';
import type { TransactionStorePort } from '../ports/transactionStore';
import type { DetailKey, Transaction, TransactionDetails } from '../types/transaction';
import { DetailKeys, PAYMENT_METHOD_TYPES, PROVIDER_KINDS, TRANSACTION_TYPES } from '../types/transaction';
import type { StepClaimRecord, TransactionRecord } from '../types/tables';
import { TRANSACTION_SK_PREFIX, orderPk, stepSk, transactionSk } from '../types/tables';
import { TransientError } from '../domain/errors';
import { deleteItem, isConditionalCheckFailed, putItem, queryItems } from '../lib/dynamodb';
import type { Item } from '../lib/dynamodb';
import { logger } from '../lib/logger';

const transactionRecordSchema = z.object({
  seq: z.number().int(),
  type: z.enum(TRANSACTION_TYPES),
  provider: z.enum(PROVIDER_KINDS),
  paymentMethod: z.enum(PAYMENT_METHOD_TYPES),
  amount: z.number(),
  currency: z.string(),
  timestamp: z.string(),
  details: z.record(z.string()).default({}),
});

function toTransaction(item: Item): Transaction {
  const record = transactionRecordSchema.parse(item);
  const details: Partial<Record<DetailKey, string>> = {};
  for (const key of Object.values(DetailKeys)) {
    const value = record.details[key];
    if (value !== undefined) details[key] = value;
  }
  return Object.freeze({
    amount: record.amount,
    currency: record.currency,
    timestamp: record.timestamp,
    type: record.type,
    paymentMethod: record.paymentMethod,
    provider: record.provider,
    details: Object.freeze<TransactionDetails>(details),
  });
}

export interface DynamoTransactionStoreConfig {
  tableName: string;
  appendMaxRetries?: number;
  /** Step claims expire through the table TTL after this long. */
  claimTtlSeconds?: number;
}

export class DynamoTransactionStore implements TransactionStorePort {
  private readonly tableName: string;
  private readonly appendMaxRetries: number;
  private readonly claimTtlSeconds: number;

  constructor(config: DynamoTransactionStoreConfig) {
    this.tableName = config.tableName;
    this.appendMaxRetries = config.appendMaxRetries ?? 5;
    this.claimTtlSeconds = config.claimTtlSeconds ?? 15 * 60;
  }

  async list(orderId: string): Promise<Transaction[]> {
    const transactions: Transaction[] = [];
    let exclusiveStartKey: Item | undefined;
    do {
      const page = await queryItems(
        this.tableName,
        'PK = :pk AND begins_with(SK, :prefix)',
        { ':pk': orderPk(orderId), ':prefix': TRANSACTION_SK_PREFIX },
        { scanIndexForward: true, exclusiveStartKey }
      );
      transactions.push(...page.items.map(toTransaction));
      exclusiveStartKey = page.lastEvaluatedKey;
    } while (exclusiveStartKey);
    return transactions;
  }

  /** Append under the next sequence number; retries when another writer took it. */
  async append(orderId: string, transaction: Transaction): Promise<void> {
    for (let attempt = 0; attempt < this.appendMaxRetries; attempt++) {
      const seq = (await this.lastSequence(orderId)) + 1;
      const record: TransactionRecord = {
        PK: orderPk(orderId),
        SK: transactionSk(seq),
        recordType: 'TRANSACTION',
        seq,
        type: transaction.type,
        provider: transaction.provider,
        paymentMethod: transaction.paymentMethod,
        amount: transaction.amount,
        currency: transaction.currency,
        timestamp: transaction.timestamp,
        details: { ...transaction.details },
      };
      try {
        await putItem(this.tableName, { ...record }, 'attribute_not_exists(SK)');
        return;
      } catch (err) {
        if (!isConditionalCheckFailed(err)) throw err;
        logger.debug('Transaction append conflict, retrying', { orderId, seq, attempt });
      }
    }
    throw new TransientError('unavailable', `Could not append transaction for order ${orderId} after retries`);
  }

  async claimStep(orderId: string, step: string): Promise<boolean> {
    const now = Date.now();
    const claim: StepClaimRecord = {
      PK: orderPk(orderId),
      SK: stepSk(step),
      recordType: 'STEP_CLAIM',
      step,
      claimedAt: new Date(now).toISOString(),
      ttl: Math.floor(now / 1000) + this.claimTtlSeconds,
    };
    try {
      await putItem(this.tableName, { ...claim }, 'attribute_not_exists(SK)');
      return true;
    } catch (err) {
      if (isConditionalCheckFailed(err)) return false;
      throw err;
    }
  }

  async releaseStep(orderId: string, step: string): Promise<void> {
    await deleteItem(this.tableName, { PK: orderPk(orderId), SK: stepSk(step) });
  }

  private async lastSequence(orderId: string): Promise<number> {
    const { items } = await queryItems(
      this.tableName,
      'PK = :pk AND begins_with(SK, :prefix)',
      { ':pk': orderPk(orderId), ':prefix': TRANSACTION_SK_PREFIX },
      { scanIndexForward: false, limit: 1 }
    );
    const seq = items[0]?.seq;
    return typeof seq === 'number' ? seq : 0;
  }
}
