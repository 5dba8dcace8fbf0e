/**
 * Transaction store port used by the lifecycle driver.
 */

import type { Transaction } from '../types/transaction';

export interface TransactionStorePort {
  /** Stored transactions for an order, oldest first. */
  list(orderId: string): Promise<Transaction[]>;
  append(orderId: string, transaction: Transaction): Promise<void>;
  /** Claim a lifecycle step for an order; false when already claimed. */
  claimStep(orderId: string, step: string): Promise<boolean>;
  releaseStep(orderId: string, step: string): Promise<void>;
}
