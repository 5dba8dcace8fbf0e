/**
 * DynamoDB record types for the transactions table. One partition per order.
 */

import type { PaymentMethodType, ProviderKind, TransactionDetails, TransactionType } from './transaction';

export interface TransactionRecord {
  PK: string; // ORDER#<orderId>
  SK: string; // TXN#<seq> zero-padded
  recordType: 'TRANSACTION';
  seq: number;
  type: TransactionType;
  provider: ProviderKind;
  paymentMethod: PaymentMethodType;
  amount: number;
  currency: string;
  timestamp: string;
  details: TransactionDetails;
}

export interface StepClaimRecord {
  PK: string; // ORDER#<orderId>
  SK: string; // STEP#<step>
  recordType: 'STEP_CLAIM';
  step: string;
  claimedAt: string;
  ttl?: number;
}

export const TRANSACTION_SK_PREFIX = 'TXN#';
export const STEP_SK_PREFIX = 'STEP#';

export function orderPk(orderId: string): string {
  return `ORDER#${orderId}`;
}

export function transactionSk(seq: number): string {
  return `${TRANSACTION_SK_PREFIX}${String(seq).padStart(8, '0')}`;
}

export function stepSk(step: string): string {
  return `${STEP_SK_PREFIX}${step}`;
}
