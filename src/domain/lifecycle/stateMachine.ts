/**
 * Per-order transition rules:
 *
 *   NONE -> INIT* -> AUTHORIZE -> CAPTURE -> REFUND*
 *   NONE -> INIT* -> AUTHORIZE_CAPTURE -> REFUND*
 */

import type { Transaction, TransactionType } from '../../types/transaction';
import { ValidationError } from '../errors';
import { toMinorUnits } from '../money';

const SETTLING: readonly TransactionType[] = ['CAPTURE', 'AUTHORIZE_CAPTURE'];

function has(history: readonly Transaction[], ...types: TransactionType[]): boolean {
  return history.some((tx) => types.includes(tx.type));
}

function count(history: readonly Transaction[], type: TransactionType): number {
  return history.filter((tx) => tx.type === type).length;
}

export function lastOfType(history: readonly Transaction[], ...types: TransactionType[]): Transaction | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    if (types.includes(history[i].type)) return history[i];
  }
  return undefined;
}

function isAllowed(history: readonly Transaction[], next: TransactionType): boolean {
  switch (next) {
    case 'INIT':
    case 'AUTHORIZE':
    case 'AUTHORIZE_CAPTURE':
      return !has(history, 'AUTHORIZE', 'CAPTURE', 'AUTHORIZE_CAPTURE', 'REFUND');
    case 'CAPTURE':
      return has(history, 'AUTHORIZE') && !has(history, 'CAPTURE');
    case 'REFUND':
      return has(history, ...SETTLING);
  }
}

export function assertTransition(history: readonly Transaction[], next: TransactionType): void {
  if (isAllowed(history, next)) return;
  const last = history.length > 0 ? history[history.length - 1].type : 'NONE';
  throw new ValidationError('invalid_transition', `Cannot run ${next} on an order whose last step is ${last}`);
}

/**
 * Claim key for the next step. AUTHORIZE and AUTHORIZE_CAPTURE share `OPEN`
 * since only one of them may open an order. Repeatable steps are numbered so
 * each attempt at the n-th refund competes for the same key.
 */
export function stepKey(history: readonly Transaction[], next: TransactionType): string {
  switch (next) {
    case 'INIT':
    case 'REFUND':
      return `${next}#${count(history, next) + 1}`;
    case 'AUTHORIZE':
    case 'AUTHORIZE_CAPTURE':
      return 'OPEN';
    case 'CAPTURE':
      return next;
  }
}

/** Sum of REFUND amounts, in minor units of the settled currency. */
export function refundedMinorUnits(history: readonly Transaction[], currency: string): number {
  return history
    .filter((tx) => tx.type === 'REFUND')
    .reduce((sum, tx) => sum + toMinorUnits(tx.amount, currency), 0);
}

export function assertRefundWithinSettled(
  history: readonly Transaction[],
  settled: Transaction,
  requested: number
): void {
  const refunded = refundedMinorUnits(history, settled.currency);
  const settledMinor = toMinorUnits(settled.amount, settled.currency);
  if (refunded + toMinorUnits(requested, settled.currency) > settledMinor) {
    throw new ValidationError(
      'refund_exceeds_settled',
      `Refunds would total more than the settled amount ${settled.amount} ${settled.currency}`,
      { field: 'amount' }
    );
  }
}
