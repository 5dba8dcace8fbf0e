/**
 * Payment lifecycle driver: sequences gateway operations per order, persists
 * each resulting transaction and hands the right prior transaction to the next
 * step. Each step is claimed in the store before the provider is called, so a
 * concurrent duplicate of the same step fails instead of reaching the provider,
 * and the provider call carries an idempotency key naming the claimed attempt.
 */

import { v4 as uuidv4 } from 'uuid';
import type { GatewayCallOptions, GatewayRegistry, PaymentGatewayPort } from '../../ports/paymentGateway';
import type { TransactionStorePort } from '../../ports/transactionStore';
import type {
  InstrumentInput,
  OrderRef,
  PaymentMethodType,
  Transaction,
  TransactionType,
} from '../../types/transaction';
import type { GatewayConfiguration } from '../configuration';
import { ValidationError } from '../errors';
import { logger } from '../../lib/logger';
import {
  assertRefundWithinSettled,
  assertTransition,
  lastOfType,
  stepKey,
} from './stateMachine';

export interface PaymentLifecycleDeps {
  store: TransactionStorePort;
  gateways: GatewayRegistry;
}

export interface RefundRequest {
  partial: boolean;
  /** Used only when `partial` is true. */
  amount?: number;
}

export class PaymentLifecycle {
  private readonly store: TransactionStorePort;
  private readonly gateways: GatewayRegistry;

  constructor(deps: PaymentLifecycleDeps) {
    this.store = deps.store;
    this.gateways = deps.gateways;
  }

  async history(orderId: string): Promise<Transaction[]> {
    return this.store.list(orderId);
  }

  async initialize(
    order: OrderRef,
    paymentMethod: PaymentMethodType,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const gateway = this.gatewayFor(config);
    return this.runStep(order, 'INIT', () =>
      gateway.initialize({ amount: order.total, currency: order.currency }, paymentMethod, config)
    );
  }

  async authorize(
    order: OrderRef,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const gateway = this.gatewayFor(config);
    return this.runStep(order, 'AUTHORIZE', (_, options) =>
      gateway.authorize({ amount: order.total, currency: order.currency }, paymentMethod, instrument, config, options)
    );
  }

  async authorizeAndCapture(
    order: OrderRef,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const gateway = this.gatewayFor(config);
    return this.runStep(order, 'AUTHORIZE_CAPTURE', (_, options) =>
      gateway.authorizeAndCapture(
        { amount: order.total, currency: order.currency },
        paymentMethod,
        instrument,
        config,
        options
      )
    );
  }

  async capture(order: OrderRef, config: GatewayConfiguration): Promise<Transaction> {
    const gateway = this.gatewayFor(config);
    return this.runStep(order, 'CAPTURE', (history, options) => {
      const authorization = this.priorFor(history, config, 'AUTHORIZE');
      return gateway.capture(order, authorization, config, options);
    });
  }

  async refund(order: OrderRef, request: RefundRequest, config: GatewayConfiguration): Promise<Transaction> {
    const gateway = this.gatewayFor(config);
    return this.runStep(order, 'REFUND', (history, options) => {
      const settled = this.priorFor(history, config, 'CAPTURE', 'AUTHORIZE_CAPTURE');
      const amount = request.partial ? request.amount ?? 0 : settled.amount;
      assertRefundWithinSettled(history, settled, amount);
      return gateway.refund(request.partial, order, settled, amount, config, options);
    });
  }

  private gatewayFor(config: GatewayConfiguration): PaymentGatewayPort {
    const gateway = this.gateways(config.provider);
    gateway.validateConfiguration(config);
    return gateway;
  }

  private priorFor(
    history: readonly Transaction[],
    config: GatewayConfiguration,
    ...types: TransactionType[]
  ): Transaction {
    const prior = lastOfType(history, ...types);
    if (!prior) {
      throw new ValidationError('invalid_transition', `Order has no ${types.join(' or ')} transaction`);
    }
    if (prior.provider !== config.provider) {
      throw new ValidationError(
        'provider_mismatch',
        `Order was processed by ${prior.provider}, not ${config.provider}`,
        { field: 'provider' }
      );
    }
    return prior;
  }

  private async runStep(
    order: OrderRef,
    type: TransactionType,
    call: (history: readonly Transaction[], options: GatewayCallOptions) => Promise<Transaction>
  ): Promise<Transaction> {
    const history = await this.store.list(order.id);
    assertTransition(history, type);
    const step = stepKey(history, type);

    if (!(await this.store.claimStep(order.id, step))) {
      throw new ValidationError('step_in_progress', `${step} is already in progress for order ${order.id}`);
    }

    // One key per claimed attempt: a retry after a released claim may carry new input.
    const idempotencyKey = `${order.id}:${step}:${uuidv4()}`;
    let transaction: Transaction;
    try {
      transaction = await call(history, { idempotencyKey });
    } catch (err) {
      await this.release(order.id, step);
      throw err;
    }

    await this.store.append(order.id, transaction);
    logger.info('Payment step completed', {
      orderId: order.id,
      step,
      provider: transaction.provider,
      amount: transaction.amount,
      currency: transaction.currency,
    });
    return transaction;
  }

  private async release(orderId: string, step: string): Promise<void> {
    try {
      await this.store.releaseStep(orderId, step);
    } catch (err) {
      logger.error('Failed to release payment step claim', { orderId, step, err });
    }
  }
}
