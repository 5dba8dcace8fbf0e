/**
 * Stripe adapter implementing PaymentGatewayPort with PaymentIntents.
 * Amounts go to Stripe in minor units.
 */

import Stripe from 'stripe';
import { z } from 'zod';
import type { GatewayCallOptions, PaymentGatewayPort } from '../ports/paymentGateway';
import type {
  InstrumentInput,
  Money,
  OrderRef,
  PaymentMethodType,
  Transaction,
  TransactionType,
} from '../types/transaction';
import { DetailKeys } from '../types/transaction';
import type { GatewayConfiguration } from '../domain/configuration';
import { decodeConfiguration, defineGatewaySchema, requiredString } from '../domain/configuration';
import { DeclineError, NotSupportedError, protocolError } from '../domain/errors';
import { fromMinorUnits, normalizeCurrency, toMinorUnits } from '../domain/money';
import {
  assertCapturable,
  assertPaymentMethod,
  createTransaction,
  requireDetail,
  requireToken,
  resolveRefundAmount,
} from '../domain/transactions';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../lib/http';
import { logger } from '../lib/logger';
import { translateStripeError } from './stripeErrors';

export const stripeConfiguration = defineGatewaySchema({
  provider: 'STRIPE',
  credentials: z.object({
    secretKey: requiredString,
    publishableKey: requiredString,
  }),
  settings: z.object({}),
});

export interface StripeIntentView {
  id: string;
  status: string;
  amount: number;
  amount_received: number;
  currency: string;
}

export interface StripeRefundView {
  id: string;
  status: string | null;
  amount: number;
}

/** The part of the Stripe SDK this adapter calls. */
export interface StripeClient {
  paymentIntents: {
    create(params: Stripe.PaymentIntentCreateParams, options?: Stripe.RequestOptions): Promise<StripeIntentView>;
    capture(
      id: string,
      params?: Stripe.PaymentIntentCaptureParams,
      options?: Stripe.RequestOptions
    ): Promise<StripeIntentView>;
  };
  refunds: {
    create(params: Stripe.RefundCreateParams, options?: Stripe.RequestOptions): Promise<StripeRefundView>;
  };
}

export type StripeClientFactory = (secretKey: string, timeoutMs: number) => StripeClient;

/** Fresh client per call; retries are the caller's decision. */
export const createStripeClient: StripeClientFactory = (secretKey, timeoutMs) =>
  new Stripe(secretKey, { timeout: timeoutMs, maxNetworkRetries: 0 });

function requestOptions(options: GatewayCallOptions | undefined): Stripe.RequestOptions | undefined {
  return options?.idempotencyKey ? { idempotencyKey: options.idempotencyKey } : undefined;
}

export interface StripeAdapterOptions {
  clientFactory?: StripeClientFactory;
  timeoutMs?: number;
}

export class StripeAdapter implements PaymentGatewayPort {
  readonly kind = 'STRIPE';
  readonly paymentMethods: readonly PaymentMethodType[] = ['CARD'];

  private readonly clientFactory: StripeClientFactory;
  private readonly timeoutMs: number;

  constructor(options: StripeAdapterOptions = {}) {
    this.clientFactory = options.clientFactory ?? createStripeClient;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  validateConfiguration(config: GatewayConfiguration): void {
    decodeConfiguration(stripeConfiguration, config);
  }

  async initialize(): Promise<Transaction> {
    throw new NotSupportedError('STRIPE', 'initialize');
  }

  async authorize(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    return this.createIntent('AUTHORIZE', money, paymentMethod, instrument, config, options);
  }

  async authorizeAndCapture(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    return this.createIntent('AUTHORIZE_CAPTURE', money, paymentMethod, instrument, config, options);
  }

  async capture(
    order: OrderRef,
    prior: Transaction,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    const { credentials } = decodeConfiguration(stripeConfiguration, config);
    assertCapturable(order, prior);
    const intentId = requireDetail(prior, DetailKeys.AUTHORIZATION_ID);
    const currency = normalizeCurrency(order.currency);
    const stripe = this.clientFactory(credentials.secretKey, this.timeoutMs);

    let intent: StripeIntentView;
    try {
      intent = await stripe.paymentIntents.capture(
        intentId,
        { amount_to_capture: toMinorUnits(order.total, currency) },
        requestOptions(options)
      );
    } catch (err) {
      throw translateStripeError(err, 'capture');
    }
    if (intent.status !== 'succeeded' && intent.status !== 'processing') {
      throw protocolError('STRIPE', 'capture', `Unexpected payment intent status ${intent.status}`, {
        paymentIntentId: intent.id,
      });
    }
    logger.info('Stripe capture completed', { paymentIntentId: intent.id, orderId: order.id });
    return createTransaction({
      type: 'CAPTURE',
      provider: 'STRIPE',
      paymentMethod: prior.paymentMethod,
      amount: fromMinorUnits(intent.amount_received, currency),
      currency,
      details: {
        [DetailKeys.AUTHORIZATION_ID]: intentId,
        [DetailKeys.GATEWAY_TRANSACTION_ID]: intent.id,
        [DetailKeys.PROCESSOR_STATUS]: intent.status,
      },
    });
  }

  async refund(
    partial: boolean,
    order: OrderRef,
    prior: Transaction,
    amount: number,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    const { credentials } = decodeConfiguration(stripeConfiguration, config);
    const refundAmount = resolveRefundAmount(partial, order, prior, amount);
    const intentId = requireDetail(prior, DetailKeys.GATEWAY_TRANSACTION_ID);
    const stripe = this.clientFactory(credentials.secretKey, this.timeoutMs);

    const params: Stripe.RefundCreateParams = { payment_intent: intentId };
    if (partial) params.amount = toMinorUnits(refundAmount, prior.currency);

    let refund: StripeRefundView;
    try {
      refund = await stripe.refunds.create(params, requestOptions(options));
    } catch (err) {
      throw translateStripeError(err, 'refund');
    }
    if (refund.status === 'failed' || refund.status === 'canceled') {
      throw new DeclineError(refund.status, 'DECLINED', `Stripe refund ${refund.id} ${refund.status}`);
    }
    logger.info('Stripe refund completed', { refundId: refund.id, orderId: order.id, partial });
    return createTransaction({
      type: 'REFUND',
      provider: 'STRIPE',
      paymentMethod: prior.paymentMethod,
      amount: refundAmount,
      currency: prior.currency,
      details: {
        [DetailKeys.GATEWAY_TRANSACTION_ID]: intentId,
        [DetailKeys.REFUND_ID]: refund.id,
        [DetailKeys.PROCESSOR_STATUS]: refund.status ?? undefined,
      },
    });
  }

  private async createIntent(
    type: Extract<TransactionType, 'AUTHORIZE' | 'AUTHORIZE_CAPTURE'>,
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options: GatewayCallOptions | undefined
  ): Promise<Transaction> {
    const { credentials } = decodeConfiguration(stripeConfiguration, config);
    assertPaymentMethod('STRIPE', this.paymentMethods, paymentMethod);
    const token = requireToken(instrument);
    const currency = normalizeCurrency(money.currency);
    const minor = toMinorUnits(money.amount, currency);
    const stripe = this.clientFactory(credentials.secretKey, this.timeoutMs);
    const operation = type === 'AUTHORIZE' ? 'authorize' : 'authorizeAndCapture';

    let intent: StripeIntentView;
    try {
      intent = await stripe.paymentIntents.create(
        {
          amount: minor,
          currency: currency.toLowerCase(),
          payment_method: token,
          payment_method_types: ['card'],
          capture_method: type === 'AUTHORIZE' ? 'manual' : 'automatic',
          confirm: true,
        },
        requestOptions(options)
      );
    } catch (err) {
      throw translateStripeError(err, operation);
    }

    const expected = type === 'AUTHORIZE' ? ['requires_capture'] : ['succeeded', 'processing'];
    if (!expected.includes(intent.status)) {
      if (intent.status === 'requires_action') {
        throw new DeclineError('authentication_required', 'AUTHENTICATION_REQUIRED', 'Card requires customer authentication');
      }
      if (intent.status === 'requires_payment_method') {
        throw new DeclineError('card_declined', 'DECLINED', 'The card was declined');
      }
      throw protocolError('STRIPE', operation, `Unexpected payment intent status ${intent.status}`, {
        paymentIntentId: intent.id,
      });
    }
    if (!intent.id) {
      throw protocolError('STRIPE', operation, 'Payment intent response carried no id');
    }

    logger.info('Stripe payment intent confirmed', { paymentIntentId: intent.id, type });
    const amount = fromMinorUnits(intent.amount, currency);
    return createTransaction({
      type,
      provider: 'STRIPE',
      paymentMethod,
      amount,
      currency,
      details:
        type === 'AUTHORIZE'
          ? { [DetailKeys.AUTHORIZATION_ID]: intent.id, [DetailKeys.PROCESSOR_STATUS]: intent.status }
          : { [DetailKeys.GATEWAY_TRANSACTION_ID]: intent.id, [DetailKeys.PROCESSOR_STATUS]: intent.status },
    });
  }
}

export function createStripeAdapter(options?: StripeAdapterOptions): StripeAdapter {
  return new StripeAdapter(options);
}
