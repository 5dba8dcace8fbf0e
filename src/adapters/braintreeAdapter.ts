/**
 * Braintree adapter implementing PaymentGatewayPort. INIT hands the browser a
 * client token; the nonce it returns is authorized as a sale.
 */

import braintree from 'braintree';
import { z } from 'zod';
import type { PaymentGatewayPort } from '../ports/paymentGateway';
import type {
  InstrumentInput,
  Money,
  OrderRef,
  PaymentMethodType,
  Transaction,
  TransactionType,
} from '../types/transaction';
import { DetailKeys } from '../types/transaction';
import type { GatewayConfiguration, GatewayEnvironment } from '../domain/configuration';
import { decodeConfiguration, defineGatewaySchema, requiredString } from '../domain/configuration';
import type { DeclineCategory, PaymentError } from '../domain/errors';
import {
  DeclineError,
  TransientError,
  ValidationError,
  isPaymentError,
  protocolError,
} from '../domain/errors';
import { formatAmount, normalizeCurrency } from '../domain/money';
import {
  assertCapturable,
  assertPaymentMethod,
  createTransaction,
  requireDetail,
  requireToken,
  resolveRefundAmount,
} from '../domain/transactions';
import { DEFAULT_PROVIDER_TIMEOUT_MS, withTimeout } from '../lib/http';
import { logger } from '../lib/logger';

export const braintreeConfiguration = defineGatewaySchema({
  provider: 'BRAINTREE',
  credentials: z.object({
    merchant_id: requiredString,
    public_key: requiredString,
    private_key: requiredString,
    tokenization_key: requiredString,
  }),
  settings: z.object({}),
});

type BraintreeCredentials = z.infer<typeof braintreeConfiguration.credentials>;

export interface BraintreeTransactionView {
  id: string;
  status: string;
  amount: string;
  processorResponseCode?: string;
  processorResponseText?: string;
  gatewayRejectionReason?: string;
}

export interface BraintreeResult {
  success: boolean;
  message?: string;
  transaction?: BraintreeTransactionView;
  errors?: { deepErrors(): Array<{ code: string; attribute: string; message: string }> };
}

export interface BraintreeSaleRequest {
  amount: string;
  paymentMethodNonce: string;
  options: { submitForSettlement: boolean };
}

/** The part of the Braintree SDK this adapter calls. */
export interface BraintreeClient {
  clientToken: {
    generate(request: { merchantAccountId?: string }): Promise<{ success: boolean; clientToken?: string; message?: string }>;
  };
  transaction: {
    sale(request: BraintreeSaleRequest): Promise<BraintreeResult>;
    submitForSettlement(transactionId: string, amount?: string): Promise<BraintreeResult>;
    refund(transactionId: string, amount?: string): Promise<BraintreeResult>;
  };
}

export type BraintreeClientFactory = (credentials: BraintreeCredentials, environment: GatewayEnvironment) => BraintreeClient;

/** Built per call from the merchant's own credentials; nothing is cached across merchants. */
export const createBraintreeClient: BraintreeClientFactory = (credentials, environment) =>
  new braintree.BraintreeGateway({
    environment: environment === 'PRODUCTION' ? braintree.Environment.Production : braintree.Environment.Sandbox,
    merchantId: credentials.merchant_id,
    publicKey: credentials.public_key,
    privateKey: credentials.private_key,
  });

/** Processor response codes with a specific decline category; the rest are DECLINED. */
const PROCESSOR_CODE_CATEGORIES: Readonly<Record<string, DeclineCategory>> = {
  '2001': 'INSUFFICIENT_FUNDS',
  '2002': 'INSUFFICIENT_FUNDS',
  '2003': 'INSUFFICIENT_FUNDS',
  '2004': 'EXPIRED',
  '2005': 'INVALID_NUMBER',
  '2006': 'INVALID_EXPIRY',
  '2008': 'INVALID_NUMBER',
  '2010': 'INVALID_CVC',
  '2051': 'INVALID_NUMBER',
  '2099': 'AUTHENTICATION_REQUIRED',
};

const REJECTION_CATEGORIES: Readonly<Record<string, DeclineCategory>> = {
  cvv: 'INVALID_CVC',
  avs: 'INVALID_ZIP',
  avs_and_cvv: 'INVALID_CVC',
};

/** Validation error codes (deepErrors) with a dedicated validation code. */
const VALIDATION_CODES: Readonly<Record<string, string>> = {
  '81502': 'amount_invalid',
  '81503': 'amount_invalid',
  '81531': 'amount_invalid',
  '91565': 'token_invalid',
  '91564': 'token_invalid',
  '93107': 'token_invalid',
  '91507': 'invalid_state',
  '91506': 'invalid_state',
  '91521': 'refund_amount_exceeds_settled',
  '91512': 'already_refunded',
};

const TRANSIENT_TYPES: Readonly<Record<string, 'authentication' | 'unavailable' | 'timeout' | 'rate_limited'>> = {
  authenticationError: 'authentication',
  authorizationError: 'authentication',
  serverError: 'unavailable',
  serviceUnavailableError: 'unavailable',
  gatewayTimeoutError: 'timeout',
  requestTimeoutError: 'timeout',
  tooManyRequestsError: 'rate_limited',
  upgradeRequired: 'unavailable',
};

function errorType(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  return 'type' in err && typeof err.type === 'string' ? err.type : err.name;
}

function translateThrown(err: unknown, operation: string): PaymentError {
  if (isPaymentError(err)) return err;
  const type = errorType(err);
  const transient = type ? TRANSIENT_TYPES[type] : undefined;
  if (transient) {
    return new TransientError(transient, `Braintree ${operation} failed: ${type}`, 'BRAINTREE');
  }
  if (err instanceof Error && /ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|socket hang up/i.test(err.message)) {
    return new TransientError('network', `Braintree ${operation} failed: ${err.message}`, 'BRAINTREE');
  }
  const reason = err instanceof Error ? err.message : String(err);
  return protocolError('BRAINTREE', operation, `Unexpected failure: ${reason}`, { errorType: type });
}

/** Map an unsuccessful result: declines from the transaction, everything else from validation errors. */
function translateResult(result: BraintreeResult, operation: string): PaymentError {
  const transaction = result.transaction;
  if (transaction?.status === 'processor_declined' || transaction?.status === 'settlement_declined') {
    const code = transaction.processorResponseCode ?? transaction.status;
    return new DeclineError(
      code,
      PROCESSOR_CODE_CATEGORIES[code] ?? 'DECLINED',
      transaction.processorResponseText ?? result.message ?? 'Payment declined'
    );
  }
  if (transaction?.status === 'gateway_rejected') {
    const reason = transaction.gatewayRejectionReason ?? 'gateway_rejected';
    return new DeclineError(reason, REJECTION_CATEGORIES[reason] ?? 'DECLINED', result.message ?? 'Payment rejected');
  }
  const first = result.errors?.deepErrors()[0];
  if (first) {
    const mapped = VALIDATION_CODES[first.code];
    if (mapped) return new ValidationError(mapped, first.message, { field: first.attribute });
    return new ValidationError('provider_rejected', first.message, {
      field: first.attribute,
      messageKey: 'payment.error.validation.generic',
    });
  }
  return protocolError('BRAINTREE', operation, 'Unsuccessful result without transaction or errors', {
    message: result.message,
  });
}

export interface BraintreeAdapterOptions {
  clientFactory?: BraintreeClientFactory;
  timeoutMs?: number;
}

export class BraintreeAdapter implements PaymentGatewayPort {
  readonly kind = 'BRAINTREE';
  readonly paymentMethods: readonly PaymentMethodType[] = ['CARD'];

  private readonly clientFactory: BraintreeClientFactory;
  private readonly timeoutMs: number;

  constructor(options: BraintreeAdapterOptions = {}) {
    this.clientFactory = options.clientFactory ?? createBraintreeClient;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  validateConfiguration(config: GatewayConfiguration): void {
    decodeConfiguration(braintreeConfiguration, config);
  }

  async initialize(money: Money, paymentMethod: PaymentMethodType, config: GatewayConfiguration): Promise<Transaction> {
    const gateway = this.gateway(config);
    assertPaymentMethod('BRAINTREE', this.paymentMethods, paymentMethod);
    const currency = normalizeCurrency(money.currency);

    let response: { success: boolean; clientToken?: string; message?: string };
    try {
      response = await withTimeout(gateway.clientToken.generate({}), this.timeoutMs, 'BRAINTREE', 'initialize');
    } catch (err) {
      throw translateThrown(err, 'initialize');
    }
    if (!response.success || !response.clientToken) {
      throw protocolError('BRAINTREE', 'initialize', 'Client token generation returned no token', {
        message: response.message,
      });
    }
    return createTransaction({
      type: 'INIT',
      provider: 'BRAINTREE',
      paymentMethod,
      amount: money.amount,
      currency,
      details: { [DetailKeys.CLIENT_TOKEN]: response.clientToken },
    });
  }

  async authorize(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    return this.sale('AUTHORIZE', money, paymentMethod, instrument, config);
  }

  async authorizeAndCapture(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    return this.sale('AUTHORIZE_CAPTURE', money, paymentMethod, instrument, config);
  }

  async capture(order: OrderRef, prior: Transaction, config: GatewayConfiguration): Promise<Transaction> {
    const gateway = this.gateway(config);
    assertCapturable(order, prior);
    const authorizationId = requireDetail(prior, DetailKeys.AUTHORIZATION_ID);
    const currency = normalizeCurrency(order.currency);

    const result = await this.call('capture', () =>
      gateway.transaction.submitForSettlement(authorizationId, formatAmount(order.total, currency))
    );
    logger.info('Braintree capture completed', { transactionId: result.id, orderId: order.id });
    return createTransaction({
      type: 'CAPTURE',
      provider: 'BRAINTREE',
      paymentMethod: prior.paymentMethod,
      amount: order.total,
      currency,
      details: {
        [DetailKeys.AUTHORIZATION_ID]: authorizationId,
        [DetailKeys.GATEWAY_TRANSACTION_ID]: result.id,
        [DetailKeys.PROCESSOR_STATUS]: result.status,
      },
    });
  }

  async refund(
    partial: boolean,
    order: OrderRef,
    prior: Transaction,
    amount: number,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const gateway = this.gateway(config);
    const refundAmount = resolveRefundAmount(partial, order, prior, amount);
    const transactionId = requireDetail(prior, DetailKeys.GATEWAY_TRANSACTION_ID);

    // Without an amount Braintree refunds the full settled amount.
    const result = await this.call('refund', () =>
      partial
        ? gateway.transaction.refund(transactionId, formatAmount(refundAmount, prior.currency))
        : gateway.transaction.refund(transactionId)
    );
    logger.info('Braintree refund completed', { refundId: result.id, orderId: order.id, partial });
    return createTransaction({
      type: 'REFUND',
      provider: 'BRAINTREE',
      paymentMethod: prior.paymentMethod,
      amount: refundAmount,
      currency: prior.currency,
      details: {
        [DetailKeys.GATEWAY_TRANSACTION_ID]: transactionId,
        [DetailKeys.REFUND_ID]: result.id,
        [DetailKeys.PROCESSOR_STATUS]: result.status,
      },
    });
  }

  private gateway(config: GatewayConfiguration): BraintreeClient {
    const { environment, credentials } = decodeConfiguration(braintreeConfiguration, config);
    return this.clientFactory(credentials, environment);
  }

  private async sale(
    type: Extract<TransactionType, 'AUTHORIZE' | 'AUTHORIZE_CAPTURE'>,
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const gateway = this.gateway(config);
    assertPaymentMethod('BRAINTREE', this.paymentMethods, paymentMethod);
    const nonce = requireToken(instrument);
    const currency = normalizeCurrency(money.currency);
    const operation = type === 'AUTHORIZE' ? 'authorize' : 'authorizeAndCapture';

    const result = await this.call(operation, () =>
      gateway.transaction.sale({
        amount: formatAmount(money.amount, currency),
        paymentMethodNonce: nonce,
        options: { submitForSettlement: type === 'AUTHORIZE_CAPTURE' },
      })
    );
    logger.info('Braintree sale completed', { transactionId: result.id, type });
    return createTransaction({
      type,
      provider: 'BRAINTREE',
      paymentMethod,
      amount: money.amount,
      currency,
      details:
        type === 'AUTHORIZE'
          ? { [DetailKeys.AUTHORIZATION_ID]: result.id, [DetailKeys.PROCESSOR_STATUS]: result.status }
          : { [DetailKeys.GATEWAY_TRANSACTION_ID]: result.id, [DetailKeys.PROCESSOR_STATUS]: result.status },
    });
  }

  /** Run one SDK call and return its transaction, or throw the translated failure. */
  private async call(operation: string, fn: () => Promise<BraintreeResult>): Promise<BraintreeTransactionView> {
    let result: BraintreeResult;
    try {
      result = await withTimeout(fn(), this.timeoutMs, 'BRAINTREE', operation);
    } catch (err) {
      throw translateThrown(err, operation);
    }
    if (!result.success) throw translateResult(result, operation);
    if (!result.transaction?.id) {
      throw protocolError('BRAINTREE', operation, 'Successful result carried no transaction id', {
        message: result.message,
      });
    }
    return result.transaction;
  }
}

export function createBraintreeAdapter(options?: BraintreeAdapterOptions): BraintreeAdapter {
  return new BraintreeAdapter(options);
}
