/**
 * PayPal Orders v2 adapter. The buyer approves an order created at INIT;
 * authorize turns the approved order into an authorization, which capture and
 * refund then address through the payments API.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { GatewayCallOptions, PaymentGatewayPort } from '../ports/paymentGateway';
import type {
  InstrumentInput,
  Money,
  OrderRef,
  PaymentMethodType,
  Transaction,
} from '../types/transaction';
import { DetailKeys } from '../types/transaction';
import type { DecodedConfiguration, GatewayConfiguration, GatewayEnvironment } from '../domain/configuration';
import { decodeConfiguration, defineGatewaySchema, requiredString } from '../domain/configuration';
import type { DeclineCategory, PaymentError } from '../domain/errors';
import { DeclineError, TransientError, ValidationError, protocolError } from '../domain/errors';
import { formatAmount, normalizeCurrency } from '../domain/money';
import {
  assertCapturable,
  assertPaymentMethod,
  createTransaction,
  requireDetail,
  requireRedirectToken,
  resolveRefundAmount,
} from '../domain/transactions';
import { DEFAULT_PROVIDER_TIMEOUT_MS, providerFetch } from '../lib/http';
import { logger } from '../lib/logger';

export const paypalRestConfiguration = defineGatewaySchema({
  provider: 'PAYPAL_REST',
  credentials: z.object({
    client: requiredString,
    secret: requiredString,
  }),
  settings: z.object({
    returnUrl: requiredString.url().optional(),
    cancelUrl: requiredString.url().optional(),
  }),
});

type RestConfiguration = DecodedConfiguration<
  z.infer<typeof paypalRestConfiguration.credentials>,
  z.infer<typeof paypalRestConfiguration.settings>
>;

const API_HOSTS: Readonly<Record<GatewayEnvironment, string>> = {
  SANDBOX: 'https://api-m.sandbox.paypal.com',
  PRODUCTION: 'https://api-m.paypal.com',
};

const DECLINE_ISSUES: Readonly<Record<string, DeclineCategory>> = {
  INSTRUMENT_DECLINED: 'DECLINED',
  TRANSACTION_REFUSED: 'DECLINED',
  PAYER_CANNOT_PAY: 'DECLINED',
  CARD_EXPIRED: 'EXPIRED',
  PAYER_ACTION_REQUIRED: 'AUTHENTICATION_REQUIRED',
};

const VALIDATION_ISSUES: Readonly<Record<string, string>> = {
  ORDER_NOT_APPROVED: 'payer_not_approved',
  ORDER_ALREADY_AUTHORIZED: 'redirect_token_used',
  ORDER_EXPIRED: 'redirect_token_expired',
  AUTHORIZATION_EXPIRED: 'authorization_expired',
  AUTHORIZATION_VOIDED: 'authorization_voided',
  AUTHORIZATION_ALREADY_CAPTURED: 'already_captured',
  CAPTURE_FULLY_REFUNDED: 'already_refunded',
  REFUND_AMOUNT_EXCEEDED: 'refund_amount_exceeds_settled',
  REFUND_NOT_ALLOWED: 'refund_refused',
  MAX_NUMBER_OF_REFUNDS_EXCEEDED: 'refund_refused',
  CURRENCY_MISMATCH: 'currency_mismatch',
  DECIMAL_PRECISION: 'amount_invalid',
  RESOURCE_NOT_FOUND: 'unknown_reference',
};

const tokenSchema = z.object({
  access_token: z.string().min(1),
});

const orderSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  links: z.array(z.object({ href: z.string(), rel: z.string() })).default([]),
});

const authorizedOrderSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  payer: z.object({ payer_id: z.string().optional() }).optional(),
  purchase_units: z
    .array(
      z.object({
        payments: z.object({
          authorizations: z.array(z.object({ id: z.string().min(1), status: z.string() })).min(1),
        }),
      })
    )
    .min(1),
});

const paymentSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
});

// 204 No Content unless a representation is requested.
const voidSchema = z.object({ id: z.string().optional(), status: z.string().optional() });

const errorSchema = z.object({
  name: z.string().optional(),
  message: z.string().optional(),
  debug_id: z.string().optional(),
  details: z.array(z.object({ issue: z.string(), description: z.string().optional() })).optional(),
});

type PaypalErrorBody = z.infer<typeof errorSchema>;

interface ApiResult<T> {
  data: T;
  debugId?: string;
}

function parseJson(payload: string): unknown {
  if (payload.trim() === '') return {};
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

function money(amount: number, currency: string): { currency_code: string; value: string } {
  return { currency_code: currency, value: formatAmount(amount, currency) };
}

export interface PaypalRestAdapterOptions {
  timeoutMs?: number;
}

export class PaypalRestAdapter implements PaymentGatewayPort {
  readonly kind = 'PAYPAL_REST';
  readonly paymentMethods: readonly PaymentMethodType[] = ['WALLET'];

  private readonly timeoutMs: number;

  constructor(options: PaypalRestAdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  validateConfiguration(config: GatewayConfiguration): void {
    decodeConfiguration(paypalRestConfiguration, config);
  }

  async initialize(amount: Money, paymentMethod: PaymentMethodType, config: GatewayConfiguration): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalRestConfiguration, config);
    assertPaymentMethod('PAYPAL_REST', this.paymentMethods, paymentMethod);
    const currency = normalizeCurrency(amount.currency);
    const { returnUrl, cancelUrl } = decoded.settings;

    const { data: order, debugId } = await this.request(
      decoded,
      'createOrder',
      '/v2/checkout/orders',
      {
        intent: 'AUTHORIZE',
        purchase_units: [{ amount: money(amount.amount, currency) }],
        ...(returnUrl || cancelUrl
          ? { application_context: { return_url: returnUrl, cancel_url: cancelUrl, user_action: 'CONTINUE' } }
          : {}),
      },
      orderSchema
    );
    const approve = order.links.find((link) => link.rel === 'approve' || link.rel === 'payer-action');
    if (!approve) {
      throw protocolError('PAYPAL_REST', 'createOrder', 'Order has no approval link', { orderId: order.id, debugId });
    }
    return createTransaction({
      type: 'INIT',
      provider: 'PAYPAL_REST',
      paymentMethod,
      amount: amount.amount,
      currency,
      details: {
        [DetailKeys.REDIRECT_TOKEN]: order.id,
        [DetailKeys.REDIRECT_URL]: approve.href,
        [DetailKeys.CORRELATION_ID]: debugId,
        [DetailKeys.PROCESSOR_STATUS]: order.status,
      },
    });
  }

  async authorize(
    amount: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalRestConfiguration, config);
    assertPaymentMethod('PAYPAL_REST', this.paymentMethods, paymentMethod);
    const { token } = requireRedirectToken(instrument);
    const currency = normalizeCurrency(amount.currency);

    const authorization = await this.authorizeOrder(decoded, token, options?.idempotencyKey);
    return createTransaction({
      type: 'AUTHORIZE',
      provider: 'PAYPAL_REST',
      paymentMethod,
      amount: amount.amount,
      currency,
      details: {
        [DetailKeys.REDIRECT_TOKEN]: token,
        [DetailKeys.PAYER_ID]: authorization.payerId,
        [DetailKeys.AUTHORIZATION_ID]: authorization.id,
        [DetailKeys.PROCESSOR_STATUS]: authorization.status,
        [DetailKeys.CORRELATION_ID]: authorization.debugId,
      },
    });
  }

  async authorizeAndCapture(
    amount: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalRestConfiguration, config);
    assertPaymentMethod('PAYPAL_REST', this.paymentMethods, paymentMethod);
    const { token } = requireRedirectToken(instrument);
    const currency = normalizeCurrency(amount.currency);
    const key = options?.idempotencyKey;

    const authorization = await this.authorizeOrder(decoded, token, key);
    let capture: ApiResult<z.infer<typeof paymentSchema>>;
    try {
      capture = await this.captureAuthorization(decoded, authorization.id, amount.amount, currency, key);
    } catch (err) {
      await this.voidAuthorization(decoded, authorization.id);
      throw err;
    }
    return createTransaction({
      type: 'AUTHORIZE_CAPTURE',
      provider: 'PAYPAL_REST',
      paymentMethod,
      amount: amount.amount,
      currency,
      details: {
        [DetailKeys.REDIRECT_TOKEN]: token,
        [DetailKeys.PAYER_ID]: authorization.payerId,
        [DetailKeys.AUTHORIZATION_ID]: authorization.id,
        [DetailKeys.GATEWAY_TRANSACTION_ID]: capture.data.id,
        [DetailKeys.PROCESSOR_STATUS]: capture.data.status,
        [DetailKeys.CORRELATION_ID]: capture.debugId,
      },
    });
  }

  async capture(
    order: OrderRef,
    prior: Transaction,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalRestConfiguration, config);
    assertCapturable(order, prior);
    const authorizationId = requireDetail(prior, DetailKeys.AUTHORIZATION_ID);
    const currency = normalizeCurrency(order.currency);

    const capture = await this.captureAuthorization(
      decoded,
      authorizationId,
      order.total,
      currency,
      options?.idempotencyKey
    );
    logger.info('PayPal capture completed', { captureId: capture.data.id, orderId: order.id });
    return createTransaction({
      type: 'CAPTURE',
      provider: 'PAYPAL_REST',
      paymentMethod: prior.paymentMethod,
      amount: order.total,
      currency,
      details: {
        [DetailKeys.AUTHORIZATION_ID]: authorizationId,
        [DetailKeys.GATEWAY_TRANSACTION_ID]: capture.data.id,
        [DetailKeys.PROCESSOR_STATUS]: capture.data.status,
        [DetailKeys.CORRELATION_ID]: capture.debugId,
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
    const decoded = decodeConfiguration(paypalRestConfiguration, config);
    const refundAmount = resolveRefundAmount(partial, order, prior, amount);
    const captureId = requireDetail(prior, DetailKeys.GATEWAY_TRANSACTION_ID);

    const { data: refund, debugId } = await this.request(
      decoded,
      'refund',
      `/v2/payments/captures/${encodeURIComponent(captureId)}/refund`,
      partial ? { amount: money(refundAmount, prior.currency) } : {},
      paymentSchema,
      options?.idempotencyKey
    );
    if (refund.status === 'CANCELLED' || refund.status === 'FAILED') {
      throw new DeclineError(refund.status, 'DECLINED', `PayPal refund ${refund.id} ${refund.status.toLowerCase()}`);
    }
    logger.info('PayPal refund completed', { refundId: refund.id, orderId: order.id, partial });
    return createTransaction({
      type: 'REFUND',
      provider: 'PAYPAL_REST',
      paymentMethod: prior.paymentMethod,
      amount: refundAmount,
      currency: prior.currency,
      details: {
        [DetailKeys.GATEWAY_TRANSACTION_ID]: captureId,
        [DetailKeys.REFUND_ID]: refund.id,
        [DetailKeys.PROCESSOR_STATUS]: refund.status,
        [DetailKeys.CORRELATION_ID]: debugId,
      },
    });
  }

  private async authorizeOrder(
    decoded: RestConfiguration,
    orderId: string,
    idempotencyKey: string | undefined
  ): Promise<{ id: string; status: string; payerId?: string; debugId?: string }> {
    const { data: order, debugId } = await this.request(
      decoded,
      'authorizeOrder',
      `/v2/checkout/orders/${encodeURIComponent(orderId)}/authorize`,
      {},
      authorizedOrderSchema,
      idempotencyKey
    );
    const [authorization] = order.purchase_units[0].payments.authorizations;
    if (authorization.status === 'DENIED') {
      throw new DeclineError('DENIED', 'DECLINED', `PayPal denied authorization ${authorization.id}`);
    }
    return { id: authorization.id, status: authorization.status, payerId: order.payer?.payer_id, debugId };
  }

  private async captureAuthorization(
    decoded: RestConfiguration,
    authorizationId: string,
    amount: number,
    currency: string,
    idempotencyKey: string | undefined
  ): Promise<ApiResult<z.infer<typeof paymentSchema>>> {
    const result = await this.request(
      decoded,
      'capture',
      `/v2/payments/authorizations/${encodeURIComponent(authorizationId)}/capture`,
      { amount: money(amount, currency), final_capture: true },
      paymentSchema,
      idempotencyKey
    );
    if (result.data.status === 'DECLINED' || result.data.status === 'FAILED') {
      throw new DeclineError(result.data.status, 'DECLINED', `PayPal declined capture ${result.data.id}`);
    }
    return result;
  }

  /** Releases the hold left by a sale whose capture half failed. Failures are logged, not thrown. */
  private async voidAuthorization(decoded: RestConfiguration, authorizationId: string): Promise<void> {
    try {
      await this.request(
        decoded,
        'void',
        `/v2/payments/authorizations/${encodeURIComponent(authorizationId)}/void`,
        {},
        voidSchema
      );
      logger.warn('Voided PayPal authorization after a failed capture', { authorizationId });
    } catch (err) {
      logger.error('PayPal authorization left open after a failed capture', { authorizationId, err });
    }
  }

  /** A fresh client-credentials token for this call. */
  private async accessToken(decoded: RestConfiguration): Promise<string> {
    const { client, secret } = decoded.credentials;
    const response = await providerFetch({
      provider: 'PAYPAL_REST',
      operation: 'oauth',
      url: `${API_HOSTS[decoded.environment]}/v1/oauth2/token`,
      headers: {
        Authorization: `Basic ${Buffer.from(`${client}:${secret}`).toString('base64')}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: 'grant_type=client_credentials',
      timeoutMs: this.timeoutMs,
    });
    const body = parseJson(response.body);
    if (response.status === 401 || response.status === 403) {
      throw new TransientError('authentication', 'PayPal rejected the configured client credentials', 'PAYPAL_REST');
    }
    if (!response.ok) throw this.translateFailure('oauth', response.status, body, undefined);

    const token = tokenSchema.safeParse(body);
    if (!token.success) {
      throw protocolError('PAYPAL_REST', 'oauth', 'Token response has no access_token', { status: response.status });
    }
    return token.data.access_token;
  }

  private async request<T>(
    decoded: RestConfiguration,
    operation: string,
    path: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    idempotencyKey?: string
  ): Promise<ApiResult<T>> {
    const accessToken = await this.accessToken(decoded);
    const response = await providerFetch({
      provider: 'PAYPAL_REST',
      operation,
      url: `${API_HOSTS[decoded.environment]}${path}`,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'PayPal-Request-Id': idempotencyKey ? `${idempotencyKey}:${operation}` : uuidv4(),
      },
      body: JSON.stringify(payload),
      timeoutMs: this.timeoutMs,
    });
    const debugId = response.headers.get('paypal-debug-id') ?? undefined;
    const body = parseJson(response.body);

    if (!response.ok) throw this.translateFailure(operation, response.status, body, debugId);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw protocolError('PAYPAL_REST', operation, 'Response does not match the expected shape', {
        status: response.status,
        debugId,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    return { data: parsed.data, debugId };
  }

  private translateFailure(operation: string, status: number, body: unknown, debugId: string | undefined): PaymentError {
    const parsed = errorSchema.safeParse(body);
    const error: PaypalErrorBody = parsed.success ? parsed.data : {};
    const issue = error.details?.[0]?.issue ?? error.name ?? 'UNKNOWN';
    const message = error.details?.[0]?.description ?? error.message ?? `PayPal ${operation} returned HTTP ${status}`;
    logger.warn('PayPal call failed', { operation, status, issue, debugId: debugId ?? error.debug_id });

    if (status === 401) return new TransientError('authentication', `PayPal ${operation} was not authorized`, 'PAYPAL_REST');
    if (status === 429) return new TransientError('rate_limited', `PayPal ${operation} was rate limited`, 'PAYPAL_REST');
    if (status >= 500) return new TransientError('unavailable', `PayPal ${operation} returned HTTP ${status}`, 'PAYPAL_REST');

    const category = DECLINE_ISSUES[issue];
    if (category) return new DeclineError(issue, category, message);
    const validation = VALIDATION_ISSUES[issue];
    if (validation) return new ValidationError(validation, message);
    if (status >= 400) {
      return new ValidationError('provider_rejected', message, { messageKey: 'payment.error.validation.generic' });
    }
    return protocolError('PAYPAL_REST', operation, `Unexpected HTTP ${status}`, { debugId });
  }
}

export function createPaypalRestAdapter(options?: PaypalRestAdapterOptions): PaypalRestAdapter {
  return new PaypalRestAdapter(options);
}
