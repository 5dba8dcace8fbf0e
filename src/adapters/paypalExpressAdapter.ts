/**
 * PayPal Express Checkout adapter over the SOAP merchant API.
 *
 * INIT (SetExpressCheckout) returns a checkout token the buyer approves on
 * PayPal. AUTHORIZE / AUTHORIZE_CAPTURE read the payer from that token
 * (GetExpressCheckoutDetails) and then submit DoExpressCheckoutPayment; the
 * resulting transaction id, not the checkout token, is what DoCapture and
 * RefundTransaction work on.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
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
import type { DecodedConfiguration, GatewayConfiguration, GatewayEnvironment } from '../domain/configuration';
import { decodeConfiguration, defineGatewaySchema, requiredString } from '../domain/configuration';
import type { DeclineCategory, PaymentError, TransientCode } from '../domain/errors';
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

export const paypalExpressConfiguration = defineGatewaySchema({
  provider: 'PAYPAL_EXPRESS',
  credentials: z.object({
    api: requiredString,
    pwd: requiredString,
    signature: requiredString,
  }),
  settings: z.object({
    returnUrl: requiredString.url(),
    cancelUrl: requiredString.url(),
  }),
});

type ExpressConfiguration = DecodedConfiguration<
  z.infer<typeof paypalExpressConfiguration.credentials>,
  z.infer<typeof paypalExpressConfiguration.settings>
>;

const API_VERSION = '204.0';

const SOAP_ENDPOINTS: Readonly<Record<GatewayEnvironment, string>> = {
  SANDBOX: 'https://api-3t.sandbox.paypal.com/2.0/',
  PRODUCTION: 'https://api-3t.paypal.com/2.0/',
};

const CHECKOUT_URLS: Readonly<Record<GatewayEnvironment, string>> = {
  SANDBOX: 'https://www.sandbox.paypal.com/cgi-bin/webscr?cmd=_express-checkout&token=',
  PRODUCTION: 'https://www.paypal.com/cgi-bin/webscr?cmd=_express-checkout&token=',
};

/** Funding failures PayPal asks the buyer to resolve. */
const DECLINE_CODES: Readonly<Record<string, DeclineCategory>> = {
  '10417': 'DECLINED',
  '10422': 'DECLINED',
  '10486': 'DECLINED',
  '10485': 'DECLINED',
  '15005': 'DECLINED',
  '15006': 'DECLINED',
  '15007': 'EXPIRED',
  '10762': 'INVALID_CVC',
};

const VALIDATION_CODES: Readonly<Record<string, string>> = {
  '10004': 'amount_invalid',
  '10009': 'refund_refused',
  '10410': 'redirect_token_invalid',
  '10411': 'redirect_token_expired',
  '10412': 'duplicate_payment',
  '10415': 'redirect_token_used',
  '10600': 'authorization_voided',
  '10601': 'authorization_expired',
  '10602': 'authorization_completed',
  '10610': 'amount_exceeds_authorization',
};

const TRANSIENT_CODES: Readonly<Record<string, TransientCode>> = {
  '10001': 'unavailable',
  '10002': 'authentication',
  '10101': 'unavailable',
  '11612': 'rate_limited',
};

const SUCCESS_ACKS = new Set(['Success', 'SuccessWithWarning']);

const builder = new XMLBuilder({ ignoreAttributes: false, attributeNamePrefix: '@_', suppressEmptyNode: true });
const parser = new XMLParser({ ignoreAttributes: true, removeNSPrefix: true, parseTagValue: false, trimValues: true });

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walk element names; repeated elements resolve to their first occurrence. */
function child(node: unknown, ...path: string[]): unknown {
  let current: unknown = node;
  for (const name of path) {
    const here = Array.isArray(current) ? current[0] : current;
    if (!isNode(here)) return undefined;
    current = here[name];
  }
  return Array.isArray(current) ? current[0] : current;
}

function text(node: unknown, ...path: string[]): string | undefined {
  const value = child(node, ...path);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function amountNode(amount: number, currency: string): XmlNode {
  return { '@_currencyID': currency, '#text': formatAmount(amount, currency) };
}

export interface PaypalExpressAdapterOptions {
  timeoutMs?: number;
}

export class PaypalExpressAdapter implements PaymentGatewayPort {
  readonly kind = 'PAYPAL_EXPRESS';
  readonly paymentMethods: readonly PaymentMethodType[] = ['WALLET'];

  private readonly timeoutMs: number;

  constructor(options: PaypalExpressAdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  validateConfiguration(config: GatewayConfiguration): void {
    decodeConfiguration(paypalExpressConfiguration, config);
  }

  async initialize(money: Money, paymentMethod: PaymentMethodType, config: GatewayConfiguration): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalExpressConfiguration, config);
    assertPaymentMethod('PAYPAL_EXPRESS', this.paymentMethods, paymentMethod);
    const currency = normalizeCurrency(money.currency);

    // Authorization here still allows a Sale on DoExpressCheckoutPayment.
    const response = await this.call(decoded, 'SetExpressCheckout', {
      'ebl:SetExpressCheckoutRequestDetails': {
        'ebl:ReturnURL': decoded.settings.returnUrl,
        'ebl:CancelURL': decoded.settings.cancelUrl,
        'ebl:PaymentDetails': {
          'ebl:OrderTotal': amountNode(money.amount, currency),
          'ebl:PaymentAction': 'Authorization',
        },
      },
    });
    const token = text(response, 'Token');
    if (!token) {
      throw protocolError('PAYPAL_EXPRESS', 'SetExpressCheckout', 'Success without a checkout token', {
        correlationId: text(response, 'CorrelationID'),
      });
    }
    return createTransaction({
      type: 'INIT',
      provider: 'PAYPAL_EXPRESS',
      paymentMethod,
      amount: money.amount,
      currency,
      details: {
        [DetailKeys.REDIRECT_TOKEN]: token,
        [DetailKeys.REDIRECT_URL]: `${CHECKOUT_URLS[decoded.environment]}${encodeURIComponent(token)}`,
        [DetailKeys.CORRELATION_ID]: text(response, 'CorrelationID'),
      },
    });
  }

  async authorize(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    return this.checkout('AUTHORIZE', money, paymentMethod, instrument, config);
  }

  async authorizeAndCapture(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    return this.checkout('AUTHORIZE_CAPTURE', money, paymentMethod, instrument, config);
  }

  async capture(order: OrderRef, prior: Transaction, config: GatewayConfiguration): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalExpressConfiguration, config);
    assertCapturable(order, prior);
    const authorizationId = requireDetail(prior, DetailKeys.AUTHORIZATION_ID);
    const currency = normalizeCurrency(order.currency);

    const response = await this.call(decoded, 'DoCapture', {
      'urn:AuthorizationID': authorizationId,
      'urn:Amount': amountNode(order.total, currency),
      'urn:CompleteType': 'Complete',
    });
    const transactionId = text(response, 'DoCaptureResponseDetails', 'PaymentInfo', 'TransactionID');
    if (!transactionId) {
      throw protocolError('PAYPAL_EXPRESS', 'DoCapture', 'Success without a capture transaction id', {
        correlationId: text(response, 'CorrelationID'),
      });
    }
    logger.info('PayPal capture completed', { transactionId, orderId: order.id });
    return createTransaction({
      type: 'CAPTURE',
      provider: 'PAYPAL_EXPRESS',
      paymentMethod: prior.paymentMethod,
      amount: order.total,
      currency,
      details: {
        [DetailKeys.AUTHORIZATION_ID]: authorizationId,
        [DetailKeys.GATEWAY_TRANSACTION_ID]: transactionId,
        [DetailKeys.PROCESSOR_STATUS]: text(response, 'DoCaptureResponseDetails', 'PaymentInfo', 'PaymentStatus'),
        [DetailKeys.CORRELATION_ID]: text(response, 'CorrelationID'),
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
    const decoded = decodeConfiguration(paypalExpressConfiguration, config);
    const refundAmount = resolveRefundAmount(partial, order, prior, amount);
    const transactionId = requireDetail(prior, DetailKeys.GATEWAY_TRANSACTION_ID);

    const response = await this.call(decoded, 'RefundTransaction', {
      'urn:TransactionID': transactionId,
      'urn:RefundType': partial ? 'Partial' : 'Full',
      ...(partial ? { 'urn:Amount': amountNode(refundAmount, prior.currency) } : {}),
    });
    const refundId = text(response, 'RefundTransactionID');
    if (!refundId) {
      throw protocolError('PAYPAL_EXPRESS', 'RefundTransaction', 'Success without a refund transaction id', {
        correlationId: text(response, 'CorrelationID'),
      });
    }
    logger.info('PayPal refund completed', { refundId, orderId: order.id, partial });
    return createTransaction({
      type: 'REFUND',
      provider: 'PAYPAL_EXPRESS',
      paymentMethod: prior.paymentMethod,
      amount: refundAmount,
      currency: prior.currency,
      details: {
        [DetailKeys.GATEWAY_TRANSACTION_ID]: transactionId,
        [DetailKeys.REFUND_ID]: refundId,
        [DetailKeys.PROCESSOR_STATUS]: text(response, 'RefundInfo', 'RefundStatus'),
        [DetailKeys.CORRELATION_ID]: text(response, 'CorrelationID'),
      },
    });
  }

  private async checkout(
    type: Extract<TransactionType, 'AUTHORIZE' | 'AUTHORIZE_CAPTURE'>,
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration
  ): Promise<Transaction> {
    const decoded = decodeConfiguration(paypalExpressConfiguration, config);
    assertPaymentMethod('PAYPAL_EXPRESS', this.paymentMethods, paymentMethod);
    const { token, payerId: expectedPayer } = requireRedirectToken(instrument);
    const currency = normalizeCurrency(money.currency);

    const checkoutDetails = await this.call(decoded, 'GetExpressCheckoutDetails', { 'urn:Token': token });
    const payerId = text(checkoutDetails, 'GetExpressCheckoutDetailsResponseDetails', 'PayerInfo', 'PayerID');
    if (!payerId) {
      throw new ValidationError('payer_not_approved', 'The buyer has not approved the PayPal checkout yet', {
        field: 'redirectToken',
      });
    }
    if (expectedPayer !== undefined && expectedPayer !== payerId) {
      throw new ValidationError('payer_mismatch', 'The PayPal checkout was approved by a different payer', {
        field: 'payerId',
      });
    }

    const payment = await this.call(decoded, 'DoExpressCheckoutPayment', {
      'ebl:DoExpressCheckoutPaymentRequestDetails': {
        'ebl:PaymentAction': type === 'AUTHORIZE' ? 'Authorization' : 'Sale',
        'ebl:Token': token,
        'ebl:PayerID': payerId,
        'ebl:PaymentDetails': { 'ebl:OrderTotal': amountNode(money.amount, currency) },
      },
    });
    const transactionId = text(payment, 'DoExpressCheckoutPaymentResponseDetails', 'PaymentInfo', 'TransactionID');
    if (!transactionId) {
      throw protocolError('PAYPAL_EXPRESS', 'DoExpressCheckoutPayment', 'Success without a transaction id', {
        correlationId: text(payment, 'CorrelationID'),
      });
    }

    logger.info('PayPal checkout completed', { transactionId, type });
    return createTransaction({
      type,
      provider: 'PAYPAL_EXPRESS',
      paymentMethod,
      amount: money.amount,
      currency,
      details: {
        [DetailKeys.REDIRECT_TOKEN]: token,
        [DetailKeys.PAYER_ID]: payerId,
        [type === 'AUTHORIZE' ? DetailKeys.AUTHORIZATION_ID : DetailKeys.GATEWAY_TRANSACTION_ID]: transactionId,
        [DetailKeys.PROCESSOR_STATUS]: text(
          payment,
          'DoExpressCheckoutPaymentResponseDetails',
          'PaymentInfo',
          'PaymentStatus'
        ),
        [DetailKeys.CORRELATION_ID]: text(payment, 'CorrelationID'),
      },
    });
  }

  /** POST one SOAP operation and return its `<Operation>Response` element. */
  private async call(decoded: ExpressConfiguration, operation: string, request: XmlNode): Promise<XmlNode> {
    const body = builder.build({
      'soapenv:Envelope': {
        '@_xmlns:soapenv': 'http://schemas.xmlsoap.org/soap/envelope/',
        '@_xmlns:urn': 'urn:ebay:api:PayPalAPI',
        '@_xmlns:ebl': 'urn:ebay:apis:eBLBaseComponents',
        'soapenv:Header': {
          'urn:RequesterCredentials': {
            'ebl:Credentials': {
              'ebl:Username': decoded.credentials.api,
              'ebl:Password': decoded.credentials.pwd,
              'ebl:Signature': decoded.credentials.signature,
            },
          },
        },
        'soapenv:Body': {
          [`urn:${operation}Req`]: {
            [`urn:${operation}Request`]: { 'ebl:Version': API_VERSION, ...request },
          },
        },
      },
    });

    const response = await providerFetch({
      provider: 'PAYPAL_EXPRESS',
      operation,
      url: SOAP_ENDPOINTS[decoded.environment],
      headers: { 'Content-Type': 'text/xml; charset=utf-8', SOAPAction: '""' },
      body,
      timeoutMs: this.timeoutMs,
    });
    let document: unknown;
    try {
      document = parser.parse(response.body);
    } catch (err) {
      if (!response.ok) throw this.httpFailure(operation, response.status);
      throw protocolError('PAYPAL_EXPRESS', operation, 'Response is not XML', { status: response.status, err });
    }

    const fault = child(document, 'Envelope', 'Body', 'Fault');
    if (fault !== undefined) {
      // SOAP faults arrive as HTTP 500; gateway errors above that are outages.
      if (response.status > 500) throw this.httpFailure(operation, response.status);
      throw protocolError('PAYPAL_EXPRESS', operation, `SOAP fault: ${text(fault, 'faultstring') ?? 'unknown'}`, {
        status: response.status,
      });
    }
    const result = child(document, 'Envelope', 'Body', `${operation}Response`);
    if (!isNode(result)) {
      if (!response.ok) throw this.httpFailure(operation, response.status);
      throw protocolError('PAYPAL_EXPRESS', operation, `Missing ${operation}Response element`, {
        status: response.status,
      });
    }

    const ack = text(result, 'Ack');
    if (ack && SUCCESS_ACKS.has(ack)) return result;
    if (!ack) {
      throw protocolError('PAYPAL_EXPRESS', operation, 'Response without Ack', { status: response.status });
    }
    throw this.translateFailure(operation, result);
  }

  private httpFailure(operation: string, status: number): TransientError {
    return new TransientError('unavailable', `PayPal ${operation} returned HTTP ${status}`, 'PAYPAL_EXPRESS');
  }

  private translateFailure(operation: string, result: XmlNode): PaymentError {
    const code = text(result, 'Errors', 'ErrorCode') ?? 'unknown';
    const message =
      text(result, 'Errors', 'LongMessage') ?? text(result, 'Errors', 'ShortMessage') ?? `PayPal ${operation} failed`;
    const correlationId = text(result, 'CorrelationID');
    logger.warn('PayPal call failed', { operation, errorCode: code, correlationId });

    const category = DECLINE_CODES[code];
    if (category) return new DeclineError(code, category, message);
    const transient = TRANSIENT_CODES[code];
    if (transient) return new TransientError(transient, `PayPal ${operation} failed (${code})`, 'PAYPAL_EXPRESS');
    const validation = VALIDATION_CODES[code];
    if (validation) return new ValidationError(validation, message);
    return new ValidationError('provider_error', message, { messageKey: 'payment.error.validation.generic' });
  }
}

export function createPaypalExpressAdapter(options?: PaypalExpressAdapterOptions): PaypalExpressAdapter {
  return new PaypalExpressAdapter(options);
}
