/**
 * Payment service Lambda, invoked directly (no HTTP). The payload is
 * { action, provider, order, ... }; the response is { success, data } or
 * { success, error } with the error's kind, code and message key.
 */

import { z } from 'zod';
import { DynamoTransactionStore } from '../adapters/dynamoTransactionStore';
import { createGatewayRegistry } from '../adapters/gatewayRegistry';
import type { GatewayConfiguration } from '../domain/configuration';
import type { PaymentErrorBody } from '../domain/errors';
import { ValidationError, isPaymentError } from '../domain/errors';
import { PaymentLifecycle } from '../domain/lifecycle/lifecycle';
import type { GatewayRegistry } from '../ports/paymentGateway';
import { gatewayConfigurationFor, getConfig } from '../lib/config';
import { logger } from '../lib/logger';
import type { MiddyContext } from '../lib/middyMiddlewares';
import { withMiddy } from '../lib/middyMiddlewares';
import type { ProviderKind, Transaction } from '../types/transaction';
import { PAYMENT_METHOD_TYPES, PROVIDER_KINDS } from '../types/transaction';

const orderSchema = z.object({
  id: z.string().trim().min(1),
  total: z.number().finite().nonnegative(),
  currency: z.string().trim().min(1),
});

const instrumentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('token'), token: z.string() }),
  z.object({ kind: z.literal('redirect'), redirectToken: z.string(), payerId: z.string().optional() }),
]);

const provider = z.enum(PROVIDER_KINDS);
const paymentMethod = z.enum(PAYMENT_METHOD_TYPES);

export const paymentServicePayloadSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('validateConfiguration'), provider }),
  z.object({ action: z.literal('initialize'), provider, order: orderSchema, paymentMethod }),
  z.object({
    action: z.literal('authorize'),
    provider,
    order: orderSchema,
    paymentMethod,
    instrument: instrumentSchema,
  }),
  z.object({
    action: z.literal('authorizeAndCapture'),
    provider,
    order: orderSchema,
    paymentMethod,
    instrument: instrumentSchema,
  }),
  z.object({ action: z.literal('capture'), provider, order: orderSchema }),
  z.object({
    action: z.literal('refund'),
    provider,
    order: orderSchema,
    partial: z.boolean(),
    amount: z.number().optional(),
  }),
  z.object({ action: z.literal('history'), orderId: z.string().trim().min(1) }),
]);

export type PaymentServicePayload = z.infer<typeof paymentServicePayloadSchema>;

export interface InternalErrorBody {
  kind: 'INTERNAL';
  code: 'internal_error';
  messageKey: 'payment.error.internal';
  message: string;
}

export type PaymentServiceResponse =
  | { success: true; data: Transaction | Transaction[] | { valid: true } }
  | { success: false; error: PaymentErrorBody | InternalErrorBody };

export interface PaymentServiceDeps {
  lifecycle: () => PaymentLifecycle;
  gatewayConfiguration: (kind: ProviderKind) => GatewayConfiguration;
  registry: GatewayRegistry;
}

function defaultDeps(): PaymentServiceDeps {
  let lifecycle: PaymentLifecycle | undefined;
  let registry: GatewayRegistry | undefined;
  const gateways = () => {
    registry ??= createGatewayRegistry({ timeoutMs: getConfig().providerTimeoutMs });
    return registry;
  };
  return {
    lifecycle: () => {
      if (!lifecycle) {
        const config = getConfig();
        const store = new DynamoTransactionStore({
          tableName: config.transactionsTableName,
          appendMaxRetries: config.transactionAppendMaxRetries,
          claimTtlSeconds: config.stepClaimTtlSec,
        });
        lifecycle = new PaymentLifecycle({ store, gateways: gateways() });
      }
      return lifecycle;
    },
    gatewayConfiguration: (kind) => gatewayConfigurationFor(getConfig(), kind),
    registry: (kind) => gateways()(kind),
  };
}

function invalidPayload(error: z.ZodError): ValidationError {
  const [issue] = error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  return new ValidationError('invalid_request', issue?.message ?? 'Invalid request payload', { field });
}

async function dispatch(payload: PaymentServicePayload, deps: PaymentServiceDeps): Promise<PaymentServiceResponse> {
  if (payload.action === 'history') {
    return { success: true, data: await deps.lifecycle().history(payload.orderId) };
  }

  const config = deps.gatewayConfiguration(payload.provider);
  switch (payload.action) {
    case 'validateConfiguration':
      deps.registry(payload.provider).validateConfiguration(config);
      return { success: true, data: { valid: true } };
    case 'initialize':
      return { success: true, data: await deps.lifecycle().initialize(payload.order, payload.paymentMethod, config) };
    case 'authorize':
      return {
        success: true,
        data: await deps.lifecycle().authorize(payload.order, payload.paymentMethod, payload.instrument, config),
      };
    case 'authorizeAndCapture':
      return {
        success: true,
        data: await deps
          .lifecycle()
          .authorizeAndCapture(payload.order, payload.paymentMethod, payload.instrument, config),
      };
    case 'capture':
      return { success: true, data: await deps.lifecycle().capture(payload.order, config) };
    case 'refund':
      return {
        success: true,
        data: await deps.lifecycle().refund(payload.order, { partial: payload.partial, amount: payload.amount }, config),
      };
  }
}

export function createPaymentService(deps: PaymentServiceDeps = defaultDeps()) {
  return withMiddy<unknown, PaymentServiceResponse>(async (event: unknown, context: MiddyContext) => {
    const parsed = paymentServicePayloadSchema.safeParse(event);
    try {
      if (!parsed.success) throw invalidPayload(parsed.error);
      return await dispatch(parsed.data, deps);
    } catch (err) {
      if (isPaymentError(err)) {
        logger.warn('Payment action failed', {
          action: parsed.success ? parsed.data.action : undefined,
          kind: err.kind,
          code: err.code,
          correlationId: context.correlationId,
        });
        return { success: false, error: err.toJSON() };
      }
      logger.error('Payment action crashed', { err, correlationId: context.correlationId });
      return {
        success: false,
        error: {
          kind: 'INTERNAL',
          code: 'internal_error',
          messageKey: 'payment.error.internal',
          message: 'Internal error',
        },
      };
    }
  }, 'paymentService');
}

export const handler = createPaymentService();
