/**
 * One adapter per ProviderKind, built with shared transport options.
 */

import type { GatewayRegistry, PaymentGatewayPort } from '../ports/paymentGateway';
import type { ProviderKind } from '../types/transaction';
import type { BraintreeClientFactory } from './braintreeAdapter';
import { createBraintreeAdapter } from './braintreeAdapter';
import { createPaypalExpressAdapter } from './paypalExpressAdapter';
import { createPaypalRestAdapter } from './paypalRestAdapter';
import type { StripeClientFactory } from './stripeAdapter';
import { createStripeAdapter } from './stripeAdapter';

export interface GatewayRegistryOptions {
  timeoutMs?: number;
  braintreeClientFactory?: BraintreeClientFactory;
  stripeClientFactory?: StripeClientFactory;
}

function buildGateway(kind: ProviderKind, options: GatewayRegistryOptions): PaymentGatewayPort {
  const { timeoutMs } = options;
  switch (kind) {
    case 'BRAINTREE':
      return createBraintreeAdapter({ timeoutMs, clientFactory: options.braintreeClientFactory });
    case 'STRIPE':
      return createStripeAdapter({ timeoutMs, clientFactory: options.stripeClientFactory });
    case 'PAYPAL_EXPRESS':
      return createPaypalExpressAdapter({ timeoutMs });
    case 'PAYPAL_REST':
      return createPaypalRestAdapter({ timeoutMs });
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unhandled provider kind: ${String(unknownKind)}`);
    }
  }
}

/** Adapters are created on first use and reused afterwards. */
export function createGatewayRegistry(options: GatewayRegistryOptions = {}): GatewayRegistry {
  const gateways = new Map<ProviderKind, PaymentGatewayPort>();
  return (kind) => {
    let gateway = gateways.get(kind);
    if (!gateway) {
      gateway = buildGateway(kind, options);
      gateways.set(kind, gateway);
    }
    return gateway;
  };
}

const defaultRegistry = createGatewayRegistry();

export function resolveGateway(kind: ProviderKind): PaymentGatewayPort {
  return defaultRegistry(kind);
}
