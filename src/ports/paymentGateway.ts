/**
 * Payment gateway port. Every provider adapter exposes this surface so callers
 * never branch on provider identity.
 */

import type { GatewayConfiguration } from '../domain/configuration';
import type {
  InstrumentInput,
  Money,
  OrderRef,
  PaymentMethodType,
  ProviderKind,
  Transaction,
} from '../types/transaction';

/**
 * Per-call options from the lifecycle driver. `idempotencyKey` names one
 * claimed attempt at a step; adapters whose provider API takes a request key
 * send it, and a retried request with the same key is not executed twice.
 */
export interface GatewayCallOptions {
  idempotencyKey?: string;
}

export interface PaymentGatewayPort {
  readonly kind: ProviderKind;
  readonly paymentMethods: readonly PaymentMethodType[];

  /** Throws ConfigurationError listing every missing or blank field. No network. */
  validateConfiguration(config: GatewayConfiguration): void;

  /** Client-side handshake (client token, wallet redirect). NotSupportedError where there is none. */
  initialize(money: Money, paymentMethod: PaymentMethodType, config: GatewayConfiguration): Promise<Transaction>;

  authorize(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction>;

  /** Settles `order.total` against the AUTHORIZATION_ID of an AUTHORIZE transaction. */
  capture(
    order: OrderRef,
    prior: Transaction,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction>;

  authorizeAndCapture(
    money: Money,
    paymentMethod: PaymentMethodType,
    instrument: InstrumentInput,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction>;

  /**
   * Refunds against the GATEWAY_TRANSACTION_ID of a CAPTURE or AUTHORIZE_CAPTURE
   * transaction: `amount` when partial, the settled amount otherwise.
   */
  refund(
    partial: boolean,
    order: OrderRef,
    prior: Transaction,
    amount: number,
    config: GatewayConfiguration,
    options?: GatewayCallOptions
  ): Promise<Transaction>;
}

/** Resolves the adapter for a provider; the lifecycle driver never branches on provider identity. */
export type GatewayRegistry = (kind: ProviderKind) => PaymentGatewayPort;
