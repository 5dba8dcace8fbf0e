export * from './types/transaction';
export * from './domain/errors';
export * from './domain/money';
export * from './domain/configuration';
export * from './domain/transactions';
export { PaymentLifecycle } from './domain/lifecycle/lifecycle';
export type { PaymentLifecycleDeps, RefundRequest } from './domain/lifecycle/lifecycle';
export { assertTransition } from './domain/lifecycle/stateMachine';
export type { GatewayRegistry, PaymentGatewayPort } from './ports/paymentGateway';
export type { TransactionStorePort } from './ports/transactionStore';
export { createGatewayRegistry, resolveGateway } from './adapters/gatewayRegistry';
export type { GatewayRegistryOptions } from './adapters/gatewayRegistry';
export { BraintreeAdapter, braintreeConfiguration, createBraintreeAdapter } from './adapters/braintreeAdapter';
export { StripeAdapter, createStripeAdapter, stripeConfiguration } from './adapters/stripeAdapter';
export {
  PaypalExpressAdapter,
  createPaypalExpressAdapter,
  paypalExpressConfiguration,
} from './adapters/paypalExpressAdapter';
export { PaypalRestAdapter, createPaypalRestAdapter, paypalRestConfiguration } from './adapters/paypalRestAdapter';
export { DynamoTransactionStore } from './adapters/dynamoTransactionStore';
export type { DynamoTransactionStoreConfig } from './adapters/dynamoTransactionStore';
