import { describe, it, expect } from 'vitest';
import {
  decodeConfiguration,
  loadGatewayConfiguration,
  parseEnvironment,
} from '../../src/domain/configuration';
import type { GatewayConfiguration } from '../../src/domain/configuration';
import { ConfigurationError } from '../../src/domain/errors';
import { braintreeConfiguration } from '../../src/adapters/braintreeAdapter';
import { stripeConfiguration } from '../../src/adapters/stripeAdapter';
import { paypalExpressConfiguration } from '../../src/adapters/paypalExpressAdapter';
import { paypalRestConfiguration } from '../../src/adapters/paypalRestAdapter';

function fieldsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.fields;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('gateway configuration', () => {
  describe('decodeConfiguration', () => {
    it('reports every missing credential at once', () => {
      const config: GatewayConfiguration = { provider: 'BRAINTREE', environment: 'SANDBOX', credentials: {} };
      expect(fieldsOf(() => decodeConfiguration(braintreeConfiguration, config))).toEqual([
        'merchant_id',
        'public_key',
        'private_key',
        'tokenization_key',
      ]);
    });

    it('treats blank values as missing', () => {
      const config: GatewayConfiguration = {
        provider: 'BRAINTREE',
        environment: 'SANDBOX',
        credentials: { merchant_id: '   ', public_key: 'test-public', private_key: '', tokenization_key: 'test-tk' },
      };
      expect(fieldsOf(() => decodeConfiguration(braintreeConfiguration, config))).toEqual([
        'merchant_id',
        'private_key',
      ]);
    });

    it('returns trimmed typed credentials when complete', () => {
      const decoded = decodeConfiguration(stripeConfiguration, {
        provider: 'STRIPE',
        environment: 'PRODUCTION',
        credentials: { secretKey: ' test-secret ', publishableKey: 'test-publishable' },
      });
      expect(decoded).toEqual({
        environment: 'PRODUCTION',
        credentials: { secretKey: 'test-secret', publishableKey: 'test-publishable' },
        settings: {},
      });
    });

    it('names a provider mismatch alongside the missing keys', () => {
      const config: GatewayConfiguration = { provider: 'BRAINTREE', environment: 'SANDBOX', credentials: {} };
      expect(fieldsOf(() => decodeConfiguration(stripeConfiguration, config))).toEqual([
        'provider',
        'secretKey',
        'publishableKey',
      ]);
    });

    it('validates settings as well as credentials', () => {
      const config: GatewayConfiguration = {
        provider: 'PAYPAL_EXPRESS',
        environment: 'SANDBOX',
        credentials: { api: 'test-user', pwd: 'test-password', signature: 'test-signature' },
        settings: { returnUrl: 'not-a-url' },
      };
      expect(fieldsOf(() => decodeConfiguration(paypalExpressConfiguration, config))).toEqual([
        'returnUrl',
        'cancelUrl',
      ]);
    });

    it('leaves optional settings optional', () => {
      const decoded = decodeConfiguration(paypalRestConfiguration, {
        provider: 'PAYPAL_REST',
        environment: 'SANDBOX',
        credentials: { client: 'test-client', secret: 'test-secret' },
      });
      expect(decoded.settings).toEqual({});
    });

    it('keeps credential values out of the message', () => {
      const config: GatewayConfiguration = {
        provider: 'BRAINTREE',
        environment: 'SANDBOX',
        credentials: { private_key: 'test-secret' },
      };
      try {
        decodeConfiguration(braintreeConfiguration, config);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        expect((err as ConfigurationError).message).toBe(
          'BRAINTREE configuration is missing or has invalid values for: merchant_id, public_key, tokenization_key'
        );
        expect((err as ConfigurationError).toJSON()).toEqual({
          kind: 'CONFIGURATION',
          code: 'configuration_invalid',
          messageKey: 'payment.error.configuration',
          message:
            'BRAINTREE configuration is missing or has invalid values for: merchant_id, public_key, tokenization_key',
          fields: ['merchant_id', 'public_key', 'tokenization_key'],
        });
      }
    });
  });

  describe('parseEnvironment', () => {
    it('accepts the canonical tokens', () => {
      expect(parseEnvironment('SANDBOX')).toBe('SANDBOX');
      expect(parseEnvironment('PRODUCTION')).toBe('PRODUCTION');
    });

    it.each(['production', 'Production', ' PRODUCTION', 'LIVE', '', undefined])(
      'rejects %s instead of guessing',
      (token) => {
        expect(fieldsOf(() => parseEnvironment(token))).toEqual(['environment']);
      }
    );
  });

  describe('loadGatewayConfiguration', () => {
    it('returns a frozen configuration', () => {
      const config = loadGatewayConfiguration({
        provider: 'STRIPE',
        environment: 'SANDBOX',
        credentials: { secretKey: 'test-secret', publishableKey: 'test-publishable' },
      });
      expect(config).toEqual({
        provider: 'STRIPE',
        environment: 'SANDBOX',
        credentials: { secretKey: 'test-secret', publishableKey: 'test-publishable' },
      });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.credentials)).toBe(true);
    });

    it('rejects a lower-case environment', () => {
      expect(fieldsOf(() => loadGatewayConfiguration({ provider: 'STRIPE', environment: 'sandbox' }))).toEqual([
        'environment',
      ]);
    });

    it('rejects an unknown provider', () => {
      expect(fieldsOf(() => loadGatewayConfiguration({ provider: 'ACME', environment: 'SANDBOX' }))).toEqual([
        'provider',
      ]);
    });
  });
});
