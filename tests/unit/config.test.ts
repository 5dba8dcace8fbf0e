import { describe, it, expect, vi, afterEach } from 'vitest';
import { gatewayConfigurationFor, getConfig, parseGatewayConfig } from '../../src/lib/config';
import { ConfigurationError } from '../../src/domain/errors';

const stripeEntry = {
  environment: 'SANDBOX',
  credentials: { secretKey: 'test-secret', publishableKey: 'test-publishable' },
};

function fieldsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.fields;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('parseGatewayConfig', () => {
    it('decodes one configuration per provider kind', () => {
      const gateways = parseGatewayConfig(JSON.stringify({ STRIPE: stripeEntry }));
      expect(gateways).toEqual({
        STRIPE: {
          provider: 'STRIPE',
          environment: 'SANDBOX',
          credentials: { secretKey: 'test-secret', publishableKey: 'test-publishable' },
        },
      });
      expect(Object.isFrozen(gateways)).toBe(true);
    });

    it('returns the same object for the same value', () => {
      const raw = JSON.stringify({ STRIPE: stripeEntry, PAYPAL_REST: { environment: 'PRODUCTION', credentials: {} } });
      expect(parseGatewayConfig(raw)).toBe(parseGatewayConfig(raw));
    });

    it('treats an empty value as no gateways', () => {
      expect(parseGatewayConfig('')).toEqual({});
    });

    it('rejects malformed JSON without echoing it', () => {
      try {
        parseGatewayConfig('{"STRIPE": {"credentials": {"secretKey": "test-secret"}');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        expect((err as ConfigurationError).fields).toEqual(['GATEWAY_CONFIG']);
        expect((err as ConfigurationError).message).not.toContain('test-secret');
      }
    });

    it('names unknown provider keys', () => {
      expect(fieldsOf(() => parseGatewayConfig(JSON.stringify({ ACME: stripeEntry })))).toEqual(['GATEWAY_CONFIG.ACME']);
    });

    it('rejects an entry with a bad environment token', () => {
      expect(
        fieldsOf(() => parseGatewayConfig(JSON.stringify({ STRIPE: { ...stripeEntry, environment: 'live' } })))
      ).toEqual(['environment']);
    });
  });

  describe('getConfig', () => {
    it('reads the environment with defaults', () => {
      vi.stubEnv('TRANSACTIONS_TABLE', 'Transactions');
      vi.stubEnv('STAGE', 'test');
      vi.stubEnv('PROVIDER_TIMEOUT_MS', '5000');
      vi.stubEnv('STEP_CLAIM_TTL_SEC', 'not-a-number');
      vi.stubEnv('TRANSACTION_APPEND_MAX_RETRIES', '');
      vi.stubEnv('GATEWAY_CONFIG', '');

      expect(getConfig()).toEqual({
        stage: 'test',
        transactionsTableName: 'Transactions',
        providerTimeoutMs: 5000,
        stepClaimTtlSec: 900,
        transactionAppendMaxRetries: 5,
        gateways: {},
      });
    });

    it('requires the table name', () => {
      vi.stubEnv('TRANSACTIONS_TABLE', '');
      expect(fieldsOf(() => getConfig())).toEqual(['TRANSACTIONS_TABLE']);
    });
  });

  it('gatewayConfigurationFor names a missing provider entry', () => {
    vi.stubEnv('TRANSACTIONS_TABLE', 'Transactions');
    vi.stubEnv('GATEWAY_CONFIG', JSON.stringify({ STRIPE: stripeEntry }));
    const config = getConfig();
    expect(gatewayConfigurationFor(config, 'STRIPE').provider).toBe('STRIPE');
    expect(fieldsOf(() => gatewayConfigurationFor(config, 'BRAINTREE'))).toEqual(['GATEWAY_CONFIG.BRAINTREE']);
  });
});
