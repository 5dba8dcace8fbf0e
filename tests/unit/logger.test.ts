import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, redact } from '../../src/lib/logger';

describe('logger', () => {
  describe('redact', () => {
    it('masks credential-like string fields', () => {
      expect(
        redact({
          secretKey: 'test-secret',
          private_key: 'test-secret',
          pwd: 'test-password',
          Authorization: 'Bearer test-token',
          apiKey: 'test-key',
          orderId: 'order-1',
          amount: 20,
        })
      ).toEqual({
        secretKey: '[REDACTED]',
        private_key: '[REDACTED]',
        pwd: '[REDACTED]',
        Authorization: '[REDACTED]',
        apiKey: '[REDACTED]',
        orderId: 'order-1',
        amount: 20,
      });
    });

    it('masks nested fields such as payment tokens in a traced event', () => {
      expect(
        redact({
          event: {
            action: 'authorize',
            instrument: { kind: 'token', token: 'tok_test' },
            history: [{ details: { CLIENT_TOKEN: 'client-token', AUTHORIZATION_ID: 'auth_1' } }],
          },
        })
      ).toEqual({
        event: {
          action: 'authorize',
          instrument: { kind: 'token', token: '[REDACTED]' },
          history: [{ details: { CLIENT_TOKEN: '[REDACTED]', AUTHORIZATION_ID: 'auth_1' } }],
        },
      });
    });

    it('reduces errors to name and message', () => {
      const err = new TypeError('fetch failed');
      expect(redact({ err })).toEqual({ err: { name: 'TypeError', message: 'fetch failed' } });
    });
  });

  describe('levels', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    beforeEach(() => {
      vi.clearAllMocks();
    });

    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('writes one JSON line per call to the console method for its level', () => {
      vi.stubEnv('LOG_LEVEL', 'info');
      logger.info('Payment step completed', { orderId: 'order-1', step: 'CAPTURE' });
      logger.warn('PayPal call failed', { operation: 'DoCapture' });
      logger.error('Unexpected provider response', { provider: 'STRIPE', signature: 'test-signature' });

      expect(info).toHaveBeenCalledWith('{"level":"INFO","message":"Payment step completed","orderId":"order-1","step":"CAPTURE"}');
      expect(warn).toHaveBeenCalledWith('{"level":"WARN","message":"PayPal call failed","operation":"DoCapture"}');
      expect(error).toHaveBeenCalledWith(
        '{"level":"ERROR","message":"Unexpected provider response","provider":"STRIPE","signature":"[REDACTED]"}'
      );
    });

    it('drops lines below the configured level', () => {
      vi.stubEnv('LOG_LEVEL', 'warn');
      logger.debug('ignored');
      logger.info('ignored');
      logger.warn('kept');
      expect(info).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('enables trace lines on request', () => {
      vi.stubEnv('LOG_LEVEL', 'trace');
      logger.trace('Provider request', { provider: 'PAYPAL_REST' });
      expect(info).toHaveBeenCalledWith('{"level":"TRACE","message":"Provider request","provider":"PAYPAL_REST"}');
    });

    it('is muted when silent', () => {
      vi.stubEnv('LOG_LEVEL', 'silent');
      logger.error('nothing');
      expect(error).not.toHaveBeenCalled();
    });
  });
});
