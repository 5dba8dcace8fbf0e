import { describe, it, expect } from 'vitest';
import { translateStripeError } from '../../src/adapters/stripeErrors';
import {
  DeclineError,
  NotSupportedError,
  ProtocolError,
  TransientError,
  ValidationError,
} from '../../src/domain/errors';

function stripeError(type: string, props: { message?: string; code?: string; decline_code?: string } = {}): Error {
  return Object.assign(new Error(props.message ?? 'Stripe failure'), { type, ...props });
}

describe('translateStripeError', () => {
  it.each([
    ['card_declined', undefined, 'DECLINED', 'card_declined'],
    ['card_declined', 'insufficient_funds', 'INSUFFICIENT_FUNDS', 'insufficient_funds'],
    ['card_declined', 'generic_decline', 'DECLINED', 'generic_decline'],
    ['incorrect_cvc', undefined, 'INVALID_CVC', 'incorrect_cvc'],
    ['invalid_cvc', undefined, 'INVALID_CVC', 'invalid_cvc'],
    ['expired_card', undefined, 'EXPIRED', 'expired_card'],
    ['incorrect_number', undefined, 'INVALID_NUMBER', 'incorrect_number'],
    ['invalid_expiry_year', undefined, 'INVALID_EXPIRY', 'invalid_expiry_year'],
    ['incorrect_zip', undefined, 'INVALID_ZIP', 'incorrect_zip'],
  ])('card error %s / %s is a %s decline', (code, declineCode, category, providerCode) => {
    const err = translateStripeError(
      stripeError('StripeCardError', { code, decline_code: declineCode, message: 'Your card was declined.' }),
      'authorize'
    );
    expect(err).toBeInstanceOf(DeclineError);
    expect(err.toJSON()).toEqual({
      kind: 'DECLINE',
      code: 'payment_declined',
      messageKey: `payment.decline.${category.toLowerCase()}`,
      message: 'Your card was declined.',
      category,
      providerCode,
    });
    expect(err.retryable).toBe(false);
  });

  it('treats processing errors on the card as transient', () => {
    const err = translateStripeError(stripeError('StripeCardError', { code: 'processing_error' }), 'authorize');
    expect(err).toBeInstanceOf(TransientError);
    expect(err.code).toBe('unavailable');
    expect(err.retryable).toBe(true);
  });

  it('falls back to a generic validation error for unmapped card codes', () => {
    const err = translateStripeError(stripeError('StripeCardError', { code: 'brand_new_code' }), 'authorize');
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.code).toBe('provider_rejected');
    expect(err.messageKey).toBe('payment.error.validation.generic');
  });

  it('maps invalid request codes it knows', () => {
    const err = translateStripeError(
      stripeError('StripeInvalidRequestError', { code: 'charge_already_refunded' }),
      'refund'
    );
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.code).toBe('already_refunded');
    expect(err.messageKey).toBe('payment.error.validation.already_refunded');
  });

  it.each([
    ['StripeConnectionError', 'network'],
    ['StripeAPIError', 'unavailable'],
    ['StripeRateLimitError', 'rate_limited'],
    ['StripeAuthenticationError', 'authentication'],
    ['StripePermissionError', 'authentication'],
  ])('%s is transient (%s)', (type, code) => {
    const err = translateStripeError(stripeError(type), 'capture');
    expect(err).toBeInstanceOf(TransientError);
    expect(err.code).toBe(code);
  });

  it('does not echo the API key on authentication failures', () => {
    const err = translateStripeError(
      stripeError('StripeAuthenticationError', { message: 'Invalid API Key provided: test-secret' }),
      'capture'
    );
    expect(err.message).toBe('Stripe rejected the configured API key');
  });

  it('classifies anything else as a protocol error', () => {
    expect(translateStripeError(new Error('boom'), 'capture')).toBeInstanceOf(ProtocolError);
    expect(translateStripeError(stripeError('StripeSignatureVerificationError'), 'capture')).toBeInstanceOf(
      ProtocolError
    );
  });

  it('passes payment errors through unchanged', () => {
    const original = new NotSupportedError('STRIPE', 'initialize');
    expect(translateStripeError(original, 'initialize')).toBe(original);
  });
});
