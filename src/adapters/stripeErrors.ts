/**
 * Stripe error translation into the payment error taxonomy.
 */

import type { DeclineCategory, PaymentError } from '../domain/errors';
import { DeclineError, TransientError, ValidationError, isPaymentError, protocolError } from '../domain/errors';

/** Card error `code` values. */
const CARD_ERROR_CATEGORIES: Readonly<Record<string, DeclineCategory>> = {
  card_declined: 'DECLINED',
  card_decline_rate_limit_exceeded: 'DECLINED',
  insufficient_funds: 'INSUFFICIENT_FUNDS',
  incorrect_number: 'INVALID_NUMBER',
  invalid_number: 'INVALID_NUMBER',
  invalid_expiry_month: 'INVALID_EXPIRY',
  invalid_expiry_year: 'INVALID_EXPIRY',
  expired_card: 'EXPIRED',
  incorrect_cvc: 'INVALID_CVC',
  invalid_cvc: 'INVALID_CVC',
  incorrect_zip: 'INVALID_ZIP',
  postal_code_invalid: 'INVALID_ZIP',
  authentication_required: 'AUTHENTICATION_REQUIRED',
};

/** `decline_code` values that say more than a bare card_declined. */
const DECLINE_CODE_CATEGORIES: Readonly<Record<string, DeclineCategory>> = {
  insufficient_funds: 'INSUFFICIENT_FUNDS',
  withdrawal_count_limit_exceeded: 'INSUFFICIENT_FUNDS',
  expired_card: 'EXPIRED',
  incorrect_cvc: 'INVALID_CVC',
  invalid_cvc: 'INVALID_CVC',
  incorrect_number: 'INVALID_NUMBER',
  invalid_number: 'INVALID_NUMBER',
  invalid_expiry_month: 'INVALID_EXPIRY',
  invalid_expiry_year: 'INVALID_EXPIRY',
  incorrect_zip: 'INVALID_ZIP',
  authentication_required: 'AUTHENTICATION_REQUIRED',
};

/** Invalid-request codes with a dedicated validation code. */
const VALIDATION_CODES: Readonly<Record<string, string>> = {
  amount_too_small: 'amount_too_small',
  amount_too_large: 'amount_too_large',
  invalid_charge_amount: 'amount_invalid',
  missing: 'token_required',
  payment_method_unexpected_state: 'token_invalid',
  resource_missing: 'unknown_reference',
  charge_already_captured: 'already_captured',
  charge_already_refunded: 'already_refunded',
  charge_expired_for_capture: 'authorization_expired',
  payment_intent_unexpected_state: 'invalid_state',
  refund_disputed_payment: 'refund_refused',
};

const TRANSIENT_CARD_CODES = new Set(['processing_error', 'issuer_not_available', 'try_again_later']);

export interface StripeErrorShape {
  type: string;
  message: string;
  code?: string;
  decline_code?: string;
  statusCode?: number;
}

export function isStripeError(err: unknown): err is Error & StripeErrorShape {
  return err instanceof Error && 'type' in err && typeof err.type === 'string' && err.type.startsWith('Stripe');
}

function declineCategory(code: string | undefined, declineCode: string | undefined): DeclineCategory | undefined {
  return (declineCode && DECLINE_CODE_CATEGORIES[declineCode]) || (code && CARD_ERROR_CATEGORIES[code]) || undefined;
}

function genericValidation(code: string | undefined, message: string): ValidationError {
  const mapped = code ? VALIDATION_CODES[code] : undefined;
  if (mapped) return new ValidationError(mapped, message);
  return new ValidationError('provider_rejected', message, { messageKey: 'payment.error.validation.generic' });
}

/**
 * Classify anything the Stripe SDK throws. Card codes without a mapping fall
 * back to a generic validation error.
 */
export function translateStripeError(err: unknown, operation: string): PaymentError {
  if (isPaymentError(err)) return err;
  if (!isStripeError(err)) {
    const reason = err instanceof Error ? err.message : String(err);
    return protocolError('STRIPE', operation, `Unexpected failure: ${reason}`);
  }

  switch (err.type) {
    case 'StripeCardError': {
      if (err.code && TRANSIENT_CARD_CODES.has(err.code)) {
        return new TransientError('unavailable', err.message, 'STRIPE');
      }
      const category = declineCategory(err.code, err.decline_code);
      if (category) return new DeclineError(err.decline_code ?? err.code ?? 'card_declined', category, err.message);
      return genericValidation(err.code, err.message);
    }
    case 'StripeInvalidRequestError':
    case 'StripeIdempotencyError':
      return genericValidation(err.code, err.message);
    case 'StripeRateLimitError':
      return new TransientError('rate_limited', err.message, 'STRIPE');
    case 'StripeAuthenticationError':
    case 'StripePermissionError':
      return new TransientError('authentication', 'Stripe rejected the configured API key', 'STRIPE');
    case 'StripeConnectionError':
      return new TransientError('network', err.message, 'STRIPE');
    case 'StripeAPIError':
      return new TransientError('unavailable', err.message, 'STRIPE');
    default:
      return protocolError('STRIPE', operation, err.message, { stripeType: err.type, stripeCode: err.code });
  }
}
