/**
 * Minor-unit encoding. Amounts travel as decimal numbers in the domain and are
 * converted with integer arithmetic on the currency's ISO 4217 exponent.
 */

import currencies from './currencies.json';
import { ValidationError } from './errors';

const EXPONENTS: Readonly<Record<string, number>> = currencies.exponents;

export function normalizeCurrency(currency: string): string {
  const code = currency.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(code)) {
    throw new ValidationError('currency_invalid', `Unsupported currency code "${currency}"`, { field: 'currency' });
  }
  return code;
}

export function currencyExponent(currency: string): number {
  return EXPONENTS[normalizeCurrency(currency)] ?? currencies.defaultExponent;
}

export function toMinorUnits(amount: number, currency: string): number {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError('amount_invalid', `Amount must be a non-negative number, got ${amount}`, {
      field: 'amount',
    });
  }
  return Math.round(amount * 10 ** currencyExponent(currency));
}

export function fromMinorUnits(minor: number, currency: string): number {
  if (!Number.isSafeInteger(minor)) {
    throw new ValidationError('amount_invalid', `Minor units must be an integer, got ${minor}`, { field: 'amount' });
  }
  return minor / 10 ** currencyExponent(currency);
}

/** Decimal string in the currency's precision, e.g. "19.99", or "1172" for JPY. */
export function formatAmount(amount: number, currency: string): string {
  const exponent = currencyExponent(currency);
  const minor = toMinorUnits(amount, currency);
  if (exponent === 0) return String(minor);
  const factor = 10 ** exponent;
  const whole = Math.floor(minor / factor);
  const fraction = String(minor % factor).padStart(exponent, '0');
  return `${whole}.${fraction}`;
}

/** Compare two amounts in the same currency on their minor units. */
export function compareAmounts(a: number, b: number, currency: string): number {
  return toMinorUnits(a, currency) - toMinorUnits(b, currency);
}
