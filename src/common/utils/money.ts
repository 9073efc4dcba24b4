/**
 * Helpers for DECIMAL(12,2) money values. Amounts are handled as strings
 * ("87000.00") or as integer cents, never as floats.
 */

const MONEY_PATTERN = /^(-?)(\d{1,10})(?:\.(\d{1,2}))?$/;

export function toCents(value: string): number {
  const match = MONEY_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`"${value}" is not a DECIMAL(12,2) amount`);
  }
  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return sign === '-' ? -cents : cents;
}

export function fromCents(cents: number): string {
  if (!Number.isSafeInteger(cents)) {
    throw new Error(`${cents} is not a whole number of cents`);
  }
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** Normalizes any accepted amount to its two-decimal string form. */
export function toMoney(value: string): string {
  return fromCents(toCents(value));
}

/** subtotal - discount + delivery_fee, in the same string form. */
export function expectedOrderTotal(order: {
  subtotal: string;
  discount: string;
  deliveryFee: string;
}): string {
  return fromCents(toCents(order.subtotal) - toCents(order.discount) + toCents(order.deliveryFee));
}
