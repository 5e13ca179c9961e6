/**
 * Token amounts and fixed-point decimals.
 *
 * Amounts are whole base units held as bigint. Ratios (quorum, threshold)
 * and the reward index are decimals with 18 fractional digits, stored as a
 * bigint scaled by DECIMAL_SCALE.
 */

export const DECIMAL_PLACES = 18;
export const DECIMAL_SCALE = 10n ** BigInt(DECIMAL_PLACES);

const AMOUNT_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

export const isAmountString = (input: string): boolean => AMOUNT_PATTERN.test(input);

/** Parse a base-unit amount. Returns null for anything but a non-negative integer. */
export const parseAmount = (input: string | number | bigint): bigint | null => {
  if (typeof input === 'bigint') return input >= 0n ? input : null;
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) && input >= 0 ? BigInt(input) : null;
  }
  const trimmed = input.trim();
  return AMOUNT_PATTERN.test(trimmed) ? BigInt(trimmed) : null;
};

export const formatAmount = (value: bigint): string => value.toString();

/** Parse "0.3" into 0.3 * 10^18. Digits past the 18th are truncated. */
export const parseDecimal = (input: string): bigint | null => {
  const trimmed = input.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const [whole, fraction = ''] = trimmed.split('.');
  const paddedFraction = fraction.slice(0, DECIMAL_PLACES).padEnd(DECIMAL_PLACES, '0');
  return BigInt(whole) * DECIMAL_SCALE + BigInt(paddedFraction);
};

export const formatDecimal = (value: bigint): string => {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / DECIMAL_SCALE;
  const fraction = (abs % DECIMAL_SCALE).toString().padStart(DECIMAL_PLACES, '0').replace(/0+$/, '');
  const body = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
};

/** Decimal multiplication: `amount * ratio`, ratio in scaled form, floored. */
export const mulDecimal = (amount: bigint, ratio: bigint): bigint => (amount * ratio) / DECIMAL_SCALE;

/**
 * True when `numerator / denominator >= ratio` with ratio in scaled form.
 * Compared by cross-multiplication, so nothing is rounded.
 */
export const ratioAtLeast = (numerator: bigint, denominator: bigint, ratio: bigint): boolean => {
  if (denominator <= 0n) return false;
  return numerator * DECIMAL_SCALE >= ratio * denominator;
};

