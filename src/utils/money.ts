// Largest value a NUMERIC(12, 2) column holds
export const MAX_AMOUNT = 9_999_999_999.99;

/**
 * Round to two decimals the way Postgres rounds a NUMERIC(12, 2) literal:
 * half away from zero on the decimal text, so 12.345 becomes 12.35.
 * Returns NaN for values whose text is in exponent form (1e-7, 1e21).
 */
export function roundToCents(amount: number): number {
  const cents = Math.round(Number(`${amount}e2`));
  return Number(`${cents}e-2`);
}

export const isWholeCents = (amount: number): boolean => roundToCents(amount) === amount;
