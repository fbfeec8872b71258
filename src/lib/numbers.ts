const QUANTITY_EPSILON = 1e-6;

/** Largest whole quantity a numeric(18,6) column holds. */
export const MAX_QUANTITY = 999_999_999_999;

/**
 * Converts common numeric-like inputs into a number.
 *
 * `pg` returns NUMERIC columns as strings, so row mappers pass them through here:
 * - number => itself
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/**
 * Rounds to 6 decimal places (lot quantity precision, matches numeric(18,6)).
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(6));
}

/**
 * True when the value is at least one stored unit of quantity (0.000001) once rounded.
 */
export function isPositiveQuantity(value: number): boolean {
  return Number.isFinite(value) && roundQuantity(value) > 0;
}

// Whole units for advisory quantities; the epsilon absorbs numeric(18,6) noise.
export function floorUnits(value: number): number {
  return Math.floor(value + QUANTITY_EPSILON);
}

export function ceilUnits(value: number): number {
  return Math.ceil(value - QUANTITY_EPSILON);
}
