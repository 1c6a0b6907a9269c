/**
 * Decimal rounding helpers.
 *
 * Every rounding point goes through decimal.js on the number's shortest
 * decimal representation, so 1.005 rounds to 1.01 rather than to the binary
 * neighbour 1.00.
 */

import Decimal from 'decimal.js';

export function roundHalfUp(value: number, places: number): number {
  return new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

/** Money: 2 decimals. */
export function toCents(value: number): number {
  return roundHalfUp(value, 2);
}

/** Rates: 4 decimals. */
export function toRate(value: number): number {
  return roundHalfUp(value, 4);
}
