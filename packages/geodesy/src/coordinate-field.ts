/**
 * Range rules for a single latitude or longitude value.
 */

import type { CoordinateFieldType } from "@geokit/types";
import {
  FULL_CIRCLE,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from "./constants.js";

function bounds(kind: CoordinateFieldType): [min: number, max: number] {
  return kind === "latitude"
    ? [MIN_LATITUDE, MAX_LATITUDE]
    : [MIN_LONGITUDE, MAX_LONGITUDE];
}

/**
 * Whether a value lies inside the closed range of its field.
 * Out-of-range values are not normalized, and NaN is never valid.
 */
export function isValidField(value: number, kind: CoordinateFieldType): boolean {
  const [min, max] = bounds(kind);
  return value >= min && value <= max;
}

/**
 * Clamp a value to the nearest bound of its field.
 *
 * In-range values pass through unchanged, and so does NaN.
 */
export function clampField(value: number, kind: CoordinateFieldType): number {
  const [min, max] = bounds(kind);
  if (value > max) return max;
  if (value < min) return min;
  return value;
}

/**
 * Wrap a longitude modulo 360 into [-180, 180).
 */
export function normalizeLongitude(value: number): number {
  return ((((value - MIN_LONGITUDE) % FULL_CIRCLE) + FULL_CIRCLE) % FULL_CIRCLE) + MIN_LONGITUDE;
}

/**
 * Eastward angular distance from `from` to `to` in [0, 360).
 */
export function eastwardOffset(from: number, to: number): number {
  return (((to - from) % FULL_CIRCLE) + FULL_CIRCLE) % FULL_CIRCLE;
}
