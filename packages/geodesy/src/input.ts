/**
 * Parsing of point lists from untyped JSON.
 *
 * Accepts either `{ lat, lng, alt? }` objects or `[lat, lng]` /
 * `[lat, lng, alt]` tuples, mixed freely.
 */

import type { LatLng } from "@geokit/types";
import { GeoCoordinate } from "./geo-coordinate.js";

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function parsePoint(entry: unknown, index: number): LatLng {
  if (Array.isArray(entry)) {
    const [lat, lng, alt]: unknown[] = entry;
    if (entry.length >= 2 && entry.length <= 3 && isFiniteNumber(lat) && isFiniteNumber(lng)) {
      if (alt === undefined) return { lat, lng };
      if (isFiniteNumber(alt)) return { lat, lng, alt };
    }
  } else if (typeof entry === "object" && entry !== null) {
    const lat = "lat" in entry ? entry.lat : undefined;
    const lng = "lng" in entry ? entry.lng : undefined;
    const alt = "alt" in entry ? entry.alt : undefined;
    if (isFiniteNumber(lat) && isFiniteNumber(lng)) {
      if (alt === undefined) return { lat, lng };
      if (isFiniteNumber(alt)) return { lat, lng, alt };
    }
  }
  throw new Error(`Invalid point at index ${index}: ${JSON.stringify(entry)}`);
}

/**
 * @throws Error naming the first malformed entry
 */
export function parseLatLngList(value: unknown): LatLng[] {
  if (!Array.isArray(value)) {
    throw new Error("Expected a JSON array of points");
  }
  return value.map((entry: unknown, index) => parsePoint(entry, index));
}

/**
 * Parse and convert to coordinates. Range checks are left to the consumer
 * (GeoPath, GeoRectangle.fromList).
 */
export function parseCoordinateList(value: unknown): GeoCoordinate[] {
  return parseLatLngList(value).map((point) => GeoCoordinate.fromLatLng(point));
}
