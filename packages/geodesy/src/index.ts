/**
 * @geokit/geodesy
 *
 * Geodesic coordinate math on a spherical Earth.
 *
 * Key concepts:
 * - GeoCoordinate: Immutable point with distance, bearing and projection
 * - GeoRectangle: Lat/lng box with antimeridian-aware containment and algebra
 * - GeoPath: Ordered polyline with length and bounds
 * - CardinalDirection: Named compass bearings
 */

export * from "./constants.js";
export * from "./coordinate-field.js";
export * from "./cardinal.js";
export * from "./errors.js";
export * from "./geo-coordinate.js";
export * from "./geo-rectangle.js";
export * from "./geo-path.js";
export * from "./input.js";
export * from "./export/index.js";

export type {
  BoundingBox,
  CardinalDirection,
  CoordinateFieldType,
  GeoCoordinateType,
  LatLng,
} from "@geokit/types";
