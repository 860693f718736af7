/**
 * Geographic utility types.
 */

/** Plain latitude/longitude pair in degrees (WGS84 ordering: lat first) */
export interface LatLng {
  lat: number;
  lng: number;
  /** Altitude in meters, if known */
  alt?: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  /** West edge. Greater than maxLng when the box crosses the antimeridian */
  minLng: number;
  /** East edge */
  maxLng: number;
}

/** Which scalar of a coordinate a value represents */
export type CoordinateFieldType = "latitude" | "longitude";

/** Classification of a coordinate by validity and dimensionality */
export type GeoCoordinateType =
  | "invalid" // Latitude or longitude out of range (or NaN)
  | "2d" // Valid, no altitude
  | "3d"; // Valid, with altitude

/** The eight named compass bearings */
export type CardinalDirection =
  | "north"
  | "northEast"
  | "east"
  | "southEast"
  | "south"
  | "southWest"
  | "west"
  | "northWest";
