/**
 * GeoJSON export for coordinates, rectangles and paths.
 *
 * Produces RFC 7946 features (longitude first) for visualization in
 * QGIS, geojson.io, Mapbox, etc.
 */

import type { GeoCoordinate } from "../geo-coordinate.js";
import type { GeoPath } from "../geo-path.js";
import type { GeoRectangle } from "../geo-rectangle.js";

/** GeoJSON types (subset we need) */
export type GeoJsonPosition = [number, number] | [number, number, number];

export interface GeoJsonPoint {
  type: "Point";
  coordinates: GeoJsonPosition;
}

export interface GeoJsonLineString {
  type: "LineString";
  coordinates: GeoJsonPosition[];
}

export interface GeoJsonPolygon {
  type: "Polygon";
  coordinates: GeoJsonPosition[][];
}

export type GeoJsonGeometry = GeoJsonPoint | GeoJsonLineString | GeoJsonPolygon;

export interface GeoJsonFeature<G extends GeoJsonGeometry = GeoJsonGeometry> {
  type: "Feature";
  geometry: G;
  properties: Record<string, unknown>;
  /** [west, south, east, north]; west > east when crossing the antimeridian */
  bbox?: [number, number, number, number];
}

export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

/** Options for GeoJSON export */
export interface GeoJsonExportOptions {
  /** Extra properties copied onto the feature */
  properties?: Record<string, unknown>;
  /** Emit altitude as a third position element when present (default true) */
  includeAltitude?: boolean;
}

function toPosition(coordinate: GeoCoordinate, includeAltitude: boolean): GeoJsonPosition {
  if (includeAltitude && coordinate.altitude !== undefined) {
    return [coordinate.longitude, coordinate.latitude, coordinate.altitude];
  }
  return [coordinate.longitude, coordinate.latitude];
}

/**
 * @throws InvalidCoordinateError when the coordinate is invalid
 */
export function coordinateToGeoJson(
  coordinate: GeoCoordinate,
  options: GeoJsonExportOptions = {},
): GeoJsonFeature<GeoJsonPoint> {
  coordinate.assertValid();
  return {
    type: "Feature",
    geometry: { type: "Point", coordinates: toPosition(coordinate, options.includeAltitude ?? true) },
    properties: { ...options.properties },
  };
}

/**
 * Export a rectangle as a Polygon with a closed ring
 * top-left -> top-right -> bottom-right -> bottom-left -> top-left.
 *
 * Properties:
 * - widthDegrees, heightDegrees
 * - crossesAntimeridian
 *
 * @throws InvalidGeoRectangleError when the rectangle is invalid
 */
export function rectangleToGeoJson(
  rectangle: GeoRectangle,
  options: GeoJsonExportOptions = {},
): GeoJsonFeature<GeoJsonPolygon> {
  const box = rectangle.toBoundingBox();
  const ring: GeoJsonPosition[] = [
    [box.minLng, box.maxLat],
    [box.maxLng, box.maxLat],
    [box.maxLng, box.minLat],
    [box.minLng, box.minLat],
    [box.minLng, box.maxLat],
  ];

  return {
    type: "Feature",
    geometry: { type: "Polygon", coordinates: [ring] },
    properties: {
      widthDegrees: rectangle.width(),
      heightDegrees: rectangle.height(),
      crossesAntimeridian: rectangle.crossesAntimeridian(),
      ...options.properties,
    },
    bbox: [box.minLng, box.minLat, box.maxLng, box.maxLat],
  };
}

/**
 * Export a path as a LineString with a `lengthMeters` property.
 */
export function pathToGeoJson(
  path: GeoPath,
  options: GeoJsonExportOptions = {},
): GeoJsonFeature<GeoJsonLineString> {
  const includeAltitude = options.includeAltitude ?? true;
  return {
    type: "Feature",
    geometry: {
      type: "LineString",
      coordinates: path.path.map((c) => toPosition(c, includeAltitude)),
    },
    properties: {
      lengthMeters: path.length(),
      pointCount: path.size(),
      ...options.properties,
    },
  };
}

export function toFeatureCollection(features: GeoJsonFeature[]): GeoJsonFeatureCollection {
  return { type: "FeatureCollection", features };
}
