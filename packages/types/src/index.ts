/**
 * @geokit/types
 *
 * Shared plain data types for the geodesy engine.
 *
 * - LatLng: Serializable point
 * - BoundingBox: Serializable min/max box
 * - Classifications: coordinate fields, coordinate types, cardinal directions
 */

export * from "./geo.js";
