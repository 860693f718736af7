export {
  coordinateToGeoJson,
  rectangleToGeoJson,
  pathToGeoJson,
  toFeatureCollection,
  type GeoJsonExportOptions,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
  type GeoJsonGeometry,
  type GeoJsonLineString,
  type GeoJsonPoint,
  type GeoJsonPolygon,
  type GeoJsonPosition,
} from "./geojson.js";
