/**
 * Compute the bounding rectangle and length of a point list.
 *
 * Usage: npx tsx scripts/bbox.ts [points.json] [--closed] [--geojson out.json]
 *
 * Options:
 *   --closed           Measure the path as a closed loop
 *   --geojson <path>   Also write the path and its bounds as GeoJSON
 *
 * Default input: ../fixtures/pacific-crossing.json
 */

import { readFileSync, writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  GeoPath,
  parseCoordinateList,
  pathToGeoJson,
  rectangleToGeoJson,
  toFeatureCollection,
} from "../src/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const args = process.argv.slice(2);
const geojsonFlag = args.indexOf("--geojson");
const geojsonPath = geojsonFlag >= 0 ? args[geojsonFlag + 1] : undefined;
const positional = args.filter(
  (a, i) => !a.startsWith("--") && (geojsonFlag < 0 || i !== geojsonFlag + 1),
);

const inputPath = positional[0] ?? resolve(__dirname, "../fixtures/pacific-crossing.json");

function main(): void {
  if (geojsonFlag >= 0 && !geojsonPath) {
    throw new Error("--geojson needs an output path");
  }

  console.log(`[bbox] Reading ${inputPath}`);
  const path = new GeoPath(parseCoordinateList(JSON.parse(readFileSync(inputPath, "utf-8"))));
  console.log(`[bbox] ${path.size()} point(s)`);

  const bounds = path.boundingGeoRectangle();
  if (!bounds.isValid()) {
    console.log("[bbox] Empty input, nothing to measure");
    return;
  }

  console.log(`[bbox] Bounds: ${bounds.toString()}`);
  console.log(
    `[bbox] Size: ${bounds.width().toFixed(4)}° x ${bounds.height().toFixed(4)}° ` +
      `(${(bounds.widthMeters() / 1000).toFixed(1)} km x ${(bounds.heightMeters() / 1000).toFixed(1)} km)`,
  );
  if (bounds.crossesAntimeridian()) {
    console.log("[bbox] Bounds cross the antimeridian");
  }

  const closedLoop = args.includes("--closed");
  const length = path.length(0, path.size() - 1, { closedLoop });
  console.log(`[bbox] Length${closedLoop ? " (closed)" : ""}: ${(length / 1000).toFixed(2)} km`);

  if (geojsonPath) {
    const json = JSON.stringify(
      toFeatureCollection([pathToGeoJson(path), rectangleToGeoJson(bounds)]),
    );
    writeFileSync(geojsonPath, json);
    console.log(`[bbox] Written to: ${geojsonPath}`);
  }
}

try {
  main();
} catch (err) {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
