/**
 * Named compass bearings.
 */

import type { CardinalDirection } from "@geokit/types";

/** Bearing in degrees (0=N, 90=E) for each named direction */
export const CARDINAL_DEGREES: Readonly<Record<CardinalDirection, number>> = {
  north: 0,
  northEast: 45,
  east: 90,
  southEast: 135,
  south: 180,
  southWest: 225,
  west: 270,
  northWest: 315,
};

/** Directions in clockwise order starting from north */
export const CARDINAL_DIRECTIONS: readonly CardinalDirection[] = [
  "north",
  "northEast",
  "east",
  "southEast",
  "south",
  "southWest",
  "west",
  "northWest",
];

export function cardinalToDegrees(direction: CardinalDirection): number {
  return CARDINAL_DEGREES[direction];
}

/**
 * Nearest named direction for a bearing. Any finite angle is accepted;
 * halfway bearings round clockwise (22.5 -> northEast).
 */
export function cardinalFromDegrees(azimuth: number): CardinalDirection {
  const normalized = ((azimuth % 360) + 360) % 360;
  const index = Math.floor(normalized / 45 + 0.5) % CARDINAL_DIRECTIONS.length;
  return CARDINAL_DIRECTIONS[index] ?? "north";
}
