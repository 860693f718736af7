/**
 * Axis-aligned geographic rectangle.
 *
 * Stored as a top-left corner (north edge, west edge) and a bottom-right
 * corner (south edge, east edge). Latitude ordering never wraps. Longitude
 * ordering may: a west edge greater than the east edge means the box crosses
 * the antimeridian and covers [west, 180] plus [-180, east].
 *
 * A rectangle is in one of three states:
 * - invalid: a corner is out of range, or top is below bottom
 * - empty: valid, with both corners equal
 * - populated: everything else
 */

import type { BoundingBox } from "@geokit/types";
import { cardinalToDegrees } from "./cardinal.js";
import {
  DEG_TO_RAD,
  EARTH_MEAN_RADIUS_METERS,
  FULL_CIRCLE,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from "./constants.js";
import { clampField, eastwardOffset, normalizeLongitude } from "./coordinate-field.js";
import { InvalidGeoRectangleError } from "./errors.js";
import { GeoCoordinate } from "./geo-coordinate.js";

// ---------------------------------------------------------------------------
// Longitude arcs
// ---------------------------------------------------------------------------

/** Eastward longitude interval: starts at `start`, covers `span` degrees */
interface LongitudeArc {
  start: number;
  span: number;
}

const FULL_ARC: LongitudeArc = { start: MIN_LONGITUDE, span: FULL_CIRCLE };

/** Convert an arc back into west/east edges, keeping the east edge at 180 rather than -180 */
function arcEdges(arc: LongitudeArc): [west: number, east: number] {
  if (arc.span >= FULL_CIRCLE) return [MIN_LONGITUDE, MAX_LONGITUDE];
  let west = arc.start;
  if (west > MAX_LONGITUDE) west -= FULL_CIRCLE;
  let east = west + arc.span;
  if (east > MAX_LONGITUDE) east -= FULL_CIRCLE;
  return [west, east];
}

/** Smallest arc covering both inputs. It always starts at one of their starts. */
function coveringArc(a: LongitudeArc, b: LongitudeArc): LongitudeArc {
  const fromA = Math.max(a.span, eastwardOffset(a.start, b.start) + b.span);
  const fromB = Math.max(b.span, eastwardOffset(b.start, a.start) + a.span);
  const best = fromA <= fromB ? { start: a.start, span: fromA } : { start: b.start, span: fromB };
  return best.span >= FULL_CIRCLE ? FULL_ARC : best;
}

/**
 * Widest arc inside both inputs, or null when they are disjoint.
 * Two partial arcs can overlap in two separate pieces; the wider piece wins.
 */
function overlapArc(a: LongitudeArc, b: LongitudeArc): LongitudeArc | null {
  if (a.span >= FULL_CIRCLE) return b;
  if (b.span >= FULL_CIRCLE) return a;

  const offset = eastwardOffset(a.start, b.start);
  const pieces: [number, number][] = [];
  if (offset <= a.span) {
    pieces.push([offset, Math.min(a.span, offset + b.span)]);
  }
  const wrappedEnd = Math.min(a.span, offset + b.span - FULL_CIRCLE);
  if (wrappedEnd >= 0) {
    pieces.push([0, wrappedEnd]);
  }

  let best: [number, number] | null = null;
  for (const piece of pieces) {
    if (!best || piece[1] - piece[0] > best[1] - best[0]) best = piece;
  }
  if (!best) return null;
  return { start: a.start + best[0], span: best[1] - best[0] };
}

// ---------------------------------------------------------------------------
// Latitude bands
// ---------------------------------------------------------------------------

/**
 * Pull a band that overshoots a pole back inside [-90, 90]. The band stays
 * centred on `center` where it can: the edge past the pole pins to the pole
 * and the opposite edge mirrors to 2·center ∓ 90.
 */
function clampLatitudeBand(center: number, top: number, bottom: number): [top: number, bottom: number] {
  if (top > MAX_LATITUDE) {
    bottom = 2 * center - MAX_LATITUDE;
    top = MAX_LATITUDE;
  }
  if (top < MIN_LATITUDE) {
    bottom = MIN_LATITUDE;
    top = MIN_LATITUDE;
  }
  if (bottom > MAX_LATITUDE) {
    top = MAX_LATITUDE;
    bottom = MAX_LATITUDE;
  }
  if (bottom < MIN_LATITUDE) {
    top = 2 * center - MIN_LATITUDE;
    bottom = MIN_LATITUDE;
  }
  return [top, bottom];
}

function stripAltitude(coordinate: GeoCoordinate): GeoCoordinate {
  return coordinate.altitude === undefined ? coordinate : coordinate.withAltitude(undefined);
}

// ---------------------------------------------------------------------------
// GeoRectangle
// ---------------------------------------------------------------------------

export class GeoRectangle {
  private tl: GeoCoordinate;
  private br: GeoCoordinate;

  /** Altitudes are dropped. Omitting both corners gives the invalid rectangle. */
  constructor(topLeft: GeoCoordinate = GeoCoordinate.invalid(), bottomRight: GeoCoordinate = GeoCoordinate.invalid()) {
    this.tl = stripAltitude(topLeft);
    this.br = stripAltitude(bottomRight);
  }

  /**
   * Rectangle of the given angular size centred on `center`.
   * Sizes go through setWidth/setHeight, so out-of-range sizes leave that
   * dimension at zero.
   */
  static fromCenterDegrees(center: GeoCoordinate, widthDegrees: number, heightDegrees: number): GeoRectangle {
    center.assertValid();
    const rectangle = new GeoRectangle(center, center);
    rectangle.setWidth(widthDegrees);
    rectangle.setHeight(heightDegrees);
    return rectangle;
  }

  /**
   * Rectangle whose edges lie half the given distances north, south, east
   * and west of `center`. Negative sizes count as zero; an edge that would
   * pass a pole stops at the pole.
   */
  static fromCenterMeters(center: GeoCoordinate, widthMeters: number, heightMeters: number): GeoRectangle {
    center.assertValid();
    const halfWidth = Math.max(0, widthMeters) / 2;
    const halfHeight = Math.max(0, heightMeters) / 2;

    const metersPerDegree = EARTH_MEAN_RADIUS_METERS * DEG_TO_RAD;
    const toNorthPole = (MAX_LATITUDE - center.latitude) * metersPerDegree;
    const toSouthPole = (center.latitude - MIN_LATITUDE) * metersPerDegree;

    const top = halfHeight >= toNorthPole
      ? MAX_LATITUDE
      : center.atDistanceAndAzimuth(halfHeight, cardinalToDegrees("north")).latitude;
    const bottom = halfHeight >= toSouthPole
      ? MIN_LATITUDE
      : center.atDistanceAndAzimuth(halfHeight, cardinalToDegrees("south")).latitude;
    const west = center.atDistanceAndAzimuth(halfWidth, cardinalToDegrees("west")).longitude;
    const east = center.atDistanceAndAzimuth(halfWidth, cardinalToDegrees("east")).longitude;

    return new GeoRectangle(new GeoCoordinate(top, west), new GeoCoordinate(bottom, east));
  }

  /**
   * Bounding rectangle of a point list, grown point by point with `extend`.
   * An empty list gives the invalid rectangle.
   *
   * @throws InvalidCoordinateError for the first invalid point
   */
  static fromList(coordinates: readonly GeoCoordinate[]): GeoRectangle {
    for (const coordinate of coordinates) coordinate.assertValid();
    const [first, ...rest] = coordinates;
    if (!first) return new GeoRectangle();

    const rectangle = new GeoRectangle(first, first);
    for (const coordinate of rest) rectangle.extend(coordinate);
    return rectangle;
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  isValid(): boolean {
    return this.tl.isValid() && this.br.isValid() && this.tl.latitude >= this.br.latitude;
  }

  isEmpty(): boolean {
    return !this.isValid() || this.tl.isEqual(this.br);
  }

  isEqual(other: GeoRectangle): boolean {
    return this.tl.isEqual(other.tl) && this.br.isEqual(other.br);
  }

  /** Whether the box crosses the antimeridian */
  crossesAntimeridian(): boolean {
    return this.tl.longitude > this.br.longitude;
  }

  clone(): GeoRectangle {
    return new GeoRectangle(this.tl, this.br);
  }

  // -------------------------------------------------------------------------
  // Corners and dimensions
  // -------------------------------------------------------------------------

  get topLeft(): GeoCoordinate {
    return this.tl;
  }

  get bottomRight(): GeoCoordinate {
    return this.br;
  }

  get topRight(): GeoCoordinate {
    return new GeoCoordinate(this.tl.latitude, this.br.longitude);
  }

  get bottomLeft(): GeoCoordinate {
    return new GeoCoordinate(this.br.latitude, this.tl.longitude);
  }

  /** Midpoint of the latitude band and of the (possibly wrapped) longitude arc */
  get center(): GeoCoordinate {
    if (!this.isValid()) return GeoCoordinate.invalid();
    const latitude = (this.tl.latitude + this.br.latitude) / 2;
    let longitude = this.tl.longitude + this.width() / 2;
    if (longitude > MAX_LONGITUDE) longitude -= FULL_CIRCLE;
    return new GeoCoordinate(latitude, longitude);
  }

  /** Eastward extent in degrees, in [0, 360]. Zero when invalid. */
  width(): number {
    if (!this.isValid()) return 0;
    let result = this.br.longitude - this.tl.longitude;
    if (result < 0) result += FULL_CIRCLE;
    if (result > FULL_CIRCLE) result -= FULL_CIRCLE;
    return result;
  }

  /** Latitude extent in degrees. Zero when invalid. */
  height(): number {
    if (!this.isValid()) return 0;
    return this.tl.latitude - this.br.latitude;
  }

  /**
   * Great-circle length of the horizontal edge nearer the equator, in meters.
   *
   * @throws InvalidGeoRectangleError when invalid
   */
  widthMeters(): number {
    this.assertValid();
    if (Math.abs(this.br.latitude) < Math.abs(this.tl.latitude)) {
      return this.bottomLeft.distanceTo(this.br);
    }
    return this.tl.distanceTo(this.topRight);
  }

  /**
   * Length of the west edge in meters.
   *
   * @throws InvalidGeoRectangleError when invalid
   */
  heightMeters(): number {
    this.assertValid();
    return this.tl.distanceTo(this.bottomLeft);
  }

  // -------------------------------------------------------------------------
  // Predicates
  // -------------------------------------------------------------------------

  /**
   * Whether the point lies inside or on the edge of the box. Every longitude
   * on a pole row counts as inside when the box reaches that pole.
   */
  contains(coordinate: GeoCoordinate): boolean {
    this.assertValid();
    coordinate.assertValid();

    const { latitude: lat, longitude: lng } = coordinate;
    const top = this.tl.latitude;
    const bottom = this.br.latitude;
    const left = this.tl.longitude;
    const right = this.br.longitude;

    if (lat > top || lat < bottom) return false;
    if (lat === MAX_LATITUDE && top === MAX_LATITUDE) return true;
    if (lat === MIN_LATITUDE && bottom === MIN_LATITUDE) return true;

    if (left <= right) return lng >= left && lng <= right;
    // Wrapped: the gap (right, left) is outside
    return !(lng < left && lng > right);
  }

  /**
   * Whether every corner of `other` is inside this box and `other` is no
   * wider than it.
   */
  containsRectangle(other: GeoRectangle): boolean {
    this.assertValid();
    other.assertValid();
    if (other.width() > this.width()) return false;
    return (
      this.contains(other.tl) &&
      this.contains(other.topRight) &&
      this.contains(other.br) &&
      this.contains(other.bottomLeft)
    );
  }

  /**
   * Whether the two boxes share at least one point. Longitudes compare as
   * arcs on the circle:
   * - neither wraps: plain interval overlap
   * - both wrap: both contain ±180, so they always overlap
   * - one wraps: the plain interval must reach into [west, 180] or [-180, east]
   */
  intersects(other: GeoRectangle): boolean {
    this.assertValid();
    other.assertValid();

    const top1 = this.tl.latitude;
    const bottom1 = this.br.latitude;
    const top2 = other.tl.latitude;
    const bottom2 = other.br.latitude;

    if (top1 < bottom2 || bottom1 > top2) return false;
    if (top1 === MAX_LATITUDE && top2 === MAX_LATITUDE) return true;
    if (bottom1 === MIN_LATITUDE && bottom2 === MIN_LATITUDE) return true;

    const wraps1 = this.crossesAntimeridian();
    const wraps2 = other.crossesAntimeridian();
    if (wraps1 && wraps2) return true;

    if (!wraps1 && !wraps2) {
      return this.tl.longitude <= other.br.longitude && other.tl.longitude <= this.br.longitude;
    }

    const [plain, wrapped] = wraps1 ? [other, this] : [this, other];
    return plain.br.longitude >= wrapped.tl.longitude || plain.tl.longitude <= wrapped.br.longitude;
  }

  // -------------------------------------------------------------------------
  // Algebra
  // -------------------------------------------------------------------------

  /**
   * Smallest rectangle containing both. An invalid operand contributes
   * nothing; two invalid operands give the invalid rectangle.
   */
  union(other: GeoRectangle): GeoRectangle {
    if (!other.isValid()) return this.isValid() ? this.clone() : new GeoRectangle();
    if (!this.isValid()) return other.clone();

    const top = Math.max(this.tl.latitude, other.tl.latitude);
    const bottom = Math.min(this.br.latitude, other.br.latitude);
    const [west, east] = arcEdges(coveringArc(this.arc(), other.arc()));
    return new GeoRectangle(new GeoCoordinate(top, west), new GeoCoordinate(bottom, east));
  }

  /**
   * Largest rectangle contained in both. Disjoint or invalid operands give
   * the invalid rectangle; boxes touching along an edge give a zero-width
   * or zero-height one, and boxes meeting only at a pole give that pole.
   */
  intersection(other: GeoRectangle): GeoRectangle {
    if (!this.isValid() || !other.isValid()) return new GeoRectangle();

    const top = Math.min(this.tl.latitude, other.tl.latitude);
    const bottom = Math.max(this.br.latitude, other.br.latitude);
    if (top < bottom) return new GeoRectangle();

    const arc = overlapArc(this.arc(), other.arc());
    if (!arc) {
      // Boxes sharing a pole meet at that point even when their longitudes do not
      const pole = top === MAX_LATITUDE ? MAX_LATITUDE : bottom === MIN_LATITUDE ? MIN_LATITUDE : undefined;
      if (pole === undefined) return new GeoRectangle();
      const point = new GeoCoordinate(pole, this.tl.longitude);
      return new GeoRectangle(point, point);
    }
    const [west, east] = arcEdges(arc);
    return new GeoRectangle(new GeoCoordinate(top, west), new GeoCoordinate(bottom, east));
  }

  /**
   * Copy shifted by the given degrees.
   *
   * @throws InvalidGeoRectangleError when invalid
   */
  translated(degreesLatitude: number, degreesLongitude: number): GeoRectangle {
    const copy = this.clone();
    copy.translate(degreesLatitude, degreesLongitude);
    return copy;
  }

  // -------------------------------------------------------------------------
  // Mutators
  // -------------------------------------------------------------------------

  /**
   * Shift the box. The latitude shift stops when an edge reaches a pole, so
   * the height is kept. Longitudes move modulo 360 and keep the width; a box
   * spanning the full circle keeps its longitudes.
   *
   * Non-finite shifts leave the box unchanged.
   *
   * @throws InvalidGeoRectangleError when invalid
   */
  translate(degreesLatitude: number, degreesLongitude: number): void {
    this.assertValid();
    if (!Number.isFinite(degreesLatitude) || !Number.isFinite(degreesLongitude)) return;

    const dLat = degreesLatitude >= 0
      ? Math.min(degreesLatitude, MAX_LATITUDE - this.tl.latitude)
      : Math.max(degreesLatitude, MIN_LATITUDE - this.br.latitude);

    const width = this.width();
    const [west, east] = width >= FULL_CIRCLE
      ? [this.tl.longitude, this.br.longitude]
      : arcEdges({ start: normalizeLongitude(this.tl.longitude + degreesLongitude), span: width });

    this.tl = new GeoCoordinate(this.tl.latitude + dLat, west);
    this.br = new GeoCoordinate(this.br.latitude + dLat, east);
  }

  /**
   * Grow the box just enough to contain `coordinate`. Latitude bounds take
   * the min/max. For longitude the nearer of the two edges moves, measured
   * the short way round the antimeridian. Does nothing if already contained.
   *
   * @throws InvalidGeoRectangleError when invalid
   * @throws InvalidCoordinateError when the coordinate is invalid
   */
  extend(coordinate: GeoCoordinate): void {
    if (this.contains(coordinate)) return;

    let left = this.tl.longitude;
    let right = this.br.longitude;
    const top = Math.max(this.tl.latitude, coordinate.latitude);
    const bottom = Math.min(this.br.latitude, coordinate.latitude);
    const lng = coordinate.longitude;

    if (left > right) {
      if (lng > right && lng < left) {
        if (Math.abs(left - lng) < Math.abs(right - lng)) left = lng;
        else right = lng;
      }
    } else if (lng < left) {
      if (FULL_CIRCLE - (right - lng) < left - lng) right = lng;
      else left = lng;
    } else if (lng > right) {
      if (FULL_CIRCLE - (lng - left) < lng - right) left = lng;
      else right = lng;
    }

    this.tl = new GeoCoordinate(top, left);
    this.br = new GeoCoordinate(bottom, right);
  }

  /** @throws InvalidCoordinateError when the corner is invalid */
  setTopLeft(coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.tl = stripAltitude(coordinate);
  }

  /** @throws InvalidCoordinateError when the corner is invalid */
  setBottomRight(coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.br = stripAltitude(coordinate);
  }

  /**
   * Moves the north edge and the east edge.
   *
   * @throws InvalidCoordinateError when the corner is invalid
   */
  setTopRight(coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.tl = new GeoCoordinate(coordinate.latitude, this.tl.longitude);
    this.br = new GeoCoordinate(this.br.latitude, coordinate.longitude);
  }

  /**
   * Moves the south edge and the west edge.
   *
   * @throws InvalidCoordinateError when the corner is invalid
   */
  setBottomLeft(coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.tl = new GeoCoordinate(this.tl.latitude, coordinate.longitude);
    this.br = new GeoCoordinate(coordinate.latitude, this.br.longitude);
  }

  /**
   * Resize around the current centre. Widths of 360 or more span the full
   * circle; otherwise both edges are clamped to [-180, 180]. Ignored when the
   * box is invalid or the width is negative.
   */
  setWidth(degreesWidth: number): void {
    if (!this.isValid() || !(degreesWidth >= 0)) return;

    if (degreesWidth >= FULL_CIRCLE) {
      this.tl = new GeoCoordinate(this.tl.latitude, MIN_LONGITUDE);
      this.br = new GeoCoordinate(this.br.latitude, MAX_LONGITUDE);
      return;
    }

    const center = this.center;
    this.tl = new GeoCoordinate(
      this.tl.latitude,
      clampField(center.longitude - degreesWidth / 2, "longitude"),
    );
    this.br = new GeoCoordinate(
      this.br.latitude,
      clampField(center.longitude + degreesWidth / 2, "longitude"),
    );
  }

  /**
   * Resize around the current centre. A band that would pass a pole is
   * pinned to it and mirrored about the centre. Ignored when the box is
   * invalid or the height is negative or above 180.
   */
  setHeight(degreesHeight: number): void {
    if (!this.isValid() || !(degreesHeight >= 0) || degreesHeight > MAX_LATITUDE - MIN_LATITUDE) return;

    const center = this.center;
    const [top, bottom] = clampLatitudeBand(
      center.latitude,
      center.latitude + degreesHeight / 2,
      center.latitude - degreesHeight / 2,
    );
    this.tl = new GeoCoordinate(top, this.tl.longitude);
    this.br = new GeoCoordinate(bottom, this.br.longitude);
  }

  /**
   * Move the box so it is centred on `center`, keeping width and height
   * where the poles allow.
   *
   * @throws InvalidGeoRectangleError when invalid
   * @throws InvalidCoordinateError when the centre is invalid
   */
  setCenter(center: GeoCoordinate): void {
    this.assertValid();
    center.assertValid();

    const width = this.width();
    const height = this.height();
    const [top, bottom] = clampLatitudeBand(
      center.latitude,
      center.latitude + height / 2,
      center.latitude - height / 2,
    );

    let west = clampField(center.longitude - width / 2, "longitude");
    let east = clampField(center.longitude + width / 2, "longitude");
    if (width >= FULL_CIRCLE) {
      west = MIN_LONGITUDE;
      east = MAX_LONGITUDE;
    }

    this.tl = new GeoCoordinate(top, west);
    this.br = new GeoCoordinate(bottom, east);
  }

  // -------------------------------------------------------------------------
  // Conversion
  // -------------------------------------------------------------------------

  /** @throws InvalidGeoRectangleError when invalid */
  toBoundingBox(): BoundingBox {
    this.assertValid();
    return {
      minLat: this.br.latitude,
      maxLat: this.tl.latitude,
      minLng: this.tl.longitude,
      maxLng: this.br.longitude,
    };
  }

  toString(): string {
    return `[${this.tl.toString()}, ${this.br.toString()}]`;
  }

  /** @throws InvalidGeoRectangleError carrying this rectangle */
  assertValid(): void {
    if (!this.isValid()) throw new InvalidGeoRectangleError(this);
  }

  private arc(): LongitudeArc {
    return { start: this.tl.longitude, span: this.width() };
  }
}
