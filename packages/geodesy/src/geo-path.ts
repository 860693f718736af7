/**
 * Ordered polyline of coordinates.
 *
 * Every stored coordinate is valid. The bounding rectangle is cached and
 * marked dirty by every mutation, then rebuilt on the next read.
 */

import { MAX_LATITUDE, MIN_LATITUDE } from "./constants.js";
import { isValidField, normalizeLongitude } from "./coordinate-field.js";
import { IndexOutOfBoundsError } from "./errors.js";
import { GeoCoordinate } from "./geo-coordinate.js";
import { GeoRectangle } from "./geo-rectangle.js";

/** Options for path length measurement */
export interface PathLengthOptions {
  /** Add the segment from the last measured point back to the first (default false) */
  closedLoop?: boolean;
}

export class GeoPath {
  private coordinates: GeoCoordinate[];
  private bounds: GeoRectangle | null = null;

  /** @throws InvalidCoordinateError for the first invalid coordinate */
  constructor(coordinates: readonly GeoCoordinate[] = []) {
    for (const coordinate of coordinates) coordinate.assertValid();
    this.coordinates = [...coordinates];
  }

  /** Copy of the stored coordinates */
  get path(): GeoCoordinate[] {
    return [...this.coordinates];
  }

  size(): number {
    return this.coordinates.length;
  }

  isEmpty(): boolean {
    return this.coordinates.length === 0;
  }

  /** @throws IndexOutOfBoundsError */
  at(index: number): GeoCoordinate {
    this.checkIndex(index);
    const coordinate = this.coordinates[index];
    if (!coordinate) throw new IndexOutOfBoundsError(index, this.coordinates.length);
    return coordinate;
  }

  /** Whether a coordinate equal to `coordinate` (within tolerance) is on the path */
  contains(coordinate: GeoCoordinate): boolean {
    return this.coordinates.some((c) => c.isEqual(coordinate));
  }

  /** @throws InvalidCoordinateError */
  add(coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.coordinates.push(coordinate);
    this.markDirty();
  }

  /**
   * Insert before `index`. `index` may equal size() to append.
   *
   * @throws InvalidCoordinateError
   * @throws IndexOutOfBoundsError
   */
  insert(index: number, coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    if (!Number.isInteger(index) || index < 0 || index > this.coordinates.length) {
      throw new IndexOutOfBoundsError(index, this.coordinates.length);
    }
    this.coordinates.splice(index, 0, coordinate);
    this.markDirty();
  }

  /**
   * @throws InvalidCoordinateError
   * @throws IndexOutOfBoundsError
   */
  replace(index: number, coordinate: GeoCoordinate): void {
    coordinate.assertValid();
    this.checkIndex(index);
    this.coordinates[index] = coordinate;
    this.markDirty();
  }

  /** @throws IndexOutOfBoundsError */
  remove(index: number): void {
    this.checkIndex(index);
    this.coordinates.splice(index, 1);
    this.markDirty();
  }

  clear(): void {
    this.coordinates = [];
    this.markDirty();
  }

  /**
   * Replace every coordinate. Nothing changes if any of them is invalid.
   *
   * @throws InvalidCoordinateError
   */
  setPath(coordinates: readonly GeoCoordinate[]): void {
    for (const coordinate of coordinates) coordinate.assertValid();
    this.coordinates = [...coordinates];
    this.markDirty();
  }

  /**
   * Great-circle length in meters from index `from` to index `to`
   * (inclusive; clamped to the last point).
   *
   * @throws IndexOutOfBoundsError when `from` is not on the path
   */
  length(from = 0, to = this.coordinates.length - 1, options: PathLengthOptions = {}): number {
    if (this.coordinates.length === 0) return 0;
    this.checkIndex(from);
    const last = Math.min(to, this.coordinates.length - 1);

    let total = 0;
    for (let i = from; i < last; i++) {
      total += this.at(i).distanceTo(this.at(i + 1));
    }
    if (options.closedLoop && last > from) {
      total += this.at(last).distanceTo(this.at(from));
    }
    return total;
  }

  /** Bounding rectangle of the path; the invalid rectangle when empty */
  boundingGeoRectangle(): GeoRectangle {
    if (!this.bounds) {
      this.bounds = GeoRectangle.fromList(this.coordinates);
    }
    return this.bounds.clone();
  }

  /**
   * Shift every point. The latitude shift is limited so that no point moves
   * past a pole; longitudes wrap modulo 360. Non-finite shifts are ignored.
   */
  translate(degreesLatitude: number, degreesLongitude: number): void {
    if (this.coordinates.length === 0) return;
    if (!Number.isFinite(degreesLatitude) || !Number.isFinite(degreesLongitude)) return;

    const bounds = this.boundingGeoRectangle();
    const dLat = degreesLatitude >= 0
      ? Math.min(degreesLatitude, MAX_LATITUDE - bounds.topLeft.latitude)
      : Math.max(degreesLatitude, MIN_LATITUDE - bounds.bottomRight.latitude);

    this.coordinates = this.coordinates.map((c) => {
      const lng = c.longitude + degreesLongitude;
      return new GeoCoordinate(
        c.latitude + dLat,
        isValidField(lng, "longitude") ? lng : normalizeLongitude(lng),
        c.altitude,
      );
    });
    this.markDirty();
  }

  translated(degreesLatitude: number, degreesLongitude: number): GeoPath {
    const copy = new GeoPath(this.coordinates);
    copy.translate(degreesLatitude, degreesLongitude);
    return copy;
  }

  toString(): string {
    return `[${this.coordinates.map((c) => c.toString()).join(", ")}]`;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.coordinates.length) {
      throw new IndexOutOfBoundsError(index, this.coordinates.length);
    }
  }

  private markDirty(): void {
    this.bounds = null;
  }
}
