/**
 * A point on the spherical Earth model.
 *
 * Latitude and longitude are degrees in double precision. Altitude is an
 * optional height in meters that only affects the 2D/3D classification.
 * Instances are immutable; every operation returns a new coordinate.
 */

import type { GeoCoordinateType, LatLng } from "@geokit/types";
import {
  COORDINATE_EPSILON,
  DEG_TO_RAD,
  EARTH_MEAN_RADIUS_METERS,
  RAD_TO_DEG,
} from "./constants.js";
import { clampField, isValidField } from "./coordinate-field.js";
import { InvalidCoordinateError } from "./errors.js";

function fieldEquals(a: number, b: number, epsilon: number): boolean {
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);
  return Math.abs(a - b) <= epsilon;
}

export class GeoCoordinate {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude: number | undefined;

  constructor(latitude: number, longitude: number, altitude?: number) {
    this.latitude = latitude;
    this.longitude = longitude;
    this.altitude = altitude === undefined ? undefined : Math.fround(altitude);
  }

  /** The canonical invalid coordinate (NaN latitude and longitude, no altitude) */
  static invalid(): GeoCoordinate {
    return new GeoCoordinate(Number.NaN, Number.NaN);
  }

  static fromLatLng(point: LatLng): GeoCoordinate {
    return new GeoCoordinate(point.lat, point.lng, point.alt);
  }

  coordinateType(): GeoCoordinateType {
    if (isValidField(this.latitude, "latitude") && isValidField(this.longitude, "longitude")) {
      return this.altitude === undefined ? "2d" : "3d";
    }
    return "invalid";
  }

  isValid(): boolean {
    return this.coordinateType() !== "invalid";
  }

  /**
   * Approximate equality. Altitudes compare only when both sides have one;
   * a missing altitude equals only another missing altitude.
   */
  isEqual(other: GeoCoordinate, epsilon = COORDINATE_EPSILON): boolean {
    if (!fieldEquals(this.latitude, other.latitude, epsilon)) return false;
    if (!fieldEquals(this.longitude, other.longitude, epsilon)) return false;
    if (this.altitude === undefined || other.altitude === undefined) {
      return this.altitude === undefined && other.altitude === undefined;
    }
    return fieldEquals(this.altitude, other.altitude, epsilon);
  }

  withAltitude(altitude?: number): GeoCoordinate {
    return new GeoCoordinate(this.latitude, this.longitude, altitude);
  }

  /**
   * Initial great-circle bearing toward `other`, in [0, 360) degrees
   * (0=N, 90=E). Single precision.
   */
  azimuthTo(other: GeoCoordinate): number {
    this.assertValid();
    other.assertValid();

    const lat1 = this.latitude * DEG_TO_RAD;
    const lat2 = other.latitude * DEG_TO_RAD;
    const dLng = (other.longitude - this.longitude) * DEG_TO_RAD;
    const y = Math.sin(dLng) * Math.cos(lat2);
    const x =
      Math.cos(lat1) * Math.sin(lat2) -
      Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);
    const azimuth = Math.atan2(y, x) * RAD_TO_DEG + 360;

    // Reduce the whole degrees only, so 360.0 becomes 0.0 and the fraction survives
    const whole = Math.trunc(azimuth);
    const fraction = azimuth - whole;
    const result = Math.fround(Math.fround(whole % 360) + Math.fround(fraction));
    // Rounding 359.99999x to single precision can land on 360
    return result >= 360 ? 0 : result;
  }

  /**
   * Haversine distance to `other` in meters. Single precision.
   */
  distanceTo(other: GeoCoordinate): number {
    this.assertValid();
    other.assertValid();

    const dLat = (other.latitude - this.latitude) * DEG_TO_RAD;
    const dLng = (other.longitude - this.longitude) * DEG_TO_RAD;
    const sinHalfLat = Math.sin(dLat / 2);
    const sinHalfLng = Math.sin(dLng / 2);
    const h =
      sinHalfLat * sinHalfLat +
      Math.cos(this.latitude * DEG_TO_RAD) * Math.cos(other.latitude * DEG_TO_RAD) * sinHalfLng * sinHalfLng;
    return Math.fround(2 * EARTH_MEAN_RADIUS_METERS * Math.asin(Math.sqrt(h)));
  }

  /**
   * Destination reached by travelling `distance` meters along the great
   * circle that leaves this point at `azimuth` degrees. A negative distance
   * travels backwards. The destination longitude is clamped to [-180, 180];
   * altitude is carried over.
   */
  atDistanceAndAzimuth(distance: number, azimuth: number): GeoCoordinate {
    this.assertValid();

    const ratio = distance / EARTH_MEAN_RADIUS_METERS;
    const lat1 = this.latitude * DEG_TO_RAD;
    const bearing = azimuth * DEG_TO_RAD;

    const lat2 = Math.asin(
      Math.sin(lat1) * Math.cos(ratio) + Math.cos(lat1) * Math.sin(ratio) * Math.cos(bearing),
    );
    const lng2 =
      this.longitude * DEG_TO_RAD +
      Math.atan2(
        Math.sin(bearing) * Math.sin(ratio) * Math.cos(lat1),
        Math.cos(ratio) - Math.sin(lat1) * Math.sin(lat2),
      );

    return new GeoCoordinate(
      lat2 * RAD_TO_DEG,
      clampField(lng2 * RAD_TO_DEG, "longitude"),
      this.altitude,
    );
  }

  toLatLng(): LatLng {
    const point: LatLng = { lat: this.latitude, lng: this.longitude };
    if (this.altitude !== undefined) point.alt = this.altitude;
    return point;
  }

  /** `(lat°, lon°)` or `(lat°, lon°, altm)`. For logs and error messages only. */
  toString(): string {
    const lat = this.latitude.toFixed(7);
    const lng = this.longitude.toFixed(7);
    if (this.altitude === undefined) return `(${lat}°, ${lng}°)`;
    return `(${lat}°, ${lng}°, ${this.altitude.toFixed(2)}m)`;
  }

  /** @throws InvalidCoordinateError carrying this coordinate */
  assertValid(): void {
    if (!this.isValid()) throw new InvalidCoordinateError(this);
  }
}
