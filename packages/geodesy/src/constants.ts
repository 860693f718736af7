/**
 * Spherical Earth model constants.
 */

/** Mean Earth radius in meters used by every distance and projection formula */
export const EARTH_MEAN_RADIUS_METERS = 6_371_007.2;

/** Tolerance in degrees (and meters for altitude) for coordinate equality */
export const COORDINATE_EPSILON = 3e-7;

export const MAX_LATITUDE = 90;
export const MIN_LATITUDE = -90;
export const MAX_LONGITUDE = 180;
export const MIN_LONGITUDE = -180;

/** Full turn of longitude in degrees */
export const FULL_CIRCLE = 360;

export const DEG_TO_RAD = Math.PI / 180;
export const RAD_TO_DEG = 180 / Math.PI;
