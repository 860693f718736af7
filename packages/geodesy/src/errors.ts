import type { GeoCoordinate } from "./geo-coordinate.js";
import type { GeoRectangle } from "./geo-rectangle.js";

/** Base class for every error raised by the geodesy engine */
export class PositioningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PositioningError";
  }
}

/** An operation received (or was called on) an out-of-range coordinate */
export class InvalidCoordinateError extends PositioningError {
  readonly coordinate: GeoCoordinate;

  constructor(coordinate: GeoCoordinate) {
    super(`Operation on invalid coordinate: ${coordinate.toString()}`);
    this.name = "InvalidCoordinateError";
    this.coordinate = coordinate;
  }
}

/** An operation needs a valid rectangle and the receiver or operand is not one */
export class InvalidGeoRectangleError extends PositioningError {
  readonly rectangle: GeoRectangle;

  constructor(rectangle: GeoRectangle) {
    super(`Operation on invalid georectangle: ${rectangle.toString()}`);
    this.name = "InvalidGeoRectangleError";
    this.rectangle = rectangle;
  }
}

export class IndexOutOfBoundsError extends PositioningError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Index ${index} out of bounds for path of length ${length}`);
    this.name = "IndexOutOfBoundsError";
    this.index = index;
    this.length = length;
  }
}
