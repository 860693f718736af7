import { describe, it, expect } from "vitest";
import { GeoCoordinate } from "./geo-coordinate.js";
import { GeoPath } from "./geo-path.js";
import { IndexOutOfBoundsError, InvalidCoordinateError } from "./errors.js";

function c(lat: number, lng: number, alt?: number): GeoCoordinate {
  return new GeoCoordinate(lat, lng, alt);
}

/** Three points one degree apart along the equator */
function makeEquatorPath(): GeoPath {
  return new GeoPath([c(0, 0), c(0, 1), c(0, 2)]);
}

// f32 haversine length of one degree of arc on the model sphere
const ONE_DEGREE_METERS = 111195.0546875;

describe("GeoPath", () => {
  describe("construction", () => {
    it("starts empty by default", () => {
      const path = new GeoPath();
      expect(path.size()).toBe(0);
      expect(path.isEmpty()).toBe(true);
    });

    it("rejects invalid coordinates", () => {
      expect(() => new GeoPath([c(0, 0), c(91, 0)])).toThrow(InvalidCoordinateError);
    });

    it("copies the input array", () => {
      const input = [c(0, 0)];
      const path = new GeoPath(input);
      input.push(c(1, 1));
      expect(path.size()).toBe(1);
    });
  });

  describe("element access", () => {
    it("returns elements by index", () => {
      const path = makeEquatorPath();
      expect(path.at(1).isEqual(c(0, 1))).toBe(true);
    });

    it("rejects indices outside the path", () => {
      const path = makeEquatorPath();
      expect(() => path.at(3)).toThrow(IndexOutOfBoundsError);
      expect(() => path.at(-1)).toThrow(IndexOutOfBoundsError);
      expect(() => path.at(1.5)).toThrow(IndexOutOfBoundsError);
    });

    it("reports the index and length in the error", () => {
      try {
        makeEquatorPath().at(5);
        expect.unreachable("at should throw");
      } catch (err) {
        expect(err).toBeInstanceOf(IndexOutOfBoundsError);
        if (err instanceof IndexOutOfBoundsError) {
          expect(err.index).toBe(5);
          expect(err.length).toBe(3);
          expect(err.message).toBe("Index 5 out of bounds for path of length 3");
        }
      }
    });

    it("path returns a copy", () => {
      const path = makeEquatorPath();
      path.path.push(c(5, 5));
      expect(path.size()).toBe(3);
    });

    it("contains matches within tolerance", () => {
      const path = makeEquatorPath();
      expect(path.contains(c(0, 1.0000001))).toBe(true);
      expect(path.contains(c(0, 1.5))).toBe(false);
    });

    it("allows duplicates", () => {
      const path = makeEquatorPath();
      path.add(c(0, 0));
      expect(path.size()).toBe(4);
    });
  });

  describe("mutation", () => {
    it("add appends", () => {
      const path = makeEquatorPath();
      path.add(c(0, 3));
      expect(path.at(3).isEqual(c(0, 3))).toBe(true);
    });

    it("add rejects invalid coordinates", () => {
      const path = makeEquatorPath();
      expect(() => path.add(GeoCoordinate.invalid())).toThrow(InvalidCoordinateError);
      expect(path.size()).toBe(3);
    });

    it("insert places before the index and accepts the end", () => {
      const path = makeEquatorPath();
      path.insert(0, c(0, -1));
      path.insert(path.size(), c(0, 3));
      expect(path.path.map((p) => p.longitude)).toEqual([-1, 0, 1, 2, 3]);
    });

    it("insert rejects bad indices and invalid coordinates without mutating", () => {
      const path = makeEquatorPath();
      expect(() => path.insert(4, c(0, 3))).toThrow(IndexOutOfBoundsError);
      expect(() => path.insert(0, c(0, 200))).toThrow(InvalidCoordinateError);
      expect(path.size()).toBe(3);
    });

    it("replace swaps one element", () => {
      const path = makeEquatorPath();
      path.replace(1, c(1, 1));
      expect(path.at(1).isEqual(c(1, 1))).toBe(true);
      expect(() => path.replace(3, c(1, 1))).toThrow(IndexOutOfBoundsError);
      expect(() => path.replace(0, GeoCoordinate.invalid())).toThrow(InvalidCoordinateError);
      expect(path.at(0).isEqual(c(0, 0))).toBe(true);
    });

    it("remove deletes one element", () => {
      const path = makeEquatorPath();
      path.remove(0);
      expect(path.path.map((p) => p.longitude)).toEqual([1, 2]);
      expect(() => path.remove(2)).toThrow(IndexOutOfBoundsError);
    });

    it("clear empties the path", () => {
      const path = makeEquatorPath();
      path.clear();
      expect(path.size()).toBe(0);
    });

    it("setPath replaces everything or nothing", () => {
      const path = makeEquatorPath();
      expect(() => path.setPath([c(5, 5), c(-95, 0)])).toThrow(InvalidCoordinateError);
      expect(path.size()).toBe(3);
      path.setPath([c(5, 5)]);
      expect(path.size()).toBe(1);
    });
  });

  describe("length", () => {
    it("sums consecutive great-circle distances", () => {
      expect(makeEquatorPath().length()).toBe(2 * ONE_DEGREE_METERS);
    });

    it("measures a sub-range", () => {
      const path = makeEquatorPath();
      expect(path.length(1)).toBe(ONE_DEGREE_METERS);
      expect(path.length(0, 1)).toBe(ONE_DEGREE_METERS);
    });

    it("clamps the end index to the last point", () => {
      expect(makeEquatorPath().length(0, 10)).toBe(2 * ONE_DEGREE_METERS);
    });

    it("adds the closing segment for a closed loop", () => {
      expect(makeEquatorPath().length(0, 2, { closedLoop: true })).toBe(4 * ONE_DEGREE_METERS);
    });

    it("is zero for an empty or single-point path", () => {
      expect(new GeoPath().length()).toBe(0);
      expect(new GeoPath([c(1, 1)]).length(0, 0, { closedLoop: true })).toBe(0);
    });

    it("rejects a start index outside the path", () => {
      expect(() => makeEquatorPath().length(5)).toThrow(IndexOutOfBoundsError);
    });
  });

  describe("boundingGeoRectangle", () => {
    it("is invalid for an empty path", () => {
      expect(new GeoPath().boundingGeoRectangle().isValid()).toBe(false);
    });

    it("bounds every point", () => {
      const path = new GeoPath([c(0, 0), c(10, 10), c(5, -5)]);
      const bounds = path.boundingGeoRectangle();
      expect(bounds.topLeft.isEqual(c(10, -5))).toBe(true);
      expect(bounds.bottomRight.isEqual(c(0, 10))).toBe(true);
    });

    it("is recomputed after mutation", () => {
      const path = new GeoPath([c(0, 0), c(10, 10), c(5, -5)]);
      path.boundingGeoRectangle();
      path.add(c(20, 0));
      expect(path.boundingGeoRectangle().topLeft.isEqual(c(20, -5))).toBe(true);

      path.remove(3);
      expect(path.boundingGeoRectangle().topLeft.isEqual(c(10, -5))).toBe(true);
    });

    it("is not affected by changes to the returned rectangle", () => {
      const path = makeEquatorPath();
      path.boundingGeoRectangle().translate(10, 10);
      expect(path.boundingGeoRectangle().topLeft.isEqual(c(0, 0))).toBe(true);
    });
  });

  describe("translate", () => {
    it("wraps longitudes across the antimeridian", () => {
      const path = new GeoPath([c(0, 0), c(10, 10)]);
      path.translate(5, 175);
      expect(path.at(0).isEqual(c(5, 175))).toBe(true);
      expect(path.at(1).isEqual(c(15, -175))).toBe(true);
    });

    it("limits the latitude shift at the pole", () => {
      const path = new GeoPath([c(80, 0), c(85, 10)]);
      path.translate(10, 0);
      expect(path.at(0).isEqual(c(85, 0))).toBe(true);
      expect(path.at(1).isEqual(c(90, 10))).toBe(true);
    });

    it("ignores non-finite shifts", () => {
      const path = new GeoPath([c(0, 0), c(10, 10)]);
      path.translate(Number.NaN, 5);
      path.translate(5, Number.NEGATIVE_INFINITY);
      expect(path.at(0).isEqual(c(0, 0))).toBe(true);
      expect(path.at(1).isEqual(c(10, 10))).toBe(true);
    });

    it("keeps altitudes", () => {
      const path = new GeoPath([c(0, 0, 12)]);
      path.translate(1, 1);
      expect(path.at(0).altitude).toBe(12);
    });

    it("translated leaves the original untouched", () => {
      const path = makeEquatorPath();
      const moved = path.translated(0, 10);
      expect(moved.at(0).isEqual(c(0, 10))).toBe(true);
      expect(path.at(0).isEqual(c(0, 0))).toBe(true);
    });
  });

  it("renders every point", () => {
    expect(new GeoPath([c(1, 2), c(3, 4)]).toString()).toBe(
      "[(1.0000000°, 2.0000000°), (3.0000000°, 4.0000000°)]",
    );
  });
});
