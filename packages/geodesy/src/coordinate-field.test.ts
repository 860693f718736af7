import { describe, it, expect } from "vitest";
import { clampField, eastwardOffset, isValidField, normalizeLongitude } from "./coordinate-field.js";

describe("isValidField", () => {
  it("accepts latitudes in [-90, 90] inclusive", () => {
    expect(isValidField(90, "latitude")).toBe(true);
    expect(isValidField(-90, "latitude")).toBe(true);
    expect(isValidField(0, "latitude")).toBe(true);
    expect(isValidField(90.0001, "latitude")).toBe(false);
    expect(isValidField(-91, "latitude")).toBe(false);
  });

  it("accepts longitudes in [-180, 180] inclusive", () => {
    expect(isValidField(180, "longitude")).toBe(true);
    expect(isValidField(-180, "longitude")).toBe(true);
    expect(isValidField(120, "longitude")).toBe(true);
    expect(isValidField(180.5, "longitude")).toBe(false);
    expect(isValidField(-181, "longitude")).toBe(false);
  });

  it("does not normalize out-of-range longitudes", () => {
    expect(isValidField(200, "longitude")).toBe(false);
    expect(isValidField(100, "latitude")).toBe(false);
  });

  it("rejects NaN for both fields", () => {
    expect(isValidField(Number.NaN, "latitude")).toBe(false);
    expect(isValidField(Number.NaN, "longitude")).toBe(false);
  });
});

describe("clampField", () => {
  it("clamps latitude to the nearest pole", () => {
    expect(clampField(95, "latitude")).toBe(90);
    expect(clampField(-100, "latitude")).toBe(-90);
  });

  it("clamps longitude instead of wrapping it", () => {
    expect(clampField(200, "longitude")).toBe(180);
    expect(clampField(-181, "longitude")).toBe(-180);
  });

  it("passes in-range values through unchanged", () => {
    expect(clampField(45.5, "latitude")).toBe(45.5);
    expect(clampField(-179.25, "longitude")).toBe(-179.25);
  });

  it("passes NaN through unchanged", () => {
    expect(clampField(Number.NaN, "latitude")).toBeNaN();
    expect(clampField(Number.NaN, "longitude")).toBeNaN();
  });
});

describe("normalizeLongitude", () => {
  it("wraps past the antimeridian", () => {
    expect(normalizeLongitude(190)).toBe(-170);
    expect(normalizeLongitude(-190)).toBe(170);
  });

  it("maps 180 and whole turns onto -180", () => {
    expect(normalizeLongitude(180)).toBe(-180);
    expect(normalizeLongitude(540)).toBe(-180);
    expect(normalizeLongitude(-180)).toBe(-180);
  });

  it("keeps in-range values", () => {
    expect(normalizeLongitude(0)).toBe(0);
    expect(normalizeLongitude(-45)).toBe(-45);
  });
});

describe("eastwardOffset", () => {
  it("measures eastward across the antimeridian", () => {
    expect(eastwardOffset(170, -170)).toBe(20);
    expect(eastwardOffset(-170, 170)).toBe(340);
  });

  it("is zero for equal longitudes", () => {
    expect(eastwardOffset(10, 10)).toBe(0);
  });
});
