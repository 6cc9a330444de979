import { describe, it, expect } from "vitest";
import {
  applyCurve,
  interpolatePoints,
  mapValue,
  normalize,
  type ValueMapSettings,
} from "../../src/core/value-map.js";

const base: ValueMapSettings = {
  inMin: 0,
  inMax: 127,
  outMin: 0,
  outMax: 1,
  curve: "linear",
  steps: 8,
  round: false,
};

describe("normalize", () => {
  it("clamps values outside the input range", () => {
    expect(normalize(-10, 0, 127)).toBe(0);
    expect(normalize(200, 0, 127)).toBe(1);
  });

  it("maps an inverted range inverted", () => {
    expect(normalize(127, 127, 0)).toBe(0);
    expect(normalize(0, 127, 0)).toBe(1);
  });
});

describe("mapValue", () => {
  it("maps the input range linearly onto the output range", () => {
    expect(mapValue(0, base)).toBe(0);
    expect(mapValue(127, base)).toBe(1);
    expect(mapValue(63.5, base)).toBeCloseTo(0.5, 10);
  });

  it("scales into a wider output range and rounds when asked", () => {
    const settings = { ...base, outMin: 0, outMax: 100, round: true };
    expect(mapValue(64, settings)).toBe(50);
  });

  it("keeps the output inside an inverted output range", () => {
    const settings = { ...base, outMin: 1, outMax: 0 };
    expect(mapValue(0, settings)).toBe(1);
    expect(mapValue(127, settings)).toBe(0);
    expect(mapValue(500, settings)).toBe(0);
  });
});

describe("applyCurve", () => {
  it("log and exp curves keep the endpoints", () => {
    for (const curve of ["log", "exp"] as const) {
      expect(applyCurve(0, { ...base, curve })).toBeCloseTo(0, 10);
      expect(applyCurve(1, { ...base, curve })).toBeCloseTo(1, 10);
    }
  });

  it("log rises faster than linear and exp slower", () => {
    expect(applyCurve(0.5, { ...base, curve: "log" })).toBeGreaterThan(0.5);
    expect(applyCurve(0.5, { ...base, curve: "exp" })).toBeLessThan(0.5);
  });

  it("step quantizes to the configured number of steps", () => {
    const settings = { ...base, curve: "step" as const, steps: 4 };
    expect(applyCurve(0.3, settings)).toBe(0.25);
    expect(applyCurve(0.4, settings)).toBe(0.5);
  });

  it("piecewise interpolates between breakpoints", () => {
    const points: Array<[number, number]> = [
      [0, 0],
      [0.5, 0.8],
      [1, 1],
    ];
    expect(applyCurve(0.25, { ...base, curve: "piecewise", points })).toBeCloseTo(0.4, 10);
    expect(applyCurve(0.75, { ...base, curve: "piecewise", points })).toBeCloseTo(0.9, 10);
  });
});

describe("interpolatePoints", () => {
  it("is flat beyond the first and last points", () => {
    const points: Array<[number, number]> = [
      [0.2, 0.1],
      [0.8, 0.9],
    ];
    expect(interpolatePoints(0, points)).toBe(0.1);
    expect(interpolatePoints(1, points)).toBe(0.9);
  });
});
