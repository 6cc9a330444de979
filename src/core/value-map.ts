/**
 * Value mapping curves for ValueMap nodes.
 *
 * A raw input is normalized into [0, 1] over [inMin, inMax] (clamped),
 * shaped by the curve, then scaled into [outMin, outMax] and clamped
 * again. The mapping is a pure function of its input, so repeated
 * identical events produce identical output.
 */

export type CurveName = "linear" | "log" | "exp" | "step" | "piecewise";

export interface ValueMapSettings {
  inMin: number;
  inMax: number;
  outMin: number;
  outMax: number;
  curve: CurveName;
  /** Quantization steps for the "step" curve */
  steps: number;
  /** Breakpoints for the "piecewise" curve, normalized [x, y] pairs */
  points?: Array<[number, number]>;
  /** Round the result to the nearest integer */
  round: boolean;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Position of `value` in [inMin, inMax] as a fraction in [0, 1]. Inverted ranges map inverted. */
export function normalize(value: number, inMin: number, inMax: number): number {
  return clamp((value - inMin) / (inMax - inMin), 0, 1);
}

/** Linear interpolation across sorted breakpoints; flat beyond the ends. */
export function interpolatePoints(x: number, points: ReadonlyArray<readonly [number, number]>): number {
  const first = points[0];
  const last = points[points.length - 1];
  if (x <= first[0]) return first[1];
  if (x >= last[0]) return last[1];

  for (let i = 1; i < points.length; i++) {
    const [x1, y1] = points[i];
    if (x <= x1) {
      const [x0, y0] = points[i - 1];
      return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
    }
  }
  return last[1];
}

export function applyCurve(n: number, settings: ValueMapSettings): number {
  switch (settings.curve) {
    case "linear":
      return n;
    case "log":
      return Math.log1p(n * (Math.E - 1));
    case "exp":
      return (Math.exp(n) - 1) / (Math.E - 1);
    case "step": {
      const steps = Math.max(1, Math.floor(settings.steps));
      return Math.round(n * steps) / steps;
    }
    case "piecewise":
      return settings.points && settings.points.length >= 2
        ? interpolatePoints(n, settings.points)
        : n;
  }
}

/** Map a raw value through the configured curve into the output range. */
export function mapValue(value: number, settings: ValueMapSettings): number {
  const shaped = applyCurve(normalize(value, settings.inMin, settings.inMax), settings);
  const lo = Math.min(settings.outMin, settings.outMax);
  const hi = Math.max(settings.outMin, settings.outMax);
  const mapped = clamp(settings.outMin + shaped * (settings.outMax - settings.outMin), lo, hi);
  return settings.round ? Math.round(mapped) : mapped;
}
