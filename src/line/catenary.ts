/**
 * Samples the parabolic catenary of a span for plotting.
 *
 * Level span: vertex at mid-span, `dip` below the supports.
 * Inclined span: the vertex shifts toward the lower support by
 * T·(h2 − h1)/(w·S) and the curve passes through both support points.
 */
import { InvalidArgumentError, requireFinite, requirePositive } from "./errors.js";
import type { Solution } from "./dip-tension.js";
import type { WireLoading } from "./wire.js";

export const DEFAULT_SAMPLE_COUNT = 100;

export interface SpanGeometry {
  span: number; // m
  height1: number; // m
  height2?: number; // m, present for an inclined span
}

export interface CurvePoint {
  x: number;
  y: number;
}

export interface CatenaryCurve {
  points: CurvePoint[];
  /** Horizontal distance from support 1 to the vertex. */
  apexOffset: number;
  /** False when the vertex lies beyond a support (uplift). */
  apexWithinSpan: boolean;
  lowestPoint: CurvePoint;
}

export function generateCurve(
  wire: WireLoading,
  geometry: SpanGeometry,
  solution: Solution,
  sampleCount: number = DEFAULT_SAMPLE_COUNT,
): CatenaryCurve {
  const w = requirePositive("unitWeight", wire.unitWeight);
  const S = requirePositive("span", geometry.span);
  const T = requirePositive("tension", solution.tension);
  const h1 = requireFinite("height1", geometry.height1);
  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new InvalidArgumentError("sampleCount", `sampleCount must be an integer >= 2 (got ${sampleCount}).`);
  }

  const k = w / (2 * T);
  const xs = linspace(S, sampleCount);

  if (geometry.height2 === undefined) {
    const D = requirePositive("dip", solution.dip);
    const apexOffset = S / 2;
    const bottom = h1 - D;
    return {
      points: xs.map((x) => ({ x, y: k * (x - apexOffset) ** 2 + bottom })),
      apexOffset,
      apexWithinSpan: true,
      lowestPoint: { x: apexOffset, y: bottom },
    };
  }

  const h2 = requireFinite("height2", geometry.height2);
  const apexOffset = S / 2 - (T * (h2 - h1)) / (w * S);
  const yOffset = h1 - k * apexOffset * apexOffset;
  const points = xs.map((x) => ({ x, y: k * (x - apexOffset) ** 2 + yOffset }));

  const apexWithinSpan = apexOffset >= 0 && apexOffset <= S;
  let lowestPoint: CurvePoint;
  if (apexWithinSpan) {
    lowestPoint = { x: apexOffset, y: yOffset };
  } else if (apexOffset < 0) {
    lowestPoint = { x: 0, y: h1 };
  } else {
    lowestPoint = { x: S, y: h2 };
  }

  return { points, apexOffset, apexWithinSpan, lowestPoint };
}

/** `count` values from 0 to `end`, both ends exact. */
function linspace(end: number, count: number): number[] {
  const xs: number[] = [];
  for (let i = 0; i < count; i++) {
    xs.push(i === count - 1 ? end : (end * i) / (count - 1));
  }
  return xs;
}
