/**
 * Closed-form real roots of low-order polynomials.
 */
import { NumericalDivergenceError } from "./errors.js";

const EPS = 1e-12;
const ROOT_MERGE_TOLERANCE = 1e-9;

export function solveQuadratic(a: number, b: number, c: number): number[] {
  if (Math.abs(a) < EPS) {
    if (Math.abs(b) < EPS) return [];
    return [-c / b];
  }

  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) return [];

  const sqrtD = Math.sqrt(discriminant);
  return [(-b + sqrtD) / (2 * a), (-b - sqrtD) / (2 * a)];
}

/**
 * Real roots of a3·x³ + a2·x² + a1·x + a0.
 * Cardano's form when there is a single real root, the trigonometric form
 * when there are three.
 */
export function solveCubic(a3: number, a2: number, a1: number, a0: number): number[] {
  if (Math.abs(a3) < EPS) {
    return solveQuadratic(a2, a1, a0);
  }

  const p = a2 / a3;
  const q = a1 / a3;
  const r = a0 / a3;

  const Q = (3 * q - p * p) / 9;
  const R = (9 * p * q - 27 * r - 2 * p * p * p) / 54;
  const D = Q * Q * Q + R * R;

  if (D >= 0) {
    // S·T = −Q; take the larger-magnitude cube root directly and derive the other
    const sqrtD = Math.sqrt(D);
    const S = Math.cbrt(R >= 0 ? R + sqrtD : R - sqrtD);
    const T = S === 0 ? 0 : -Q / S;
    return [-p / 3 + S + T];
  }

  const theta = Math.acos(R / Math.sqrt(-Q * Q * Q));
  const sqrtQ = Math.sqrt(-Q);
  return [
    2 * sqrtQ * Math.cos(theta / 3) - p / 3,
    2 * sqrtQ * Math.cos((theta + 2 * Math.PI) / 3) - p / 3,
    2 * sqrtQ * Math.cos((theta + 4 * Math.PI) / 3) - p / 3,
  ];
}

/**
 * Picks the positive real root of a state equation.
 *
 * Roots closer than a relative 1e-9 count as one. Anything other than
 * exactly one distinct positive root raises NumericalDivergenceError.
 */
export function selectPositiveRoot(roots: number[], quantity: string): number {
  const positive = roots
    .filter((r) => Number.isFinite(r) && r > 0)
    .sort((a, b) => a - b);

  const distinct: number[] = [];
  for (const root of positive) {
    const last = distinct[distinct.length - 1];
    if (last !== undefined && Math.abs(root - last) <= ROOT_MERGE_TOLERANCE * Math.max(1, root)) {
      continue;
    }
    distinct.push(root);
  }

  const [only] = distinct;
  if (only === undefined) {
    throw new NumericalDivergenceError(
      quantity,
      `No positive real root for ${quantity} (roots: ${formatRoots(roots)}).`,
      roots,
    );
  }
  if (distinct.length > 1) {
    throw new NumericalDivergenceError(
      quantity,
      `Ambiguous ${quantity}: ${distinct.length} positive real roots (${formatRoots(distinct)}).`,
      roots,
    );
  }
  return only;
}

function formatRoots(roots: number[]): string {
  return roots.length > 0 ? roots.map((r) => r.toPrecision(6)).join(", ") : "none";
}
