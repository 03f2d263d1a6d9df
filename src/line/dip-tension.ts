/**
 * Dip/tension relations for a wire hung between two supports.
 *
 * Parabolic approximation: D = w·S² / (8·T). The temperature-adjusted
 * solver combines that with Hooke's law and linear thermal expansion of the
 * wire length L ≈ S + 8D²/(3S), which gives one cubic in D and one in T.
 */
import { InvalidArgumentError, requireFinite, requirePositive } from "./errors.js";
import { selectPositiveRoot, solveCubic } from "./polynomial.js";
import type { WireLoading, WireProperties } from "./wire.js";

export interface Solution {
  dip: number; // m
  tension: number; // N
}

export function computeDip(wire: WireLoading, span: number, tension: number): number {
  const w = requirePositive("unitWeight", wire.unitWeight);
  requirePositive("span", span);
  requirePositive("tension", tension);
  return (w * span * span) / (8 * tension);
}

export function computeTension(wire: WireLoading, span: number, dip: number): number {
  const w = requirePositive("unitWeight", wire.unitWeight);
  requirePositive("span", span);
  requirePositive("dip", dip);
  return (w * span * span) / (8 * dip);
}

/** Exactly one of `dip` / `tension` is given; the other is derived. */
export function computeDipOrTension(
  wire: WireLoading,
  span: number,
  given: { dip?: number; tension?: number },
): Solution {
  const { dip, tension } = given;
  if (dip !== undefined) {
    if (tension !== undefined) {
      throw new InvalidArgumentError("tension", "Give dip or tension, not both.");
    }
    return { dip, tension: computeTension(wire, span, dip) };
  }
  if (tension === undefined) {
    throw new InvalidArgumentError("dip", "Either dip or tension must be given.");
  }
  return { dip: computeDip(wire, span, tension), tension };
}

/**
 * Dip and tension at `targetTemp`, given the tension measured at
 * `referenceTemp`.
 */
export function computeTemperatureAdjusted(
  wire: WireProperties,
  span: number,
  tensionAtReference: number,
  targetTemp: number,
  referenceTemp: number,
): Solution {
  const w = requirePositive("unitWeight", wire.unitWeight);
  const A = requirePositive("crossSection", wire.crossSection);
  const E = requirePositive("elasticModulus", wire.elasticModulus);
  const alpha = requireFinite("thermalExpansionCoeff", wire.thermalExpansionCoeff);
  requireFinite("targetTemp", targetTemp);
  requireFinite("referenceTemp", referenceTemp);

  const T0 = tensionAtReference;
  const D0 = computeDip(wire, span, T0);

  const EA = A * E;
  const thermal = EA * alpha * (targetTemp - referenceTemp);
  const S2 = span * span;

  // d³ + p·d − q = 0
  const p = ((3 * S2) / (8 * EA)) * (T0 - thermal) - D0 * D0;
  const q = (3 * w * S2 * S2) / (64 * EA);
  const dip = selectPositiveRoot(solveCubic(1, 0, p, -q), "dip");

  // t³ − a·t² − c = 0
  const a = T0 - (8 * EA * D0 * D0) / (3 * S2) - thermal;
  const c = (EA * w * w * S2) / 24;
  const tension = selectPositiveRoot(solveCubic(1, -a, 0, -c), "tension");

  return { dip, tension };
}
