import { computeTemperatureAdjusted, type Solution } from "./dip-tension.js";
import { generateCurve, type CatenaryCurve, type SpanGeometry } from "./catenary.js";
import type { WireLoading, WireProperties } from "./wire.js";

export interface TemperatureCase {
  label: string;
  temperature: number; // °C
}

export interface ScenarioState extends Solution {
  label: string;
  temperature: number;
  apexOffset: number;
  curve: CatenaryCurve;
}

export interface ScenarioInput {
  wire: WireProperties;
  geometry: SpanGeometry;
  /** Dip and tension measured at the reference temperature. */
  reference: Solution;
  referenceTemperature: number;
  cases: TemperatureCase[];
  sampleCount?: number;
}

export function buildState(
  wire: WireLoading,
  geometry: SpanGeometry,
  label: string,
  temperature: number,
  solution: Solution,
  sampleCount?: number,
): ScenarioState {
  const curve = generateCurve(wire, geometry, solution, sampleCount);
  return {
    label,
    temperature,
    dip: solution.dip,
    tension: solution.tension,
    apexOffset: curve.apexOffset,
    curve,
  };
}

/**
 * Reference state followed by one state per temperature case, each solved
 * from the reference tension.
 */
export function evaluateScenarios(input: ScenarioInput): ScenarioState[] {
  const { wire, geometry, reference, referenceTemperature, cases, sampleCount } = input;

  const states = [buildState(wire, geometry, "reference", referenceTemperature, reference, sampleCount)];
  for (const c of cases) {
    const solution = computeTemperatureAdjusted(
      wire,
      geometry.span,
      reference.tension,
      c.temperature,
      referenceTemperature,
    );
    states.push(buildState(wire, geometry, c.label, c.temperature, solution, sampleCount));
  }
  return states;
}
