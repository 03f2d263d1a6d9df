import { describe, expect, it } from "vitest";
import {
  computeDip,
  computeDipOrTension,
  computeTemperatureAdjusted,
  computeTension,
} from "../src/line/dip-tension.js";
import { InvalidArgumentError } from "../src/line/errors.js";
import type { WireProperties } from "../src/line/wire.js";

const unitWire = { unitWeight: 1 };

// 100 mm², 100 GPa, 17e-6 /°C, 1 N/m
const elasticWire: WireProperties = {
  unitWeight: 1,
  crossSection: 1e-4,
  elasticModulus: 1e11,
  thermalExpansionCoeff: 17e-6,
};

function argumentOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidArgumentError) return err.argument;
    throw err;
  }
  return undefined;
}

describe("computeDip / computeTension", () => {
  it("computes dip from tension", () => {
    expect(computeDip(unitWire, 50, 1000)).toBe(0.3125);
  });

  it("computes tension from dip", () => {
    expect(computeTension(unitWire, 50, 0.5)).toBe(625);
  });

  it("round-trips dip through tension", () => {
    for (const [w, S, D] of [
      [1, 50, 0.5],
      [6.72, 120, 2.4],
      [0.35, 35, 0.08],
    ] as const) {
      const wire = { unitWeight: w };
      expect(computeDip(wire, S, computeTension(wire, S, D))).toBeCloseTo(D, 10);
    }
  });

  it("scales dip with the square of the span", () => {
    expect(computeDip(unitWire, 100, 1000) / computeDip(unitWire, 50, 1000)).toBeCloseTo(4, 12);
  });

  it("rejects non-positive inputs by name", () => {
    expect(argumentOf(() => computeDip({ unitWeight: 0 }, 50, 1000))).toBe("unitWeight");
    expect(argumentOf(() => computeDip(unitWire, -5, 1000))).toBe("span");
    expect(argumentOf(() => computeDip(unitWire, 50, 0))).toBe("tension");
    expect(argumentOf(() => computeTension(unitWire, 50, -0.1))).toBe("dip");
    expect(argumentOf(() => computeTension(unitWire, Number.NaN, 0.5))).toBe("span");
  });

  it("reports the rejected value in the message", () => {
    expect(() => computeDip(unitWire, 50, -2)).toThrow("tension must be a positive number (got -2).");
  });
});

describe("computeDipOrTension", () => {
  it("derives tension from dip", () => {
    expect(computeDipOrTension(unitWire, 50, { dip: 0.5 })).toEqual({ dip: 0.5, tension: 625 });
  });

  it("derives dip from tension", () => {
    expect(computeDipOrTension(unitWire, 50, { tension: 1000 })).toEqual({ dip: 0.3125, tension: 1000 });
  });

  it("requires one of the two", () => {
    expect(() => computeDipOrTension(unitWire, 50, {})).toThrow("Either dip or tension must be given.");
  });

  it("refuses both", () => {
    expect(() => computeDipOrTension(unitWire, 50, { dip: 0.5, tension: 1000 })).toThrow(
      "Give dip or tension, not both.",
    );
  });

  it("validates only the supplied quantity", () => {
    expect(argumentOf(() => computeDipOrTension(unitWire, 50, { tension: -1 }))).toBe("tension");
    expect(argumentOf(() => computeDipOrTension(unitWire, 50, { dip: 0 }))).toBe("dip");
  });
});

describe("computeTemperatureAdjusted", () => {
  it("returns the reference state when the temperature is unchanged", () => {
    const result = computeTemperatureAdjusted(elasticWire, 50, 1000, 20, 20);
    expect(result.dip).toBeCloseTo(0.3125, 9);
    expect(result.tension).toBeCloseTo(1000, 6);
  });

  it("sags more and relaxes when the wire heats up", () => {
    const hot = computeTemperatureAdjusted(elasticWire, 50, 1000, 100, 20);
    expect(hot.dip).toBeGreaterThan(0.3125);
    expect(hot.tension).toBeLessThan(1000);
  });

  it("sags less and tightens when the wire cools", () => {
    const cold = computeTemperatureAdjusted(elasticWire, 50, 1000, -20, 20);
    expect(cold.dip).toBeLessThan(0.3125);
    expect(cold.tension).toBeGreaterThan(1000);
  });

  it("solves dip and tension consistently with the parabolic relation", () => {
    for (const t of [-20, 0, 40, 100]) {
      const state = computeTemperatureAdjusted(elasticWire, 50, 1000, t, 20);
      expect(computeTension(elasticWire, 50, state.dip)).toBeCloseTo(state.tension, 4);
    }
  });

  it("rejects missing elastic data", () => {
    expect(argumentOf(() => computeTemperatureAdjusted({ ...elasticWire, crossSection: 0 }, 50, 1000, 40, 20))).toBe(
      "crossSection",
    );
    expect(
      argumentOf(() => computeTemperatureAdjusted({ ...elasticWire, elasticModulus: -1 }, 50, 1000, 40, 20)),
    ).toBe("elasticModulus");
    expect(
      argumentOf(() =>
        computeTemperatureAdjusted({ ...elasticWire, thermalExpansionCoeff: Number.NaN }, 50, 1000, 40, 20),
      ),
    ).toBe("thermalExpansionCoeff");
  });

  it("rejects a non-positive reference tension", () => {
    expect(() => computeTemperatureAdjusted(elasticWire, 50, 0, 40, 20)).toThrow(InvalidArgumentError);
  });
});
