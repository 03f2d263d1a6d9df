/**
 * Overhead line dip/tension tool for linesag.
 *
 * Relates dip and tension for a single span (level or inclined), re-solves
 * the span at the lowest and highest design temperatures, and checks the
 * tension of every state against the wire's allowable working tension.
 * Can save the catenary curves of all states as one SVG.
 */
import fs from "node:fs";
import path from "node:path";
import { computeDipOrTension } from "../../line/dip-tension.js";
import { DEFAULT_SAMPLE_COUNT, type SpanGeometry } from "../../line/catenary.js";
import {
  buildState,
  evaluateScenarios,
  type ScenarioState,
  type TemperatureCase,
} from "../../line/scenarios.js";
import { renderCurvesSvg } from "../../line/svg.js";
import {
  allowableTension,
  type WireCatalog,
  type WireLoading,
  type WireProperties,
} from "../../line/wire.js";
import {
  isRecord,
  optionalNumber,
  optionalPositive,
  optionalString,
  readArgs,
  requiredPositive,
  round4,
  type RawArgs,
} from "../params.js";

// ─── Types ───────────────────────────────────────────────────────────────────

interface ResolvedWire {
  label: string;
  loading: WireLoading;
  /** Present when the elastic and thermal data needed for temperature cases are known. */
  elastic?: WireProperties;
  allowable_tension_n?: number;
}

interface StateResult {
  label: string;
  temperature_c: number;
  dip_m: number;
  tension_kn: number;
  apex_offset_m: number;
  apex_within_span: boolean;
  lowest_point: { x_m: number; y_m: number };
  tension_utilization?: number;
  points: Array<{ x_m: number; y_m: number }>;
}

interface DipTensionResult {
  wire: string;
  span_m: number;
  height1_m: number;
  height2_m?: number;
  span_case: "level" | "inclined";
  reference_temperature_c: number;
  allowable_tension_kn?: number;
  status?: "PASS" | "FAIL";
  warnings: string[];
  states: StateResult[];
  output_path?: string;
}

interface DipTensionInput {
  wire: ResolvedWire;
  span_m: number;
  dip_m?: number;
  tension_kn?: number;
  height1_m: number;
  height2_m?: number;
  reference_c: number;
  cases: TemperatureCase[];
  num_points: number;
  output_path?: string;
}

const DEFAULT_HEIGHT_M = 10;
const DEFAULT_REFERENCE_C = 10;
// Beyond this dip/span ratio the parabola drifts from the true catenary
const SAG_RATIO_LIMIT = 0.1;

// ─── Argument parsing ────────────────────────────────────────────────────────

function resolveWire(params: RawArgs, catalog: WireCatalog): ResolvedWire {
  const wireType = optionalString(params, "wire_type");
  const inline = params.wire;

  if (wireType && inline !== undefined) {
    throw new Error("Give either wire_type or wire, not both.");
  }

  if (wireType) {
    const record = catalog.require(wireType);
    return {
      label: `${record.type} (${record.name})`,
      loading: record,
      elastic: record,
      allowable_tension_n: allowableTension(record),
    };
  }

  if (!isRecord(inline)) {
    throw new Error("Either wire_type (catalog lookup) or a wire object is required.");
  }

  const unitWeight = requiredPositive(inline, "unit_weight_n_per_m", "wire.unit_weight_n_per_m");
  const area = optionalPositive(inline, "cross_section_mm2", "wire.cross_section_mm2");
  const modulus = optionalPositive(inline, "elastic_modulus_gpa", "wire.elastic_modulus_gpa");
  const expansion = optionalNumber(inline, "thermal_expansion_1e6", "wire.thermal_expansion_1e6");
  const breaking = optionalPositive(inline, "breaking_strength_kn", "wire.breaking_strength_kn");
  const safety = optionalPositive(inline, "safety_factor", "wire.safety_factor");

  const elastic =
    area !== undefined && modulus !== undefined && expansion !== undefined
      ? {
          unitWeight,
          crossSection: area * 1e-6,
          elasticModulus: modulus * 1e9,
          thermalExpansionCoeff: expansion * 1e-6,
        }
      : undefined;

  return {
    label: optionalString(inline, "name") ?? "custom wire",
    loading: { unitWeight },
    elastic,
    allowable_tension_n:
      breaking !== undefined && safety !== undefined
        ? allowableTension({ breakingStrength: breaking * 1000, safetyFactor: safety })
        : undefined,
  };
}

function parseTemperatures(raw: unknown): { reference: number; cases: TemperatureCase[] } {
  if (raw === undefined || raw === null) {
    return { reference: DEFAULT_REFERENCE_C, cases: [] };
  }
  if (!isRecord(raw)) {
    throw new Error("temperatures must be an object with reference_c, min_c and/or max_c.");
  }

  const reference = optionalNumber(raw, "reference_c", "temperatures.reference_c") ?? DEFAULT_REFERENCE_C;
  const cases: TemperatureCase[] = [];
  const min = optionalNumber(raw, "min_c", "temperatures.min_c");
  if (min !== undefined) cases.push({ label: "minimum", temperature: min });
  const max = optionalNumber(raw, "max_c", "temperatures.max_c");
  if (max !== undefined) cases.push({ label: "maximum", temperature: max });

  return { reference, cases };
}

// ─── Analysis ────────────────────────────────────────────────────────────────

function analyzeSpan(input: DipTensionInput): { result: DipTensionResult; states: ScenarioState[] } {
  const { wire, span_m: S, height1_m, height2_m, reference_c, cases, num_points, output_path } = input;

  const reference = computeDipOrTension(wire.loading, S, {
    dip: input.dip_m,
    tension: input.tension_kn === undefined ? undefined : input.tension_kn * 1000,
  });

  const geometry: SpanGeometry =
    height2_m === undefined ? { span: S, height1: height1_m } : { span: S, height1: height1_m, height2: height2_m };

  let states: ScenarioState[];
  if (cases.length > 0) {
    if (!wire.elastic) {
      throw new Error(
        "Temperature cases need the wire's cross_section_mm2, elastic_modulus_gpa and thermal_expansion_1e6.",
      );
    }
    states = evaluateScenarios({
      wire: wire.elastic,
      geometry,
      reference,
      referenceTemperature: reference_c,
      cases,
      sampleCount: num_points,
    });
  } else {
    states = [buildState(wire.loading, geometry, "reference", reference_c, reference, num_points)];
  }

  const allowable = wire.allowable_tension_n;
  const warnings: string[] = [];
  const stateResults = states.map((s): StateResult => {
    const ratio = s.dip / S;
    if (ratio > SAG_RATIO_LIMIT) {
      warnings.push(
        `${s.label}: dip/span = ${ratio.toFixed(3)} exceeds ${SAG_RATIO_LIMIT}; the parabolic approximation loses accuracy.`,
      );
    }
    if (!s.curve.apexWithinSpan) {
      warnings.push(`${s.label}: lowest point lies beyond a support (uplift at the lower support).`);
    }
    return {
      label: s.label,
      temperature_c: s.temperature,
      dip_m: round4(s.dip),
      tension_kn: round4(s.tension / 1000),
      apex_offset_m: round4(s.apexOffset),
      apex_within_span: s.curve.apexWithinSpan,
      lowest_point: { x_m: round4(s.curve.lowestPoint.x), y_m: round4(s.curve.lowestPoint.y) },
      tension_utilization: allowable === undefined ? undefined : round4(s.tension / allowable),
      points: s.curve.points.map((p) => ({ x_m: round4(p.x), y_m: round4(p.y) })),
    };
  });

  let status: "PASS" | "FAIL" | undefined;
  if (allowable !== undefined) {
    status = states.every((s) => s.tension <= allowable) ? "PASS" : "FAIL";
  }

  let savedPath: string | undefined;
  if (output_path) {
    const svg = renderCurvesSvg(
      states.map((s) => ({ label: `${s.label} ${s.temperature}°C`, curve: s.curve })),
      { title: `${wire.label} - S = ${S} m${status ? ` - ${status}` : ""}` },
    );
    const resolvedPath = path.resolve(output_path);
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(resolvedPath, svg, "utf-8");
    savedPath = resolvedPath;
  }

  const result: DipTensionResult = {
    wire: wire.label,
    span_m: S,
    height1_m,
    height2_m,
    span_case: height2_m === undefined ? "level" : "inclined",
    reference_temperature_c: reference_c,
    allowable_tension_kn: allowable === undefined ? undefined : round4(allowable / 1000),
    status,
    warnings,
    states: stateResults,
    output_path: savedPath,
  };
  return { result, states };
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createDipTensionToolDefinition(options: { catalog: WireCatalog }) {
  const { catalog } = options;

  return {
    name: "line_dip_tension",
    label: "Wire Dip & Tension",
    description:
      "Calculate the dip (sag) and tension of an overhead wire over one span using the parabolic " +
      "catenary approximation. Give either the dip or the tension; the other is derived. " +
      "Supports level spans and inclined spans (unequal support heights), re-solves the span at " +
      "minimum/maximum temperatures from the reference tension (thermal expansion + elastic stretch), " +
      "checks tension against the allowable working tension, and can save the curves as SVG.",
    parameters: {
      type: "object",
      properties: {
        wire_type: {
          type: "string",
          description: "Wire type identifier from the wire catalog (see line_wire_lookup).",
        },
        wire: {
          type: "object",
          description: "Inline wire properties, used instead of wire_type.",
          properties: {
            name: { type: "string", description: "Display name." },
            unit_weight_n_per_m: { type: "number", description: "Unit weight in N/m." },
            cross_section_mm2: { type: "number", description: "Cross-section in mm² (temperature cases)." },
            elastic_modulus_gpa: { type: "number", description: "Elastic modulus in GPa (temperature cases)." },
            thermal_expansion_1e6: {
              type: "number",
              description: "Linear expansion coefficient in 10⁻⁶/°C (temperature cases).",
            },
            breaking_strength_kn: { type: "number", description: "Rated breaking strength in kN." },
            safety_factor: { type: "number", description: "Safety factor applied to the breaking strength." },
          },
          required: ["unit_weight_n_per_m"],
        },
        span_m: {
          type: "number",
          description: "Horizontal distance between the supports in meters.",
          exclusiveMinimum: 0,
        },
        dip_m: {
          type: "number",
          description: "Dip at the reference temperature in meters. Give this or tension_kn.",
          exclusiveMinimum: 0,
        },
        tension_kn: {
          type: "number",
          description: "Horizontal tension at the reference temperature in kN. Give this or dip_m.",
          exclusiveMinimum: 0,
        },
        height1_m: {
          type: "number",
          description: "Height of support 1 in meters (default: 10).",
        },
        height2_m: {
          type: "number",
          description: "Height of support 2 in meters. Omit for a level span.",
        },
        temperatures: {
          type: "object",
          description: "Temperature cases in °C. Each of min_c / max_c adds a state solved from the reference tension.",
          properties: {
            reference_c: { type: "number", description: "Reference temperature (default: 10)." },
            min_c: { type: "number", description: "Lowest design temperature." },
            max_c: { type: "number", description: "Highest design temperature." },
          },
        },
        output_path: {
          type: "string",
          description: "File path to save the catenary curves as SVG. If not provided, no SVG is generated.",
        },
        num_points: {
          type: "number",
          description: "Number of sample points per curve (default: 100).",
          minimum: 10,
          maximum: 1000,
        },
      },
      required: ["span_m"],
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const params = readArgs(args);

      const wire = resolveWire(params, catalog);
      const spanM = requiredPositive(params, "span_m");
      const dipM = optionalPositive(params, "dip_m");
      const tensionKn = optionalPositive(params, "tension_kn");
      const height1M = optionalNumber(params, "height1_m") ?? DEFAULT_HEIGHT_M;
      const height2M = optionalNumber(params, "height2_m");
      const temperatures = parseTemperatures(params.temperatures);
      const outputPath = optionalString(params, "output_path");
      const requestedPoints = optionalNumber(params, "num_points");
      const numPoints =
        requestedPoints === undefined
          ? DEFAULT_SAMPLE_COUNT
          : Math.max(10, Math.min(1000, Math.round(requestedPoints)));

      const { result, states } = analyzeSpan({
        wire,
        span_m: spanM,
        dip_m: dipM,
        tension_kn: tensionKn,
        height1_m: height1M,
        height2_m: height2M,
        reference_c: temperatures.reference,
        cases: temperatures.cases,
        num_points: numPoints,
        output_path: outputPath,
      });

      // ── Build response text ──
      const heights =
        result.height2_m === undefined
          ? `h = ${result.height1_m} m`
          : `h1 = ${result.height1_m} m, h2 = ${result.height2_m} m`;
      const summary = [
        `Dip/Tension: ${result.wire} | Span: ${spanM} m (${result.span_case}, ${heights})`,
        ``,
        `States:`,
        ...result.states.map((s, idx) => {
          const util = s.tension_utilization === undefined ? "" : ` (utilization ${s.tension_utilization.toFixed(3)})`;
          const dipMm = (states[idx]?.dip ?? s.dip_m) * 1000;
          return `  ${s.label} ${s.temperature_c}°C: dip = ${dipMm.toFixed(2)} mm, T = ${s.tension_kn.toFixed(3)} kN${util}, apex at ${s.apex_offset_m.toFixed(2)} m`;
        }),
      ];

      if (result.allowable_tension_kn !== undefined) {
        summary.push(``, `Allowable tension: ${result.allowable_tension_kn.toFixed(3)} kN`, `Status: ${result.status}`);
      }
      if (result.warnings.length > 0) {
        summary.push(``, `Warnings:`, ...result.warnings.map((w) => `  ${w}`));
      }
      if (result.output_path) {
        summary.push(`Curves saved to: ${result.output_path}`);
      }

      const reference = result.states[0];
      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify(result, null, 2) },
        ],
        details: {
          wire: result.wire,
          span_m: spanM,
          span_case: result.span_case,
          status: result.status,
          reference_dip_m: reference?.dip_m,
          reference_tension_kn: reference?.tension_kn,
          state_count: result.states.length,
        },
      };
    },
  };
}
