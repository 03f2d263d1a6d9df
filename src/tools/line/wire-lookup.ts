/**
 * Wire catalog lookup tool for linesag.
 *
 * Lists or filters the loaded wire catalog, or returns one wire's full
 * record. Values are reported in catalog display units.
 */
import { allowableTension, type WireCatalog, type WireRecord } from "../../line/wire.js";
import { optionalString, readArgs, round4 } from "../params.js";

interface WireSummary {
  type: string;
  name: string;
  cross_section_mm2: number;
  diameter_mm: number;
  unit_weight_n_per_m: number;
  resistance_ohm_per_km: number;
  elastic_modulus_gpa: number;
  thermal_expansion_1e6: number;
  breaking_strength_kn: number;
  safety_factor: number;
  allowable_tension_kn: number;
}

function toWireSummary(wire: WireRecord): WireSummary {
  return {
    type: wire.type,
    name: wire.name,
    cross_section_mm2: round4(wire.crossSection * 1e6),
    diameter_mm: round4(wire.diameter * 1000),
    unit_weight_n_per_m: round4(wire.unitWeight),
    resistance_ohm_per_km: round4(wire.resistance),
    elastic_modulus_gpa: round4(wire.elasticModulus / 1e9),
    thermal_expansion_1e6: round4(wire.thermalExpansionCoeff * 1e6),
    breaking_strength_kn: round4(wire.breakingStrength / 1000),
    safety_factor: wire.safetyFactor,
    allowable_tension_kn: round4(allowableTension(wire) / 1000),
  };
}

export function createWireLookupToolDefinition(options: { catalog: WireCatalog }) {
  const { catalog } = options;

  return {
    name: "line_wire_lookup",
    label: "Wire Catalog Lookup",
    description:
      "Look up overhead wire types in the wire catalog: unit weight, cross-section, elastic modulus, " +
      "thermal expansion coefficient, breaking strength and allowable tension. " +
      "Give wire_type for one record, query to filter by type or name, or nothing to list all.",
    parameters: {
      type: "object",
      properties: {
        wire_type: {
          type: "string",
          description: "Exact wire type identifier.",
        },
        query: {
          type: "string",
          description: "Case-insensitive substring matched against wire type and name.",
        },
      },
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const params = readArgs(args);
      const wireType = optionalString(params, "wire_type");

      if (wireType) {
        const wire = catalog.get(wireType);
        if (!wire) {
          throw new Error(`Unknown wire_type '${wireType}'. Call line_wire_lookup with a query to search.`);
        }
        const summary = toWireSummary(wire);
        return {
          content: [
            {
              type: "text",
              text:
                `${summary.type} (${summary.name}): ${summary.cross_section_mm2} mm², ` +
                `${summary.unit_weight_n_per_m} N/m, E = ${summary.elastic_modulus_gpa} GPa, ` +
                `α = ${summary.thermal_expansion_1e6}e-6 /°C, allowable ${summary.allowable_tension_kn} kN`,
            },
            { type: "text", text: JSON.stringify(summary, null, 2) },
          ],
          details: { count: 1, types: [summary.type] },
        };
      }

      const query = optionalString(params, "query") ?? "";
      const matches = catalog.search(query).map(toWireSummary);
      const header = query
        ? `${matches.length} of ${catalog.size} wires match '${query}'.`
        : `${catalog.size} wires in catalog.`;
      const rows = matches.map(
        (w) => `  ${w.type.padEnd(14)} ${w.name.padEnd(28)} ${w.cross_section_mm2} mm²  ${w.unit_weight_n_per_m} N/m`,
      );

      return {
        content: [
          { type: "text", text: [header, ...rows].join("\n") },
          { type: "text", text: JSON.stringify(matches, null, 2) },
        ],
        details: { count: matches.length, types: matches.map((w) => w.type) },
      };
    },
  };
}
