/**
 * Wire physical properties and the CSV-backed wire catalog.
 *
 * The catalog stores values in the units printed on manufacturer tables
 * (mm², GPa, kN, ×10⁻⁶/°C); everything leaving this module is SI.
 */
import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { InvalidArgumentError, requirePositive } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface WireProperties {
  readonly unitWeight: number; // N/m
  readonly crossSection: number; // m²
  readonly elasticModulus: number; // Pa
  readonly thermalExpansionCoeff: number; // 1/°C
}

/** Enough of a wire to relate dip, tension and curve shape. */
export type WireLoading = Pick<WireProperties, "unitWeight">;

export interface WireRecord extends WireProperties {
  readonly type: string;
  readonly name: string;
  readonly diameter: number; // m
  readonly resistance: number; // Ω/km at 20 °C
  readonly resistanceTempCoeff: number; // 1/°C
  readonly breakingStrength: number; // N
  readonly safetyFactor: number;
}

export function allowableTension(wire: Pick<WireRecord, "breakingStrength" | "safetyFactor">): number {
  return requirePositive("breakingStrength", wire.breakingStrength) / requirePositive("safetyFactor", wire.safetyFactor);
}

// ─── CSV parsing ─────────────────────────────────────────────────────────────

const NUMERIC_COLUMNS = {
  cross_section_mm2: 1e-6,
  diameter_mm: 1e-3,
  unit_weight_n_per_m: 1,
  resistance_ohm_per_km: 1,
  resistance_temp_coef: 1,
  breaking_strength_kn: 1e3,
  safety_factor: 1,
  elastic_modulus_gpa: 1e9,
  thermal_expansion_1e6: 1e-6,
} as const;

type NumericColumn = keyof typeof NUMERIC_COLUMNS;

const POSITIVE_COLUMNS: ReadonlySet<NumericColumn> = new Set<NumericColumn>([
  "cross_section_mm2",
  "unit_weight_n_per_m",
  "breaking_strength_kn",
  "safety_factor",
  "elastic_modulus_gpa",
]);

const REQUIRED_COLUMNS = ["type", "name", ...Object.keys(NUMERIC_COLUMNS)];

interface CsvRow {
  cells: string[];
  line: number;
}

function readRows(csv: string): CsvRow[] {
  const rows: CsvRow[] = [];
  parse(csv, {
    bom: true,
    comment: "#",
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    on_record: (record: string[], context) => {
      rows.push({ cells: record, line: context.lines });
      return null;
    },
  });
  return rows;
}

export function parseWireCatalog(csv: string): WireRecord[] {
  const rows = readRows(csv);

  const header = rows.shift();
  if (!header) {
    throw new Error("Wire catalog is empty.");
  }

  const columns = header.cells;
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      throw new Error(`Wire catalog header is missing column '${required}' (line ${header.line}).`);
    }
  }

  const seen = new Set<string>();
  const records: WireRecord[] = [];

  for (const row of rows) {
    const { cells } = row;
    if (cells.length !== columns.length) {
      throw new Error(
        `Wire catalog line ${row.line}: expected ${columns.length} cells, found ${cells.length}.`,
      );
    }
    const cell = (column: string): string => cells[columns.indexOf(column)] ?? "";
    const num = (column: NumericColumn): number => {
      const raw = cell(column);
      const value = Number(raw);
      if (raw === "" || !Number.isFinite(value)) {
        throw new Error(`Wire catalog line ${row.line}: '${column}' is not a number ('${raw}').`);
      }
      if (POSITIVE_COLUMNS.has(column) && value <= 0) {
        throw new Error(`Wire catalog line ${row.line}: '${column}' must be positive (got ${raw}).`);
      }
      return value * NUMERIC_COLUMNS[column];
    };

    const type = cell("type");
    if (!type) throw new Error(`Wire catalog line ${row.line}: 'type' is empty.`);
    if (seen.has(type)) throw new Error(`Wire catalog line ${row.line}: duplicate type '${type}'.`);
    seen.add(type);

    records.push({
      type,
      name: cell("name"),
      crossSection: num("cross_section_mm2"),
      diameter: num("diameter_mm"),
      unitWeight: num("unit_weight_n_per_m"),
      resistance: num("resistance_ohm_per_km"),
      resistanceTempCoeff: num("resistance_temp_coef"),
      breakingStrength: num("breaking_strength_kn"),
      safetyFactor: num("safety_factor"),
      elasticModulus: num("elastic_modulus_gpa"),
      thermalExpansionCoeff: num("thermal_expansion_1e6"),
    });
  }

  return records;
}

// ─── Catalog ─────────────────────────────────────────────────────────────────

export class WireCatalog {
  private readonly byType = new Map<string, WireRecord>();

  constructor(records: Iterable<WireRecord>) {
    for (const record of records) {
      this.byType.set(record.type, record);
    }
  }

  static fromFile(filePath: string): WireCatalog {
    return new WireCatalog(parseWireCatalog(fs.readFileSync(filePath, "utf-8")));
  }

  get size(): number {
    return this.byType.size;
  }

  get(type: string): WireRecord | undefined {
    return this.byType.get(type);
  }

  require(type: string): WireRecord {
    const wire = this.byType.get(type);
    if (!wire) {
      throw new InvalidArgumentError("wire_type", `Unknown wire type '${type}'.`);
    }
    return wire;
  }

  list(): WireRecord[] {
    return [...this.byType.values()];
  }

  search(query: string): WireRecord[] {
    const lower = query.trim().toLowerCase();
    if (!lower) return this.list();
    return this.list().filter(
      (w) => w.type.toLowerCase().includes(lower) || w.name.toLowerCase().includes(lower),
    );
  }
}
