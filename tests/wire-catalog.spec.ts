import { describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import { allowableTension, parseWireCatalog, WireCatalog } from "../src/line/wire.js";
import { InvalidArgumentError } from "../src/line/errors.js";

const HEADER =
  "type,name,cross_section_mm2,diameter_mm,unit_weight_n_per_m,resistance_ohm_per_km," +
  "resistance_temp_coef,breaking_strength_kn,safety_factor,elastic_modulus_gpa,thermal_expansion_1e6";

const CSV = [
  "# test wires",
  HEADER,
  "T-1,Test copper one,50,9,4.5,0.36,0.004,20,2.5,100,18",
  "",
  "T-2,Test aluminium two,120,14.2,3.3,0.24,0.0040,19.5,2.5,60,23",
].join("\n");

describe("parseWireCatalog", () => {
  const [first, second] = parseWireCatalog(CSV);

  it("skips comments and blank lines", () => {
    expect(parseWireCatalog(CSV)).toHaveLength(2);
    expect(second?.type).toBe("T-2");
  });

  it("converts catalog units to SI", () => {
    expect(first?.type).toBe("T-1");
    expect(first?.name).toBe("Test copper one");
    expect(first?.crossSection).toBeCloseTo(50e-6, 15);
    expect(first?.diameter).toBeCloseTo(0.009, 15);
    expect(first?.unitWeight).toBe(4.5);
    expect(first?.resistance).toBe(0.36);
    expect(first?.resistanceTempCoeff).toBe(0.004);
    expect(first?.breakingStrength).toBe(20000);
    expect(first?.safetyFactor).toBe(2.5);
    expect(first?.elasticModulus).toBe(1e11);
    expect(first?.thermalExpansionCoeff).toBeCloseTo(18e-6, 15);
  });

  it("accepts columns in any order", () => {
    const reordered = [
      "name,type,unit_weight_n_per_m,cross_section_mm2,diameter_mm,resistance_ohm_per_km," +
        "resistance_temp_coef,breaking_strength_kn,safety_factor,elastic_modulus_gpa,thermal_expansion_1e6",
      "Swapped,S-1,2,10,4,1,0.004,5,2,70,20",
    ].join("\n");
    const [wire] = parseWireCatalog(reordered);
    expect(wire?.type).toBe("S-1");
    expect(wire?.unitWeight).toBe(2);
  });

  it("rejects a header without a required column", () => {
    const header = HEADER.replace(",safety_factor", "");
    expect(() => parseWireCatalog(header)).toThrow("Wire catalog header is missing column 'safety_factor' (line 1).");
  });

  it("rejects a row with the wrong number of cells", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,short,1,2`)).toThrow(
      "Wire catalog line 2: expected 11 cells, found 4.",
    );
  });

  it("rejects a non-numeric value", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,heavy,0.36,0.004,20,2.5,100,18`)).toThrow(
      "Wire catalog line 2: 'unit_weight_n_per_m' is not a number ('heavy').",
    );
  });

  it("rejects an empty numeric cell", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,4.5,0.36,0.004,20,,100,18`)).toThrow(
      "Wire catalog line 2: 'safety_factor' is not a number ('').",
    );
  });

  it("rejects duplicate types", () => {
    const row = "T-1,Test copper one,50,9,4.5,0.36,0.004,20,2.5,100,18";
    expect(() => parseWireCatalog(`${HEADER}\n${row}\n${row}`)).toThrow(
      "Wire catalog line 3: duplicate type 'T-1'.",
    );
  });

  it("rejects an empty type", () => {
    expect(() => parseWireCatalog(`${HEADER}\n,No type,50,9,4.5,0.36,0.004,20,2.5,100,18`)).toThrow(
      "Wire catalog line 2: 'type' is empty.",
    );
  });

  it("rejects a file with no header", () => {
    expect(() => parseWireCatalog("# only a comment\n\n")).toThrow("Wire catalog is empty.");
  });
});

describe("allowableTension", () => {
  it("divides breaking strength by the safety factor", () => {
    expect(allowableTension({ breakingStrength: 20000, safetyFactor: 2.5 })).toBe(8000);
  });
});

describe("WireCatalog", () => {
  const catalog = new WireCatalog(parseWireCatalog(CSV));

  it("looks wires up by type", () => {
    expect(catalog.size).toBe(2);
    expect(catalog.get("T-2")?.name).toBe("Test aluminium two");
    expect(catalog.get("missing")).toBeUndefined();
  });

  it("throws an InvalidArgumentError for an unknown required type", () => {
    expect(() => catalog.require("X-9")).toThrow(InvalidArgumentError);
    expect(() => catalog.require("X-9")).toThrow("Unknown wire type 'X-9'.");
  });

  it("lists wires in catalog order", () => {
    expect(catalog.list().map((w) => w.type)).toEqual(["T-1", "T-2"]);
  });

  it("searches type and name case-insensitively", () => {
    expect(catalog.search("ALUMINIUM").map((w) => w.type)).toEqual(["T-2"]);
    expect(catalog.search("t-1").map((w) => w.type)).toEqual(["T-1"]);
    expect(catalog.search("test")).toHaveLength(2);
    expect(catalog.search("  ")).toHaveLength(2);
    expect(catalog.search("steel")).toEqual([]);
  });

  it("loads the bundled catalog file", () => {
    const bundled = WireCatalog.fromFile(fileURLToPath(new URL("../config/wire-catalog.csv", import.meta.url)));
    expect(bundled.size).toBe(12);
    const acsr = bundled.require("ACSR-160");
    expect(acsr.unitWeight).toBe(6.72);
    expect(acsr.elasticModulus).toBe(82e9);
    expect(acsr.crossSection).toBeCloseTo(182.8e-6, 12);
    expect(allowableTension(acsr)).toBeCloseTo(57300 / 2.5, 9);
  });
});

describe("parseWireCatalog (quoting and value ranges)", () => {
  it("reads quoted fields, including names with commas", () => {
    const [wire] = parseWireCatalog(
      `${HEADER}\n"ACSR-160","Steel-reinforced aluminium, 160/26",182.8,18.2,6.72,0.182,0.00403,57.3,2.5,82,19.3`,
    );
    expect(wire?.type).toBe("ACSR-160");
    expect(wire?.name).toBe("Steel-reinforced aluminium, 160/26");
    expect(wire?.unitWeight).toBe(6.72);
    expect(wire?.elasticModulus).toBe(82e9);
  });

  it("rejects a zero safety factor", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,4.5,0.36,0.004,20,0,100,18`)).toThrow(
      "Wire catalog line 2: 'safety_factor' must be positive (got 0).",
    );
  });

  it("rejects a negative unit weight", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,-4.5,0.36,0.004,20,2.5,100,18`)).toThrow(
      "Wire catalog line 2: 'unit_weight_n_per_m' must be positive (got -4.5).",
    );
  });

  it("rejects non-positive section, strength and modulus", () => {
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,0,9,4.5,0.36,0.004,20,2.5,100,18`)).toThrow(
      /'cross_section_mm2' must be positive/,
    );
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,4.5,0.36,0.004,-1,2.5,100,18`)).toThrow(
      /'breaking_strength_kn' must be positive/,
    );
    expect(() => parseWireCatalog(`${HEADER}\nT-1,Bad,50,9,4.5,0.36,0.004,20,2.5,0,18`)).toThrow(
      /'elastic_modulus_gpa' must be positive/,
    );
  });

  it("allows a negative expansion coefficient", () => {
    const [wire] = parseWireCatalog(`${HEADER}\nT-1,Invar,50,9,4.5,0.36,0.004,20,2.5,100,-1`);
    expect(wire?.thermalExpansionCoeff).toBeCloseTo(-1e-6, 15);
  });
});

describe("allowableTension (guards)", () => {
  it("refuses a non-positive safety factor or breaking strength", () => {
    expect(() => allowableTension({ breakingStrength: 20000, safetyFactor: 0 })).toThrow(InvalidArgumentError);
    expect(() => allowableTension({ breakingStrength: -1, safetyFactor: 2.5 })).toThrow(
      "breakingStrength must be a positive number (got -1).",
    );
  });
});
