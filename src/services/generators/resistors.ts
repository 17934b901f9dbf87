import { readFileSync } from "node:fs";
import { z } from "zod";
import { CatalogError } from "../../utils/errors";
import type { SqlRow } from "../sql-values";

/**
 * Yageo RC series thick-film resistors, E96 (1%) values.
 *
 * Values are handled as integer hundredths of an ohm so that every decade
 * is exact.
 */

export interface PackageSpec {
  power: string;
  voltage: string;
  footprint: string;
}

// A Map keeps size order; object keys like "1206" would enumerate first
export const RC_PACKAGES: ReadonlyMap<string, PackageSpec> = new Map([
  ["0201", { power: "1/20W", voltage: "50V", footprint: "Resistor_SMD:R_0201_0603Metric" }],
  ["0402", { power: "1/16W", voltage: "50V", footprint: "Resistor_SMD:R_0402_1005Metric" }],
  ["0603", { power: "1/10W", voltage: "75V", footprint: "Resistor_SMD:R_0603_1608Metric" }],
  ["0805", { power: "1/8W", voltage: "150V", footprint: "Resistor_SMD:R_0805_2012Metric" }],
  ["1206", { power: "1/4W", voltage: "200V", footprint: "Resistor_SMD:R_1206_3216Metric" }],
  ["2512", { power: "1W", voltage: "500V", footprint: "Resistor_SMD:R_2512_6332Metric" }],
]);

/** Decade exponents: 0 covers 1R..9.76R, 6 covers 1M..9.76M. */
export const DEFAULT_DECADES = [0, 1, 2, 3, 4, 5, 6];

const DATASHEET = "https://www.yageogroup.com/content/datasheet/asset/file/PYU-RC_GROUP_51_ROHS_L";

const SeriesFileSchema = z.object({
  series: z.string(),
  scale: z.literal(100),
  values: z.array(z.number().int().min(100).max(999)).min(1),
});

export function loadE96Values(path: string | URL = new URL("../../config/e96-values.json", import.meta.url)): number[] {
  return SeriesFileSchema.parse(JSON.parse(readFileSync(path, "utf-8"))).values;
}

export type SymbolStyle = "R" | "R_US";

export interface ResistorGeneratorOptions {
  packages?: string[];
  decades?: number[];
  symbol?: SymbolStyle;
  values?: number[];
}

export interface ResistanceNotation {
  /** `4.99K` */
  display: string;
  /** SPICE-friendly: `4.99K`, `10`, `1Meg` */
  simulation: string;
  /** Yageo value code: `4K99L`, `10RL` */
  mpnCode: string;
}

function unitFor(exponent: number): { letter: "R" | "K" | "M"; shift: number; spice: string } {
  if (exponent <= 2) return { letter: "R", shift: 0, spice: "" };
  if (exponent <= 5) return { letter: "K", shift: 3, spice: "K" };
  return { letter: "M", shift: 6, spice: "Meg" };
}

/**
 * @param hundredths E96 base value times 100 (e.g. 499 for 4.99)
 * @param exponent decade, 0..6
 */
export function formatResistance(hundredths: number, exponent: number): ResistanceNotation {
  if (!Number.isInteger(exponent) || exponent < 0 || exponent > 6) {
    throw new CatalogError("INVALID_ARGUMENT", `Decade exponent must be 0..6, got ${exponent}`, "run", 400);
  }
  const unit = unitFor(exponent);
  const scaled = hundredths * 10 ** (exponent - unit.shift);

  const whole = Math.floor(scaled / 100);
  const frac = String(scaled % 100).padStart(2, "0").replace(/0+$/, "");
  const digits = frac ? `${whole}.${frac}` : String(whole);

  return {
    display: `${digits}${unit.letter}`,
    simulation: `${digits}${unit.spice}`,
    mpnCode: `${frac ? `${whole}${unit.letter}${frac}` : `${whole}${unit.letter}`}L`,
  };
}

export function rcMpn(pkg: string, notation: ResistanceNotation): string {
  return `RC${pkg}FR-07${notation.mpnCode}`;
}

export function generateResistorRows(options: ResistorGeneratorOptions = {}): SqlRow[] {
  const packages = options.packages ?? Array.from(RC_PACKAGES.keys());
  const decades = options.decades ?? DEFAULT_DECADES;
  const values = options.values ?? loadE96Values();
  const symbol = `Device:${options.symbol ?? "R_US"}`;

  const rows: SqlRow[] = [];
  for (const pkg of packages) {
    const rating = RC_PACKAGES.get(pkg);
    if (!rating) {
      throw new CatalogError("INVALID_ARGUMENT", `Unknown package '${pkg}'`, "run", 400, {
        packages: Array.from(RC_PACKAGES.keys()),
      });
    }

    for (const exponent of decades) {
      for (const base of values) {
        const notation = formatResistance(base, exponent);
        const mpn = rcMpn(pkg, notation);
        rows.push({
          part_id: `RES-${notation.display}-1%-${rating.power.replace("/", "_")}-200PPM-${pkg}`,
          mpn,
          manufacturer: "Yageo",
          package: pkg,
          value: notation.simulation,
          description: `Resistor ${notation.display} 1% ${rating.power} thick film`,
          datasheet: DATASHEET,
          manufacturer_link: `https://www.yageogroup.com/products/Resistors/part/${mpn}`,
          kicad_symbol: symbol,
          kicad_footprint: rating.footprint,
          altium_symbol: null,
          altium_footprint: null,
          lifecycle_status: "Active",
          rohs: 1n,
          allow_substitution: 1n,
          tracking: 0n,
          standards_version: "v1.0",
          created_by: "generator",
          sim_device: "R",
          sim_pins: "1=+ 2=-",
          sim_params: `r=${notation.simulation}`,
          tolerance: "1%",
          power_rating: rating.power,
          temp_coeff: "±200ppm/°C",
          voltage_rating: rating.voltage,
          composition: "Thick Film",
          temp_operating: "-55°C to +155°C",
        });
      }
    }
  }
  return rows;
}
