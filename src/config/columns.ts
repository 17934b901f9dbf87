/**
 * Column Definitions shared by every category table
 *
 * The core columns and their relative order are the canonicity contract of
 * the catalog: every CREATE TABLE, every INSERT column list and every dump is
 * emitted in this order, followed by the simulation columns and then the
 * category-specific columns from categories.json.
 */

export interface ColumnDefinition {
  name: string;
  sqlType: string;
  /** SQL text of the DEFAULT clause, emitted verbatim (e.g. `'Active'`, `TRUE`). */
  default?: string;
  notNull?: boolean;
}

// =============================================================================
// Core columns (22)
// =============================================================================

export const CORE_COLUMNS: readonly ColumnDefinition[] = [
  // Identity
  { name: "part_id", sqlType: "TEXT" },
  { name: "mpn", sqlType: "TEXT", notNull: true },
  { name: "manufacturer", sqlType: "TEXT", notNull: true },

  // Physical / display
  { name: "package", sqlType: "TEXT" },
  { name: "value", sqlType: "TEXT" },

  // Documentation
  { name: "description", sqlType: "TEXT" },
  { name: "datasheet", sqlType: "TEXT" },
  { name: "manufacturer_link", sqlType: "TEXT" },

  // CAD cross-reference
  { name: "kicad_symbol", sqlType: "TEXT" },
  { name: "kicad_footprint", sqlType: "TEXT" },
  { name: "altium_symbol", sqlType: "TEXT" },
  { name: "altium_footprint", sqlType: "TEXT" },

  // Supply chain / lifecycle
  { name: "lifecycle_status", sqlType: "TEXT", default: "'Active'" },
  { name: "rohs", sqlType: "BOOLEAN", default: "TRUE" },
  { name: "rohs_document_link", sqlType: "TEXT" },

  // Process control
  { name: "allow_substitution", sqlType: "BOOLEAN", default: "TRUE" },
  { name: "tracking", sqlType: "BOOLEAN", default: "FALSE" },
  { name: "standards_version", sqlType: "TEXT", default: "'v1.0'" },
  { name: "bom_comment", sqlType: "TEXT" },

  // Audit metadata
  { name: "created_at", sqlType: "TIMESTAMP", default: "CURRENT_TIMESTAMP" },
  { name: "updated_at", sqlType: "TIMESTAMP", default: "CURRENT_TIMESTAMP" },
  { name: "created_by", sqlType: "TEXT" },
];

// =============================================================================
// Simulation columns (carried as opaque text)
// =============================================================================

export const SIMULATION_COLUMNS: readonly ColumnDefinition[] = [
  { name: "sim_model_type", sqlType: "TEXT" },
  { name: "sim_device", sqlType: "TEXT" },
  { name: "sim_pins", sqlType: "TEXT" },
  { name: "sim_model_file", sqlType: "TEXT" },
  { name: "sim_params", sqlType: "TEXT" },
];

export const CORE_COLUMN_NAMES = CORE_COLUMNS.map((c) => c.name);

/** Tables that may live in the catalog database but are never dumped or verified. */
export const SETTINGS_TABLE = "settings";
