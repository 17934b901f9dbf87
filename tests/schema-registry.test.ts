/**
 * Tests for the category schema registry
 *
 * Tests cover:
 * - Bundled category set and column order
 * - CREATE TABLE text for single and composite keys
 * - Validation of category definitions
 * - CREATE TABLE text agreeing with what SQLite reports
 */

import { describe, it, expect } from 'vitest';
import { CORE_COLUMN_NAMES, SIMULATION_COLUMNS } from '../src/config/columns';
import { buildDefinitions, SchemaRegistry } from '../src/services/schema-registry';
import { RegistryConfigError, UnknownCategoryError } from '../src/utils/errors';
import { memoryAdapter, registry } from './helpers';

describe('SchemaRegistry - bundled categories', () => {
  it('should register the sixteen catalog categories in sorted order', () => {
    expect(registry.categories()).toEqual([
      'bjt',
      'capacitors',
      'connectors',
      'diodes',
      'ferrites',
      'ic_analog',
      'ic_drivers',
      'ic_logic',
      'ic_memory',
      'ic_microcontrollers',
      'ic_opamp',
      'inductors',
      'leds',
      'mosfet',
      'resistors',
      'switches',
    ]);
  });

  it('should put core, then simulation, then specific columns', () => {
    const names = registry.columnNamesFor('leds');
    expect(names.slice(0, 22)).toEqual(CORE_COLUMN_NAMES);
    expect(names.slice(22, 27)).toEqual(SIMULATION_COLUMNS.map((c) => c.name));
    expect(names.slice(27, 29)).toEqual(['color', 'wavelength']);
  });

  it('should key resistors by their CAD identity and everything else by part_id', () => {
    expect(registry.primaryKeyFor('resistors')).toEqual([
      'mpn',
      'manufacturer',
      'kicad_symbol',
      'kicad_footprint',
      'altium_symbol',
      'altium_footprint',
    ]);
    expect(registry.primaryKeyFor('diodes')).toEqual(['part_id']);
    expect(registry.keyCollationFor('diodes')).toBe('binary');
  });

  it('should expose part id prefixes', () => {
    expect(registry.partIdPrefixFor('leds')).toBe('LED');
    expect(registry.partIdPrefixFor('mosfet')).toBe('FET');
  });

  it('should reject unknown categories', () => {
    expect(() => registry.get('relays')).toThrow(UnknownCategoryError);
    expect(registry.has('relays')).toBe(false);
  });
});

describe('SchemaRegistry - createTableSql', () => {
  it('should declare a single-column key inline', () => {
    const sql = registry.createTableSql('bjt');
    const lines = sql.split('\n');
    expect(lines.slice(0, 4)).toEqual([
      'CREATE TABLE bjt (',
      '    part_id TEXT PRIMARY KEY,',
      '    mpn TEXT NOT NULL,',
      '    manufacturer TEXT NOT NULL,',
    ]);
    expect(lines).toContain("    lifecycle_status TEXT DEFAULT 'Active',");
    expect(lines).toContain('    rohs BOOLEAN DEFAULT TRUE,');
    expect(lines[lines.length - 1]).toBe(')');
  });

  it('should declare a composite key as a table constraint', () => {
    const lines = registry.createTableSql('resistors').split('\n');
    expect(lines.slice(-3)).toEqual([
      '    temp_storage TEXT,',
      '    PRIMARY KEY (mpn, manufacturer, kicad_symbol, kicad_footprint, altium_symbol, altium_footprint)',
      ')',
    ]);
    expect(lines[1]).toBe('    part_id TEXT,');
  });

  it('should create tables whose live columns match the registry', () => {
    const adapter = memoryAdapter();
    for (const category of registry.categories()) {
      adapter.db.exec(registry.createTableSql(category));
      const live = adapter.tableColumns(category).map((c) => `${c.name} ${c.type}`);
      expect(live).toEqual(registry.columnsFor(category).map((c) => `${c.name} ${c.sqlType}`));
    }
    adapter.close();
  });
});

describe('buildDefinitions', () => {
  it('should default the key to part_id and types to TEXT', () => {
    const [def] = buildDefinitions({
      categories: [{ name: 'relays', partIdPrefix: 'REL', columns: ['coil_voltage'] }],
    });
    expect(def.primaryKey).toEqual(['part_id']);
    expect(def.displayName).toBe('relays');
    expect(def.columns[def.columns.length - 1]).toEqual({ name: 'coil_voltage', sqlType: 'TEXT' });
  });

  it('should reject a column that repeats a core column', () => {
    expect(() =>
      buildDefinitions({ categories: [{ name: 'relays', partIdPrefix: 'REL', columns: ['mpn'] }] })
    ).toThrow(RegistryConfigError);
  });

  it('should reject a key column that does not exist', () => {
    expect(() =>
      buildDefinitions({
        categories: [{ name: 'relays', partIdPrefix: 'REL', primaryKey: ['serial'], columns: [] }],
      })
    ).toThrow("Primary key column 'serial' is not a column of 'relays'");
  });

  it('should reject malformed names', () => {
    expect(() => buildDefinitions({ categories: [{ name: 'Bad-Name', partIdPrefix: 'BAD', columns: [] }] })).toThrow(
      RegistryConfigError
    );
  });

  it('should reject a category registered twice', () => {
    const defs = buildDefinitions({ categories: [{ name: 'relays', partIdPrefix: 'REL', columns: [] }] });
    expect(() => new SchemaRegistry([...defs, ...defs])).toThrow("Category 'relays' is registered twice");
  });
});
