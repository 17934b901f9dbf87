/**
 * Tests for legacy flat-table migration
 *
 * Tests cover:
 * - Value normalization (booleans, integers, defaults)
 * - Column mapping and part id assignment
 * - Reproducible output that rebuilds to identical dumps
 * - Reading the legacy table
 */

import { describe, it, expect } from 'vitest';
import { buildInto } from '../src/services/builder';
import { loadClassificationRules, type LegacyRow } from '../src/services/categorizer';
import { dump } from '../src/services/dumper';
import {
  applyMapping,
  assertMappingsMatchRegistry,
  formatPartId,
  loadFieldMappings,
  mapCategoryRows,
  migrateLegacyRows,
  normalizeBoolean,
  normalizeInteger,
  parseFieldMappings,
  readLegacyRows,
  type MigrationOptions,
} from '../src/services/legacy-migration';
import { CatalogError, RegistryConfigError } from '../src/utils/errors';
import { memoryAdapter, registry } from './helpers';

const CLOCK = new Date('2024-05-01T12:00:00Z');
const STAMP = '2024-05-01T12:00:00.000Z';

const options: MigrationOptions = {
  registry,
  rules: loadClassificationRules(),
  mappings: loadFieldMappings(),
  now: () => CLOCK,
};

// =============================================================================
// Helpers
// =============================================================================

const REFERENCES = ['R', 'C', 'L', 'FB', 'D', 'J', 'LED', 'SW', 'Q', 'U'];
const IC_DESCRIPTIONS = ['op-amp', 'microcontroller', 'logic gate', 'serial flash memory', 'motor driver', 'voltage reference'];

function legacyLibrary(count: number): LegacyRow[] {
  const rows: LegacyRow[] = [];
  for (let i = 0; i < count; i++) {
    const reference = REFERENCES[i % REFERENCES.length];
    const round = Math.floor(i / REFERENCES.length);
    let description = `Part ${i}`;
    if (reference === 'Q') description = round % 2 === 0 ? 'N-channel MOSFET' : 'NPN transistor';
    if (reference === 'U') description = IC_DESCRIPTIONS[round % IC_DESCRIPTIONS.length];

    rows.push({
      Reference: reference,
      Symbol_Name: `SYM_${i}`,
      MPN: `MPN-${i}`,
      Manufacturer: i % 3 === 0 ? '' : 'Acme',
      Description: description,
      Value: String(i),
      RoHS: i % 2 === 0 ? 'YES' : 'no',
      Number_of_Pins: reference === 'J' ? String((i % 40) + 1) : null,
      Material: reference === 'C' ? 'X7R' : null,
    });
  }
  return rows;
}

// =============================================================================
// Normalization
// =============================================================================

describe('value normalization', () => {
  it('should read common boolean spellings', () => {
    expect(normalizeBoolean('yes')).toBe(1n);
    expect(normalizeBoolean(' TRUE ')).toBe(1n);
    expect(normalizeBoolean('N')).toBe(0n);
    expect(normalizeBoolean(0n)).toBe(0n);
    expect(normalizeBoolean('maybe')).toBeNull();
    expect(normalizeBoolean(null)).toBeNull();
  });

  it('should accept only whole numbers as integers', () => {
    expect(normalizeInteger(' 12 ')).toBe(12n);
    expect(normalizeInteger(7)).toBe(7n);
    expect(normalizeInteger('12a')).toBeNull();
    expect(normalizeInteger(2.5)).toBeNull();
  });

  it('should pad part id sequences', () => {
    expect(formatPartId('LED', 7)).toBe('LED-0007');
    expect(formatPartId('RES', 12345)).toBe('RES-12345');
  });

  it('should fill a text default only for missing or empty values', () => {
    const rule = { target: 'mpn', from: ['MPN'], transform: 'text' as const, default: 'UNKNOWN' };
    expect(applyMapping(rule, { MPN: '' }, STAMP)).toBe('UNKNOWN');
    expect(applyMapping(rule, {}, STAMP)).toBe('UNKNOWN');
    expect(applyMapping(rule, { MPN: 'LM358' }, STAMP)).toBe('LM358');
  });

  it('should set a marker value only when the source is present', () => {
    const rule = { target: 'sim_model_type', from: ['Sim_Device'], transform: 'present' as const, value: 'primitive' };
    expect(applyMapping(rule, { Sim_Device: 'R' }, STAMP)).toBe('primitive');
    expect(applyMapping(rule, { Sim_Device: '' }, STAMP)).toBeNull();
  });
});

// =============================================================================
// Mapping
// =============================================================================

describe('mapCategoryRows', () => {
  it('should map legacy fields onto category columns', () => {
    const [mapped] = mapCategoryRows(
      'connectors',
      [
        {
          Reference: 'J',
          Symbol_Name: 'Conn_2',
          MPN: '',
          Manufacturer: null,
          RoHS: 'y',
          Number_of_Pins: '8',
          Component_Type: 'Header',
          Sim_Device: 'X',
          Temp_Operating: '-40°C to +85°C',
        },
      ],
      options,
      STAMP
    );

    expect(mapped).toMatchObject({
      part_id: 'Conn_2',
      mpn: 'UNKNOWN',
      manufacturer: 'Generic',
      lifecycle_status: 'Active',
      rohs: 1n,
      allow_substitution: null,
      standards_version: 'v1.0',
      created_at: STAMP,
      updated_at: STAMP,
      created_by: 'legacy-migration',
      sim_model_type: 'primitive',
      sim_device: 'X',
      connector_type: 'Header',
      pin_count: 8n,
      temp_operating: '-40°C to +85°C',
    });
    expect(Object.keys(mapped)).toEqual(registry.columnNamesFor('connectors'));
  });

  it('should number rows that have no identity', () => {
    const rows = mapCategoryRows('leds', [{ Reference: 'LED' }, { Reference: 'LED', Part_ID: 'LED-RED' }, { Reference: 'LED' }], options, STAMP);
    expect(rows.map((r) => r.part_id)).toEqual(['LED-0001', 'LED-RED', 'LED-0002']);
  });
});

// =============================================================================
// Migration
// =============================================================================

describe('migrateLegacyRows', () => {
  it('should account for every legacy row', () => {
    const legacy = [...legacyLibrary(20), { Reference: 'X', Symbol_Name: 'Mystery' }];
    const result = migrateLegacyRows(legacy, options);

    const migrated = Object.values(result.report.counts).reduce((a, b) => a + b, 0);
    expect(result.report.total).toBe(21);
    expect(migrated).toBe(20);
    expect(result.report.unclassified).toEqual([
      { index: 20, reason: 'unclassified', discriminant: 'X', identity: 'Mystery' },
    ]);
    expect(result.tables.map((t) => t.category)).toEqual(registry.categories());
  });

  it('should produce the same text on every run', () => {
    const legacy = legacyLibrary(162);
    const first = migrateLegacyRows(legacy, options);
    const second = migrateLegacyRows([...legacy].reverse(), options);

    expect(first.report.unclassified).toEqual([]);
    expect(first.report.failures).toEqual([]);
    expect(second.sources).toEqual(first.sources);
  });

  it('should produce text that rebuilds and dumps back unchanged', () => {
    const result = migrateLegacyRows(legacyLibrary(162), options);
    const adapter = memoryAdapter();
    const built = buildInto(adapter, result.sources, { registry, recordSync: false });

    expect(built.ok).toBe(true);
    for (const table of result.tables) {
      expect(dump(adapter, table.category, registry)).toBe(table.sql);
    }
    expect(adapter.countRows('bjt') + adapter.countRows('mosfet')).toBe(16);
    adapter.close();
  });

  it('should fail a category whose mapped keys collide', () => {
    const legacy: LegacyRow[] = [
      { Reference: 'D', Part_ID: 'D-1', Symbol_Name: 'D_a' },
      { Reference: 'D', Part_ID: 'D-1', Symbol_Name: 'D_b' },
      { Reference: 'LED', Symbol_Name: 'LED_a' },
    ];
    const result = migrateLegacyRows(legacy, options);

    expect(result.report.failures.map((f) => f.category)).toEqual(['diodes']);
    expect(result.report.counts.leds).toBe(1);
    expect(result.tables.map((t) => t.category)).not.toContain('diodes');
  });
});

// =============================================================================
// Configuration and input
// =============================================================================

describe('field mappings file', () => {
  it('should agree with the registry', () => {
    expect(() => assertMappingsMatchRegistry(options.mappings, registry)).not.toThrow();
  });

  it('should reject a constant without a value', () => {
    expect(() => parseFieldMappings({ rules: [{ target: 'created_by', transform: 'constant' }] })).toThrow(
      "Mapping for 'created_by' needs a value"
    );
  });

  it('should reject a scoped mapping to a column the category lacks', () => {
    const mappings = parseFieldMappings({
      rules: [{ target: 'color', from: ['Color'], transform: 'text', categories: ['bjt'] }],
    });
    expect(() => assertMappingsMatchRegistry(mappings, registry)).toThrow(RegistryConfigError);
  });
});

describe('readLegacyRows', () => {
  it('should return every row of the legacy table', () => {
    const adapter = memoryAdapter();
    adapter.db.exec("CREATE TABLE symbols (Reference TEXT, Symbol_Name TEXT); INSERT INTO symbols VALUES ('R', 'R_1'), ('C', NULL);");
    expect(readLegacyRows(adapter, 'symbols')).toEqual([
      { Reference: 'R', Symbol_Name: 'R_1' },
      { Reference: 'C', Symbol_Name: null },
    ]);
    adapter.close();
  });

  it('should raise when the table is missing', () => {
    const adapter = memoryAdapter();
    try {
      readLegacyRows(adapter, 'symbols');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CatalogError);
      if (err instanceof CatalogError) expect(err.code).toBe('LEGACY_TABLE_MISSING');
    }
    adapter.close();
  });
});
