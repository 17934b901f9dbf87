/**
 * API Endpoint Tests (in-process)
 *
 * Tests cover:
 * - Health endpoint
 * - OpenAPI document
 * - Table listing, schema and dump endpoints
 * - Verification endpoint
 * - Error responses
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { z } from 'zod';
import type { SqliteAdapter } from '../src/adapters/sqlite';
import { createApp } from '../src/index';
import { buildInto } from '../src/services/builder';
import { dump } from '../src/services/dumper';
import type { CatalogContext } from '../src/types';
import { catalogSources, memoryAdapter, partRow, registry, tempDir } from './helpers';

// =============================================================================
// Helpers
// =============================================================================

const ErrorBody = z.object({
  success: z.literal(false),
  error: z.object({ code: z.string(), message: z.string(), request_id: z.string() }),
});

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data, meta: z.object({ timestamp: z.string() }).passthrough() });
}

function contextFor(adapter: SqliteAdapter | null): CatalogContext {
  return {
    registry,
    tablesDir: tempDir(),
    openDatabase: () => adapter,
    // The shared in-memory adapter outlives each request
    releaseDatabase: () => undefined,
  };
}

let adapter: SqliteAdapter;
let app: ReturnType<typeof createApp>;

beforeAll(() => {
  adapter = memoryAdapter();
  buildInto(adapter, catalogSources({ leds: [partRow('LED-2'), partRow('LED-1', { color: 'red' })] }), { registry });
  app = createApp(contextFor(adapter));
});

afterAll(() => {
  adapter.close();
});

// =============================================================================
// System
// =============================================================================

describe('Health Endpoint', () => {
  it('should return healthy status with a connected database', async () => {
    const response = await app.request('/v1/health');
    const body = envelope(
      z.object({
        status: z.string(),
        service: z.string(),
        timestamp: z.string(),
        checks: z.object({
          database: z.object({ connected: z.boolean() }),
          registry: z.object({ categories: z.number() }),
        }),
      })
    ).parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.data.status).toBe('healthy');
    expect(body.data.service).toBe('eda-catalog');
    expect(body.data.checks.database.connected).toBe(true);
    expect(body.data.checks.registry.categories).toBe(16);
    expect(new Date(body.data.timestamp).toISOString()).toBe(body.data.timestamp);
  });

  it('should report a missing database as disconnected', async () => {
    const response = await createApp(contextFor(null)).request('/v1/health');
    const body = envelope(z.object({ checks: z.object({ database: z.object({ connected: z.boolean() }) }) })).parse(
      await response.json()
    );
    expect(body.data.checks.database.connected).toBe(false);
  });
});

describe('OpenAPI', () => {
  it('should describe the catalog routes', async () => {
    const response = await app.request('/openapi.json');
    const body = z
      .object({ openapi: z.string(), info: z.object({ title: z.string() }), paths: z.record(z.unknown()) })
      .parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.openapi).toMatch(/^3\./);
    expect(body.info.title).toBe('EDA Component Catalog API');
    expect(Object.keys(body.paths)).toContain('/v1/tables/{category}/dump');
  });
});

// =============================================================================
// Tables
// =============================================================================

describe('Tables Endpoints', () => {
  it('should list every registered table with row counts', async () => {
    const response = await app.request('/v1/tables');
    const body = envelope(
      z.object({
        sync_state: z.string().nullable(),
        tables: z.array(z.object({ category: z.string(), text_rows: z.number().nullable(), db_rows: z.number().nullable() })),
      })
    ).parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.data.sync_state).toBe('text-authoritative');
    expect(body.data.tables).toHaveLength(16);
    expect(body.data.tables.find((t) => t.category === 'leds')).toEqual({ category: 'leds', text_rows: null, db_rows: 2 });
    expect(body.meta.count).toBe(16);
  });

  it('should return a registered schema', async () => {
    const response = await app.request('/v1/tables/resistors/schema');
    const body = envelope(
      z.object({
        primary_key: z.array(z.string()),
        part_id_prefix: z.string(),
        columns: z.array(z.object({ name: z.string(), type: z.string(), not_null: z.boolean(), default: z.string().nullable() })),
        create_table_sql: z.string(),
      })
    ).parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.data.part_id_prefix).toBe('RES');
    expect(body.data.primary_key[0]).toBe('mpn');
    expect(body.data.columns[1]).toEqual({ name: 'mpn', type: 'TEXT', not_null: true, default: null });
    expect(body.data.create_table_sql).toBe(registry.createTableSql('resistors'));
  });

  it('should answer 404 for an unknown category', async () => {
    const response = await app.request('/v1/tables/relays/schema');
    const body = ErrorBody.parse(await response.json());

    expect(response.status).toBe(404);
    expect(body.error.code).toBe('UNKNOWN_CATEGORY');
  });

  it('should return the canonical dump as SQL text', async () => {
    const response = await app.request('/v1/tables/leds/dump');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/sql; charset=utf-8');
    expect(await response.text()).toBe(dump(adapter, 'leds', registry));
  });

  it('should answer 503 when the database has not been built', async () => {
    const response = await createApp(contextFor(null)).request('/v1/tables/leds/dump');
    const body = ErrorBody.parse(await response.json());

    expect(response.status).toBe(503);
    expect(body.error.code).toBe('DATABASE_UNAVAILABLE');
  });
});

// =============================================================================
// Verification
// =============================================================================

describe('Verify Endpoint', () => {
  it('should pass every table', async () => {
    const response = await app.request('/v1/verify', { method: 'POST' });
    const body = envelope(
      z.object({
        ok: z.boolean(),
        tables: z.array(z.object({ category: z.string(), status: z.string(), dump_identical: z.boolean() })),
      })
    ).parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.data.ok).toBe(true);
    expect(body.data.tables).toHaveLength(16);
    expect(body.data.tables.every((t) => t.status === 'PASS' && t.dump_identical)).toBe(true);
  });
});
