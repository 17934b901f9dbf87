#!/usr/bin/env -S npx tsx
/**
 * catalog.ts
 *
 * Command line entry for the component catalog: build the SQLite database
 * from db/tables, dump it back, verify the round-trip, migrate legacy data.
 *
 * Usage:
 *   npx tsx scripts/catalog.ts build
 *   npx tsx scripts/catalog.ts dump
 *   npx tsx scripts/catalog.ts verify --json
 *   npx tsx scripts/catalog.ts migrate --legacy db/legacy.db
 */

import { runCli } from "../src/cli";

// exitCode rather than exit(): `serve` keeps the process alive
process.exitCode = runCli(process.argv.slice(2));
