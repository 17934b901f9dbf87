import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import { catalogStatus } from "../../services/catalog-files";
import { withCatalogDatabase } from "../../services/catalog-context";
import { dump } from "../../services/dumper";
import type { AppContext } from "../../types";
import { success } from "../../utils/response";

/**
 * GET /v1/tables - Row counts per category in text and database
 */
export class ListTables extends OpenAPIRoute {
  public schema = {
    tags: ["Tables"],
    summary: "List catalog tables",
    operationId: "list-tables",
    responses: {
      "200": {
        description: "Per-table row counts and sync state",
        content: {
          "application/json": {
            schema: z.object({
              success: z.boolean(),
              data: z.object({
                sync_state: z.enum(["text-authoritative", "db-ahead-of-text"]).nullable(),
                tables: z.array(
                  z.object({
                    category: z.string(),
                    text_rows: z.number().nullable(),
                    db_rows: z.number().nullable(),
                  })
                ),
              }),
            }),
          },
        },
      },
    },
  };

  public async handle(c: AppContext) {
    const catalog = c.get("catalog");
    const adapter = catalog.openDatabase();
    try {
      const status = catalogStatus(catalog.tablesDir, adapter, catalog.registry);
      return success(
        c,
        {
          sync_state: status.syncState,
          tables: status.tables.map((t) => ({ category: t.category, text_rows: t.textRows, db_rows: t.dbRows })),
        },
        { count: status.tables.length }
      );
    } finally {
      if (adapter) catalog.releaseDatabase(adapter);
    }
  }
}

/**
 * GET /v1/tables/:category/schema - Registry definition of one table
 */
export class GetTableSchema extends OpenAPIRoute {
  public schema = {
    tags: ["Tables"],
    summary: "Get a table's registered schema",
    operationId: "get-table-schema",
    request: {
      params: z.object({
        category: z.string(),
      }),
    },
    responses: {
      "200": {
        description: "Column order, primary key and CREATE TABLE text",
        content: {
          "application/json": {
            schema: z.object({
              success: z.boolean(),
              data: z.object({
                category: z.string(),
                display_name: z.string(),
                part_id_prefix: z.string(),
                primary_key: z.array(z.string()),
                key_collation: z.enum(["binary", "nocase"]),
                columns: z.array(
                  z.object({
                    name: z.string(),
                    type: z.string(),
                    not_null: z.boolean(),
                    default: z.string().nullable(),
                  })
                ),
                create_table_sql: z.string(),
              }),
            }),
          },
        },
      },
      "404": {
        description: "Category is not registered",
      },
    },
  };

  public async handle(c: AppContext) {
    const { registry } = c.get("catalog");
    const data = await this.getValidatedData<typeof this.schema>();
    const def = registry.get(data.params.category);

    return success(c, {
      category: def.name,
      display_name: def.displayName,
      part_id_prefix: def.partIdPrefix,
      primary_key: def.primaryKey,
      key_collation: def.keyCollation,
      columns: def.columns.map((col) => ({
        name: col.name,
        type: col.sqlType,
        not_null: col.notNull ?? false,
        default: col.default ?? null,
      })),
      create_table_sql: registry.createTableSql(def.name),
    });
  }
}

/**
 * GET /v1/tables/:category/dump - Canonical SQL text of one table
 */
export class GetTableDump extends OpenAPIRoute {
  public schema = {
    tags: ["Tables"],
    summary: "Dump a table as canonical SQL",
    operationId: "get-table-dump",
    request: {
      params: z.object({
        category: z.string(),
      }),
    },
    responses: {
      "200": {
        description: "SQL text",
        content: {
          "application/sql": {
            schema: z.string(),
          },
        },
      },
      "404": {
        description: "Category is not registered",
      },
      "409": {
        description: "Live table disagrees with the registry",
      },
      "503": {
        description: "Database not built",
      },
    },
  };

  public async handle(c: AppContext) {
    const catalog = c.get("catalog");
    const data = await this.getValidatedData<typeof this.schema>();
    const category = catalog.registry.get(data.params.category).name;

    const sql = withCatalogDatabase(catalog, (adapter) => dump(adapter, category, catalog.registry));
    return new Response(sql, {
      headers: {
        "Content-Type": "application/sql; charset=utf-8",
        "Content-Disposition": `attachment; filename="${category}.sql"`,
      },
    });
  }
}
