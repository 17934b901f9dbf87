import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import { withCatalogDatabase } from "../../services/catalog-context";
import { verify } from "../../services/verifier";
import type { AppContext } from "../../types";
import { success } from "../../utils/response";

/**
 * POST /v1/verify - Round-trip every table through dump and rebuild
 */
export class PostVerify extends OpenAPIRoute {
  public schema = {
    tags: ["Tables"],
    summary: "Verify dump/build round-trip",
    operationId: "post-verify",
    responses: {
      "200": {
        description: "Per-table verification report",
        content: {
          "application/json": {
            schema: z.object({
              success: z.boolean(),
              data: z.object({
                ok: z.boolean(),
                tables: z.array(
                  z.object({
                    category: z.string(),
                    status: z.enum(["PASS", "FAIL"]),
                    checksum_before: z.string().nullable(),
                    checksum_after: z.string().nullable(),
                    dump_identical: z.boolean(),
                    error: z.string().optional(),
                  })
                ),
              }),
            }),
          },
        },
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
    const report = withCatalogDatabase(catalog, (adapter) => verify(adapter, catalog.registry));

    return success(
      c,
      {
        ok: report.ok,
        tables: report.tables.map((t) => ({
          category: t.category,
          status: t.status,
          checksum_before: t.checksumBefore,
          checksum_after: t.checksumAfter,
          dump_identical: t.dumpIdentical,
          error: t.error,
        })),
      },
      { count: report.tables.length }
    );
  }
}
