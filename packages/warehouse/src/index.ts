import type { Logger } from "@destruction/observability";

import { BigQuery } from "@google-cloud/bigquery";
import { z } from "zod";

export { checkBatchScript, defaultBatchScriptPath, loadBatchScript, runBatchDestruction, splitStatements } from "./batch.js";
export type { BatchViolation } from "./batch.js";

export type TableRef = {
  dataset: string;
  table: string;
  keyColumn: string;
};

export type WarehouseQuery = {
  query: string;
  params?: Record<string, string[]>;
  types?: Record<string, string[]>;
  location?: string;
};

// The subset of the BigQuery client the warehouse relies on; tests substitute an in-process stub.
export type WarehouseClient = {
  getProjectId: () => Promise<string>;
  query: (options: WarehouseQuery) => Promise<unknown[]>;
};

export type Warehouse = ReturnType<typeof createWarehouse>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PROJECT_ID = /^[A-Za-z0-9][A-Za-z0-9.:_-]*$/;

const keyRowsSchema = z.array(z.object({ target_key: z.string() }));

export function createBigQueryClient(opts: { projectId?: string; location: string }): WarehouseClient {
  const bigquery = new BigQuery({ projectId: opts.projectId, location: opts.location });
  return {
    getProjectId: () => bigquery.getProjectId(),
    query: async (options) => {
      const [rows] = await bigquery.query(options);
      return rows;
    }
  };
}

export function isSqlIdentifier(value: string) {
  return IDENTIFIER.test(value);
}

export function qualifiedTableName(project: string, ref: Pick<TableRef, "dataset" | "table">) {
  if (!PROJECT_ID.test(project)) throw new Error(`Invalid project id: ${project}`);
  if (!isSqlIdentifier(ref.dataset)) throw new Error(`Invalid dataset name: ${ref.dataset}`);
  if (!isSqlIdentifier(ref.table)) throw new Error(`Invalid table name: ${ref.table}`);
  return `${project}.${ref.dataset}.${ref.table}`;
}

function keyColumn(ref: TableRef) {
  if (!isSqlIdentifier(ref.keyColumn)) throw new Error(`Invalid key column: ${ref.keyColumn}`);
  return ref.keyColumn;
}

export function createWarehouse(opts: { client: WarehouseClient; location: string; logger: Logger }) {
  const { client, location, logger } = opts;

  return {
    projectId: () => client.getProjectId(),

    async selectExistingKeys(project: string, ref: TableRef, keys: readonly string[]) {
      const column = keyColumn(ref);
      const table = qualifiedTableName(project, ref);
      const rows = await client.query({
        query: `select \`${column}\` as target_key from \`${table}\` where \`${column}\` in unnest(@connect_ids)`,
        params: { connect_ids: [...keys] },
        types: { connect_ids: ["STRING"] },
        location
      });
      const existing = new Set(keyRowsSchema.parse(rows).map((r) => r.target_key));
      logger.debug({ table, requested: keys.length, existing: existing.size }, "warehouse key lookup");
      return existing;
    },

    async deleteByKeys(project: string, ref: TableRef, keys: readonly string[]) {
      const column = keyColumn(ref);
      const table = qualifiedTableName(project, ref);
      await client.query({
        query: `delete from \`${table}\` where \`${column}\` in unnest(@connect_ids)`,
        params: { connect_ids: [...keys] },
        types: { connect_ids: ["STRING"] },
        location
      });
      logger.debug({ table, requested: keys.length }, "warehouse delete issued");
    },

    async runStatement(sql: string) {
      await client.query({ query: sql, location });
    }
  };
}
