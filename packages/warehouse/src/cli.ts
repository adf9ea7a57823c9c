import { createBatchJobConfig } from "@destruction/config";
import { createLogger } from "@destruction/observability";

import { checkBatchScript, createBigQueryClient, createWarehouse, loadBatchScript, runBatchDestruction } from "./index.js";

function parseArgs(argv: string[]) {
  const args = new Map<string, string>();
  for (const a of argv) {
    const [k, v] = a.split("=", 2);
    if (k && v && k.startsWith("--")) args.set(k.slice(2), v);
  }
  return args;
}

const [command] = process.argv.slice(2);
const args = parseArgs(process.argv.slice(2));

if (command !== "check" && command !== "run") {
  process.stderr.write("Usage: destruction-batch check|run [--file=path/to/script.sql]\n");
  process.exit(2);
}

const config = createBatchJobConfig(process.env);
const logger = createLogger({ service: "destruction-batch", level: config.LOG_LEVEL });
const sql = await loadBatchScript(args.get("file") ?? config.BATCH_SQL_PATH);

if (command === "check") {
  const violations = checkBatchScript(sql);
  for (const v of violations) process.stderr.write(`${v.rule}: ${v.message}\n`);
  process.exit(violations.length ? 1 : 0);
}

const warehouse = createWarehouse({
  client: createBigQueryClient({ projectId: config.GOOGLE_CLOUD_PROJECT, location: config.BIGQUERY_LOCATION }),
  location: config.BIGQUERY_LOCATION,
  logger
});
await runBatchDestruction({ warehouse, logger, sql });
