import type { AddressInfo } from "node:net";
import http from "node:http";

import type { DestructionApiConfig } from "@destruction/config";
import type { Logger } from "@destruction/observability";
import type { OkStatusResponse } from "@destruction/types";
import type { Warehouse } from "@destruction/warehouse";
import { createDestructionApiConfig } from "@destruction/config";
import { createHttpApp, errorHandler, notFoundHandler } from "@destruction/http";
import { createLogger } from "@destruction/observability";
import { createBigQueryClient, createWarehouse } from "@destruction/warehouse";

import type { TargetRegistry } from "./destruction/protocols.js";
import { createTargetRegistry } from "./destruction/protocols.js";
import { createDataDestructionRouter } from "./routers/dataDestruction.js";

export type DestructionApiContext = {
  config: Pick<DestructionApiConfig, "CORS_ALLOWED_ORIGINS" | "RATE_LIMIT_PER_MINUTE">;
  logger: Logger;
  registry: TargetRegistry;
  warehouse: Pick<Warehouse, "projectId" | "selectExistingKeys" | "deleteByKeys">;
};

export function createDestructionApiApp(ctx: DestructionApiContext) {
  const app = createHttpApp({
    logger: ctx.logger,
    corsAllowedOrigins: ctx.config.CORS_ALLOWED_ORIGINS,
    rateLimitPerMinute: ctx.config.RATE_LIMIT_PER_MINUTE
  });
  app.use((_req, res, next) => {
    res.setHeader("x-content-type-options", "nosniff");
    res.setHeader("cache-control", "no-store");
    next();
  });

  app.get("/healthz", (_req, res) => {
    const body: OkStatusResponse = { status: "ok" };
    res.json(body);
  });

  const openapi = buildOpenApiSpec({ title: "Participant Data Destruction API", version: "1.0.0", protocols: ctx.registry.names() });
  app.get("/openapi.json", (_req, res) => res.json(openapi));

  app.use(createDataDestructionRouter(ctx));
  app.use(notFoundHandler);
  app.use(errorHandler({ logger: ctx.logger }));
  return app;
}

export async function createDestructionApiServer() {
  const config = createDestructionApiConfig(process.env);
  const logger = createLogger({ service: "destruction-api", level: config.LOG_LEVEL });
  const warehouse = createWarehouse({
    client: createBigQueryClient({ projectId: config.GOOGLE_CLOUD_PROJECT, location: config.BIGQUERY_LOCATION }),
    location: config.BIGQUERY_LOCATION,
    logger
  });
  const registry = createTargetRegistry();

  const app = createDestructionApiApp({ config, logger, registry, warehouse });
  const server = http.createServer(app);

  return {
    start: async () => {
      await new Promise<void>((resolve) => {
        server.listen(config.PORT, config.HOST, resolve);
      });
      const addr = server.address() as AddressInfo;
      logger.info({ addr, protocols: registry.names() }, "destruction-api listening");
    },
    stop: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
    logger
  };
}

function buildOpenApiSpec(input: { title: string; version: string; protocols: readonly string[] }) {
  const errorResponse = {
    content: {
      "application/json": {
        schema: { type: "object", required: ["error"], properties: { error: { type: "string" } } }
      }
    }
  };
  return {
    openapi: "3.0.3",
    info: { title: input.title, version: input.version },
    paths: {
      "/healthz": {
        get: {
          summary: "Liveness check",
          responses: { "200": { description: "Service is up" } }
        }
      },
      "/run_bq_data_destruction": {
        post: {
          summary: "Delete a protocol's rows for the given Connect_IDs",
          requestBody: {
            required: true,
            content: {
              "application/json": {
                schema: {
                  type: "object",
                  required: ["protocol", "connect_ids"],
                  properties: {
                    protocol: { type: "string", enum: [...input.protocols] },
                    connect_ids: { type: "array", items: { type: "string" } }
                  }
                }
              }
            }
          },
          responses: {
            "200": {
              description: "Partition of the requested ids into deleted and not found",
              content: {
                "application/json": {
                  schema: {
                    type: "object",
                    required: ["message", "not_found"],
                    properties: {
                      message: { type: "string" },
                      deleted_ids: { type: "array", items: { type: "string" } },
                      not_found: { type: "array", items: { type: "string" } }
                    }
                  }
                }
              }
            },
            "400": { description: "Invalid request or unsupported protocol", ...errorResponse },
            "429": { description: "Rate limit exceeded", ...errorResponse },
            "500": { description: "Warehouse failure", ...errorResponse }
          }
        }
      }
    }
  };
}
