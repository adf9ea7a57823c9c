import { initTelemetry } from "@destruction/observability";

import { createDestructionApiServer } from "./server.js";

const telemetry = await initTelemetry({ serviceName: "destruction-api" });
const server = await createDestructionApiServer();
await server.start();

let stopping = false;
async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  server.logger.info({ signal }, "destruction-api shutting down");
  await server.stop();
  await telemetry.shutdown();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        server.logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}
