import Fastify from "fastify";
import { registerRoutes } from "./api/routes";
import { config } from "./config";
import { closeDb, migrate } from "./db";
import { createGovernanceEngine } from "./engine";
import { registerHealthRoutes } from "./health";
import { createIntervalJob } from "./jobs/scheduler";
import type { IntervalJob } from "./jobs/scheduler";
import { logger } from "./logger";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { registerTraceHook } from "./trace/trace";

const app = Fastify({ logger: false });
const jobs: IntervalJob[] = [];

async function start(): Promise<void> {
  await startTelemetry();
  await migrate();

  const engine = createGovernanceEngine();
  if (config.policies.seedDefaults) {
    const result = await engine.policies.installDefaultPolicies(
      { id: config.serviceName, role: null, sessionId: null },
      engine.clock.now()
    );
    if (result.status === "ERROR") {
      throw new Error(`Default policy install failed: ${result.message}`);
    }
  }

  if (config.scanner.enabled) {
    jobs.push(
      createIntervalJob({
        name: "compliance-scan",
        intervalMs: config.scanner.intervalMs,
        run: (signal) => engine.scanner.scanCompliance({ signal })
      })
    );
  }
  if (config.retention.enabled) {
    jobs.push(
      createIntervalJob({
        name: "retention-purge",
        intervalMs: config.retention.intervalMs,
        run: (signal) =>
          engine.purger.purge({
            retentionDays: config.retention.retentionDays,
            dryRun: config.retention.dryRun,
            signal
          })
      })
    );
  }

  registerTraceHook(app);
  await registerHealthRoutes(app, engine.storage);
  await registerRoutes(app, engine);

  await app.listen({ port: config.port, host: "0.0.0.0" });
  for (const job of jobs) {
    job.start();
  }
  logger.info({ port: config.port, storage: engine.storage.backend, traceId: "system" }, "Governance service listening");
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: "system" }, "Shutting down governance service");
  await Promise.all(jobs.map((job) => job.stop()));
  await app.close();
  await closeDb();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start governance service");
  process.exit(1);
});
