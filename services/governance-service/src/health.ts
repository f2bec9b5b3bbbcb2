import type { FastifyInstance } from "fastify";
import type { GovernanceStorage } from "./storage";

export async function registerHealthRoutes(
  app: FastifyInstance,
  storage: Pick<GovernanceStorage, "backend" | "ping">
): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async () => {
    await storage.ping();
    return { status: "ready", storage: storage.backend };
  });
}
