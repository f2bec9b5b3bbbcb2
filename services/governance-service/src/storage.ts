import type { Pool } from "pg";
import { PostgresGovernanceLedger } from "./audit/ledger.pg";
import { InMemoryGovernanceLedger } from "./audit/ledger";
import type { GovernanceLedger } from "./audit/ledger";
import { PostgresAccessLogStore, PostgresAuditLogStore } from "./audit/store.pg";
import { InMemoryAccessLogStore, InMemoryAuditLogStore } from "./audit/store";
import type { AccessLogStore, AuditLogStore } from "./audit/store";
import { config } from "./config";
import { getDb } from "./db";
import { PostgresPolicyStore } from "./policies/store.pg";
import { InMemoryPolicyStore } from "./policies/store";
import type { PolicyStore } from "./policies/store";
import { InMemoryActorLock, PostgresActorLock } from "./quota/actor-lock";
import type { ActorLock } from "./quota/actor-lock";
import { PostgresResourceRegistry } from "./registry/registry.pg";
import { InMemoryResourceRegistry } from "./registry/registry";
import type { ResourceRegistry } from "./registry/types";
import { PostgresViolationStore } from "./violations/store.pg";
import { InMemoryViolationStore } from "./violations/store";
import type { ViolationStore } from "./violations/store";

export type GovernanceStorage = {
  backend: "memory" | "postgres";
  policies: PolicyStore;
  violations: ViolationStore;
  auditLog: AuditLogStore;
  accessLog: AccessLogStore;
  ledger: GovernanceLedger;
  registry: ResourceRegistry;
  actorLock: ActorLock;
  ping: () => Promise<void>;
};

export type InMemoryGovernanceStorage = GovernanceStorage & {
  backend: "memory";
  policies: InMemoryPolicyStore;
  violations: InMemoryViolationStore;
  auditLog: InMemoryAuditLogStore;
  accessLog: InMemoryAccessLogStore;
  registry: InMemoryResourceRegistry;
};

export function createInMemoryStorage(): InMemoryGovernanceStorage {
  const violations = new InMemoryViolationStore();
  const auditLog = new InMemoryAuditLogStore();
  return {
    backend: "memory",
    policies: new InMemoryPolicyStore(),
    violations,
    auditLog,
    accessLog: new InMemoryAccessLogStore(),
    ledger: new InMemoryGovernanceLedger(auditLog, violations),
    registry: new InMemoryResourceRegistry(),
    actorLock: new InMemoryActorLock(),
    ping: async () => undefined
  };
}

export function createPostgresStorage(db: Pool): GovernanceStorage {
  return {
    backend: "postgres",
    policies: new PostgresPolicyStore(db),
    violations: new PostgresViolationStore(db),
    auditLog: new PostgresAuditLogStore(db),
    accessLog: new PostgresAccessLogStore(db),
    ledger: new PostgresGovernanceLedger(db),
    registry: new PostgresResourceRegistry(db),
    // Lock connections stay below the pool size so the guarded queries always find a client.
    actorLock: new PostgresActorLock(db, Math.min(config.quota.lockConnections, config.db.poolMax - 1)),
    ping: async () => {
      await db.query("SELECT 1");
    }
  };
}

/** All stores share one backend; there is no per-store fallback to memory. */
export function createGovernanceStorage(): GovernanceStorage {
  return config.useInMemoryStore ? createInMemoryStorage() : createPostgresStorage(getDb());
}
