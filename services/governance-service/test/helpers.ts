import pino from "pino";
import type { ActorIdentity, EvaluationContext, ResourceDescriptor } from "../src/evaluator/types";
import type { PolicyKind, PolicyRecord } from "../src/policies/types";
import type { LiveResource } from "../src/registry/types";

export const silentLogger = pino({ level: "silent" });

export const SATURDAY_10_UTC = new Date("2024-06-15T10:00:00.000Z");
export const TUESDAY_10_UTC = new Date("2024-06-18T10:00:00.000Z");

export function makeActor(id = "analyst-1", role: string | null = "SRS_DEVELOPER"): ActorIdentity {
  return { id, role, sessionId: "session-1" };
}

export function makeResource(overrides: Partial<ResourceDescriptor> = {}): ResourceDescriptor {
  return {
    id: "clone-1",
    name: "ORDERS_CLONE",
    kind: "SCHEMA",
    sourceDatabase: "SALES",
    sourceSchema: "ORDERS",
    classifications: [],
    ...overrides
  };
}

export function makeContext(overrides: Partial<EvaluationContext> = {}): EvaluationContext {
  return {
    operation: "CREATE",
    resource: makeResource(),
    scope: null,
    actor: makeActor(),
    liveResourceCount: 0,
    now: TUESDAY_10_UTC,
    ...overrides
  };
}

export function makePolicy(
  name: string,
  kind: PolicyKind,
  definition: Record<string, unknown>,
  overrides: Partial<PolicyRecord> = {}
): PolicyRecord {
  return {
    id: `policy-${name}`,
    name,
    kind,
    scope: null,
    description: null,
    definition,
    severity: "WARNING",
    active: true,
    createdBy: "admin",
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    updatedBy: null,
    updatedAt: null,
    ...overrides
  };
}

export function makeLiveResource(overrides: Partial<LiveResource> & Pick<LiveResource, "id">): LiveResource {
  return {
    name: `${overrides.id.toUpperCase()}_CLONE`,
    kind: "SCHEMA",
    scope: null,
    owner: "analyst-1",
    sourceDatabase: "SALES",
    sourceSchema: "ORDERS",
    classifications: [],
    createdAt: new Date("2024-06-01T00:00:00.000Z"),
    ...overrides
  };
}
