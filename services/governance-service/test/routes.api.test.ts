import Fastify from "fastify";
import { afterEach, describe, expect, test } from "vitest";
import { registerRoutes } from "../src/api/routes";
import { fixedClock } from "../src/clock";
import { createGovernanceEngine } from "../src/engine";
import { createInMemoryStorage } from "../src/storage";
import { registerTraceHook } from "../src/trace/trace";
import { SATURDAY_10_UTC, TUESDAY_10_UTC, silentLogger } from "./helpers";

const adminHeaders = { "x-actor-id": "admin-1", "x-actor-role": "SRS_ACCOUNT_ADMIN" };
const analystHeaders = { "x-actor-id": "analyst-1", "x-actor-role": "SRS_DEVELOPER", "x-session-id": "session-9" };

const apps: Array<{ close: () => Promise<unknown> }> = [];

async function buildApp(now = TUESDAY_10_UTC) {
  const storage = createInMemoryStorage();
  const engine = createGovernanceEngine({ storage, clock: fixedClock(now), logger: silentLogger });
  const app = Fastify();
  registerTraceHook(app);
  await registerRoutes(app, engine);
  await app.ready();
  apps.push(app);
  return { app, storage };
}

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

describe("policy routes", () => {
  test("mutations require an actor", async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: { "x-trace-id": "trace-missing-actor" },
      payload: { name: "MAX_TWO", kind: "USER_QUOTA", definition: { maxResources: 2 } }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: "ERROR",
      code: "VALIDATION",
      message: "x-actor-id header is required",
      traceId: "trace-missing-actor"
    });
  });

  test("creates, lists, toggles and deletes", async () => {
    const { app } = await buildApp();

    const created = await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: adminHeaders,
      payload: { name: "MAX_TWO", kind: "USER_QUOTA", scope: "prd", definition: { maxResources: 2, action: "BLOCK" } }
    });
    expect(created.statusCode).toBe(201);
    expect(created.json().policy).toMatchObject({ name: "MAX_TWO", scope: "PRD", createdBy: "admin-1" });

    const duplicate = await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: adminHeaders,
      payload: { name: "MAX_TWO", kind: "USER_QUOTA", definition: { maxResources: 2 } }
    });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json().code).toBe("CONFLICT");

    const listed = await app.inject({ method: "GET", url: "/v1/policies?scope=prd&activeOnly=true" });
    expect(listed.json().policies.map((policy: { name: string }) => policy.name)).toEqual(["MAX_TWO"]);

    const disabled = await app.inject({
      method: "POST",
      url: "/v1/policies/MAX_TWO/status",
      headers: adminHeaders,
      payload: { active: false }
    });
    expect(disabled.json().policy.active).toBe(false);

    const activeOnly = await app.inject({ method: "GET", url: "/v1/policies?activeOnly=true" });
    expect(activeOnly.json().policies).toEqual([]);

    const deleted = await app.inject({ method: "DELETE", url: "/v1/policies/MAX_TWO", headers: adminHeaders });
    expect(deleted.statusCode).toBe(200);

    const missing = await app.inject({ method: "DELETE", url: "/v1/policies/MAX_TWO", headers: adminHeaders });
    expect(missing.statusCode).toBe(404);
  });

  test("an invalid definition is a 400 with issues", async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: adminHeaders,
      payload: { name: "BAD", kind: "TIME_RESTRICTION", definition: { allowedHoursStart: 9 } }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().message).toBe("Invalid TIME_RESTRICTION policy definition");
    expect(response.json().issues.length).toBeGreaterThan(0);
  });

  test("installs the default pack", async () => {
    const { app } = await buildApp();

    const response = await app.inject({ method: "POST", url: "/v1/policies/defaults", headers: adminHeaders });

    expect(response.statusCode).toBe(200);
    expect(response.json().installed).toHaveLength(7);
  });
});

describe("evaluation and recording routes", () => {
  test("evaluate is a pre-check that records nothing", async () => {
    const { app, storage } = await buildApp(SATURDAY_10_UTC);
    await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: adminHeaders,
      payload: {
        name: "BUSINESS_HOURS",
        kind: "TIME_RESTRICTION",
        severity: "ERROR",
        definition: { allowedHoursStart: 8, allowedHoursEnd: 18, allowedDays: ["MON", "TUE", "WED", "THU", "FRI"], action: "BLOCK" }
      }
    });

    const response = await app.inject({
      method: "POST",
      url: "/v1/evaluate",
      headers: analystHeaders,
      payload: { resource: { name: "ORDERS_CLONE", kind: "schema" }, scope: "dev" }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ block: true, evaluatedPolicies: 1, skippedPolicies: [] });
    expect(response.json().violations[0].policyName).toBe("BUSINESS_HOURS");
    expect(await storage.violations.listViolations()).toEqual([]);
  });

  test("records an operation and serves it back through the audit queries", async () => {
    const { app } = await buildApp();

    const recorded = await app.inject({
      method: "POST",
      url: "/v1/operations",
      headers: analystHeaders,
      payload: {
        operation: "EXTEND",
        status: "SUCCESS",
        resource: { id: "clone-1", name: "ORDERS_CLONE", kind: "SCHEMA", sourceDatabase: "SALES", sourceSchema: "ORDERS" },
        scope: "uat",
        metadata: { extendedByDays: 3 }
      }
    });
    expect(recorded.statusCode).toBe(201);
    const { auditId } = recorded.json();

    const listed = await app.inject({ method: "GET", url: "/v1/audit?operation=EXTEND&scope=uat" });
    expect(listed.json().records).toHaveLength(1);
    expect(listed.json().records[0]).toMatchObject({
      id: auditId,
      actor: "analyst-1",
      actorRole: "SRS_DEVELOPER",
      sessionId: "session-9",
      scope: "UAT",
      clientIp: "127.0.0.1",
      occurredAt: TUESDAY_10_UTC.toISOString(),
      metadata: { extendedByDays: 3 }
    });

    const single = await app.inject({ method: "GET", url: `/v1/audit/${auditId}` });
    expect(single.json().id).toBe(auditId);

    const unknown = await app.inject({ method: "GET", url: "/v1/audit/nope" });
    expect(unknown.statusCode).toBe(404);

    const stats = await app.inject({ method: "GET", url: "/v1/recorder/stats" });
    expect(stats.json()).toEqual({ operationsRecorded: 1, operationsFailed: 0, accessesRecorded: 0, accessesFailed: 0 });
  });

  test("records and lists clone access", async () => {
    const { app } = await buildApp();

    const recorded = await app.inject({
      method: "POST",
      url: "/v1/access",
      headers: analystHeaders,
      payload: { resourceId: "clone-1", resourceName: "ORDERS_CLONE", accessType: "select", rowsAccessed: 10 }
    });
    expect(recorded.statusCode).toBe(201);

    const listed = await app.inject({ method: "GET", url: "/v1/access?actor=analyst-1" });
    expect(listed.json().records).toHaveLength(1);
    expect(listed.json().records[0]).toMatchObject({ accessType: "SELECT", rowsAccessed: 10, sessionId: "session-9" });
  });

  test("a malformed body is a 400", async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: "POST",
      url: "/v1/operations",
      headers: analystHeaders,
      payload: { operation: "RENAME", status: "SUCCESS", resource: { name: "X", kind: "SCHEMA" } }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ status: "ERROR", code: "VALIDATION", message: "Invalid request" });
  });
});

describe("clone and violation routes", () => {
  test("quota blocks the second clone and the violation can be resolved", async () => {
    const { app } = await buildApp();
    await app.inject({
      method: "POST",
      url: "/v1/policies",
      headers: adminHeaders,
      payload: { name: "MAX_ONE", kind: "USER_QUOTA", severity: "ERROR", definition: { maxResources: 1, action: "BLOCK" } }
    });

    const first = await app.inject({
      method: "POST",
      url: "/v1/clones",
      headers: analystHeaders,
      payload: { id: "clone-1", name: "ORDERS_CLONE", kind: "schema", scope: "dev" }
    });
    expect(first.statusCode).toBe(201);
    expect(first.json().clone).toMatchObject({ id: "clone-1", owner: "analyst-1", kind: "SCHEMA", scope: "DEV" });

    const second = await app.inject({
      method: "POST",
      url: "/v1/clones",
      headers: analystHeaders,
      payload: { id: "clone-2", name: "ORDERS_CLONE_2", kind: "SCHEMA" }
    });
    expect(second.statusCode).toBe(403);
    expect(second.json()).toMatchObject({ status: "BLOCKED", verdict: { block: true } });

    const violations = await app.inject({ method: "GET", url: "/v1/violations?status=OPEN&actor=analyst-1" });
    const [violation] = violations.json().violations;
    expect(violation).toMatchObject({ policyName: "MAX_ONE", resourceId: "clone-2", severity: "ERROR" });

    const resolved = await app.inject({
      method: "POST",
      url: `/v1/violations/${violation.id}/resolve`,
      headers: adminHeaders,
      payload: { notes: "Old clone dropped" }
    });
    expect(resolved.statusCode).toBe(200);
    expect(resolved.json().violation).toMatchObject({ status: "RESOLVED", resolvedBy: "admin-1", resolutionNotes: "Old clone dropped" });

    const again = await app.inject({
      method: "POST",
      url: `/v1/violations/${violation.id}/resolve`,
      headers: adminHeaders,
      payload: {}
    });
    expect(again.statusCode).toBe(409);

    const retired = await app.inject({ method: "DELETE", url: "/v1/clones/clone-1", headers: analystHeaders });
    expect(retired.statusCode).toBe(200);

    const retriedClone = await app.inject({
      method: "POST",
      url: "/v1/clones",
      headers: analystHeaders,
      payload: { id: "clone-3", name: "ORDERS_CLONE_3", kind: "SCHEMA" }
    });
    expect(retriedClone.statusCode).toBe(201);
  });

  test("retiring an unknown clone is a 404", async () => {
    const { app } = await buildApp();

    const response = await app.inject({ method: "DELETE", url: "/v1/clones/ghost", headers: analystHeaders });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ code: "NOT_FOUND", message: "Clone ghost not found" });
  });
});

describe("maintenance routes", () => {
  test("scan and purge run on demand", async () => {
    const { app } = await buildApp();

    const scan = await app.inject({ method: "POST", url: "/v1/compliance/scan", payload: {} });
    expect(scan.statusCode).toBe(200);
    expect(scan.json()).toMatchObject({ compliantCount: 0, nonCompliantCount: 0, violations: [], cancelled: false });

    const purge = await app.inject({ method: "POST", url: "/v1/retention/purge", payload: { retentionDays: 30 } });
    expect(purge.json()).toMatchObject({ mode: "DRY_RUN", retentionDays: 30, cutoff: "2024-05-19T10:00:00.000Z" });

    const invalid = await app.inject({ method: "POST", url: "/v1/retention/purge", payload: { retentionDays: -5 } });
    expect(invalid.statusCode).toBe(400);
  });

  test("echoes the trace id header", async () => {
    const { app } = await buildApp();

    const response = await app.inject({ method: "GET", url: "/v1/policies", headers: { "x-trace-id": "trace-42" } });

    expect(response.headers["x-trace-id"]).toBe("trace-42");
  });
});
