import { describe, expect, test, vi } from "vitest";
import pino from "pino";
import { createPolicyEvaluator, evaluatePolicies } from "../src/evaluator/evaluator";
import { zonedTime } from "../src/evaluator/rules";
import { InMemoryPolicyStore } from "../src/policies/store";
import {
  SATURDAY_10_UTC,
  TUESDAY_10_UTC,
  makeActor,
  makeContext,
  makePolicy,
  makeResource,
  silentLogger
} from "./helpers";

const businessHours = {
  allowedHoursStart: 8,
  allowedHoursEnd: 18,
  allowedDays: ["MON", "TUE", "WED", "THU", "FRI"],
  action: "BLOCK"
};

describe("evaluatePolicies", () => {
  test("quota at its limit blocks the next creation", () => {
    const quota = makePolicy("MAX_TWO", "USER_QUOTA", { maxResources: 2, action: "BLOCK" }, { severity: "ERROR" });

    const verdict = evaluatePolicies([quota], makeContext({ liveResourceCount: 2 }), silentLogger);

    expect(verdict.block).toBe(true);
    expect(verdict.violations).toHaveLength(1);
    expect(verdict.violations[0].policyName).toBe("MAX_TWO");
    expect(verdict.violations[0].details).toEqual({
      liveResourceCount: 2,
      maxResources: 2,
      message: "Clone limit reached: 2 live clones (max 2)",
      action: "BLOCK",
      policyKind: "USER_QUOTA"
    });
  });

  test("quota below its limit produces nothing", () => {
    const quota = makePolicy("MAX_TWO", "USER_QUOTA", { maxResources: 2, action: "BLOCK" });

    const verdict = evaluatePolicies([quota], makeContext({ liveResourceCount: 1 }), silentLogger);

    expect(verdict).toEqual({ violations: [], block: false, evaluatedPolicies: 1, skippedPolicies: [] });
  });

  test("time window blocks on Saturday and allows Tuesday morning", () => {
    const window = makePolicy("BUSINESS_HOURS", "TIME_RESTRICTION", businessHours, { severity: "ERROR" });

    const saturday = evaluatePolicies([window], makeContext({ now: SATURDAY_10_UTC }), silentLogger);
    expect(saturday.block).toBe(true);
    expect(saturday.violations[0].details.message).toBe(
      "Clone creation not allowed at this time. Allowed: 8:00-18:00 MON,TUE,WED,THU,FRI (UTC)"
    );
    expect(saturday.violations[0].details.weekday).toBe("SAT");

    const tuesday = evaluatePolicies([window], makeContext({ now: TUESDAY_10_UTC }), silentLogger);
    expect(tuesday.violations).toEqual([]);
    expect(tuesday.block).toBe(false);
  });

  test("time window is evaluated in the policy time zone", () => {
    const window = makePolicy("NY_HOURS", "TIME_RESTRICTION", { ...businessHours, timezone: "America/New_York" });

    // 13:00 UTC is 09:00 EDT
    const morning = evaluatePolicies([window], makeContext({ now: new Date("2024-06-18T13:00:00.000Z") }), silentLogger);
    expect(morning.violations).toEqual([]);

    // 23:30 UTC is 19:30 EDT
    const evening = evaluatePolicies([window], makeContext({ now: new Date("2024-06-18T23:30:00.000Z") }), silentLogger);
    expect(evening.violations).toHaveLength(1);
    expect(evening.violations[0].details.hour).toBe(19);
    expect(evening.violations[0].details.weekday).toBe("TUE");
  });

  test("violations are ordered by severity, then policy name", () => {
    const policies = [
      makePolicy("B_CLASSIFIED", "DATA_CLASSIFICATION", { restrictedClassifications: ["PHI"] }, { severity: "WARNING" }),
      makePolicy("A_CLASSIFIED", "DATA_CLASSIFICATION", { restrictedClassifications: ["phi"] }, { severity: "WARNING" }),
      makePolicy("PII_SCHEMAS", "SENSITIVE_DATA", { restrictedSchemas: ["PII"] }, { severity: "CRITICAL" })
    ];
    const context = makeContext({ resource: makeResource({ sourceSchema: "CUSTOMER_PII", classifications: ["PHI"] }) });

    const verdict = evaluatePolicies(policies, context, silentLogger);

    expect(verdict.violations.map((violation) => violation.policyName)).toEqual([
      "PII_SCHEMAS",
      "A_CLASSIFIED",
      "B_CLASSIFIED"
    ]);
    expect(verdict.violations[0].severity).toBe("CRITICAL");
    expect(verdict.block).toBe(false);
  });

  test("identical inputs give identical verdicts", () => {
    const policies = [
      makePolicy("PII_SCHEMAS", "SENSITIVE_DATA", { restrictedSchemas: ["PII"], action: "REQUIRE_APPROVAL" }),
      makePolicy("MAX_ONE", "USER_QUOTA", { maxResources: 1 })
    ];
    const context = makeContext({
      liveResourceCount: 4,
      resource: makeResource({ sourceSchema: "PII_CORE" })
    });

    expect(evaluatePolicies(policies, context, silentLogger)).toEqual(evaluatePolicies(policies, context, silentLogger));
  });

  test("require-approval blocks only for sensitive data", () => {
    const sensitive = makePolicy("PII_SCHEMAS", "SENSITIVE_DATA", {
      restrictedSchemas: ["PII"],
      approvers: ["SRS_SECURITY_ADMIN"],
      action: "REQUIRE_APPROVAL"
    });
    const approval = makePolicy("DB_APPROVAL", "APPROVAL_REQUIRED", { approvers: ["SRS_SECURITY_ADMIN"] });
    const context = makeContext({ resource: makeResource({ sourceSchema: "pii_main" }) });

    const both = evaluatePolicies([sensitive, approval], context, silentLogger);
    expect(both.block).toBe(true);
    expect(both.violations.map((violation) => [violation.policyName, violation.blocking])).toEqual([
      ["DB_APPROVAL", false],
      ["PII_SCHEMAS", true]
    ]);

    const approvalOnly = evaluatePolicies([approval], context, silentLogger);
    expect(approvalOnly.violations[0].action).toBe("REQUIRE_APPROVAL");
    expect(approvalOnly.block).toBe(false);
  });

  test("approvers are exempt from approval policies", () => {
    const approval = makePolicy("DB_APPROVAL", "APPROVAL_REQUIRED", {
      approvers: ["SRS_SECURITY_ADMIN"],
      appliesToKinds: ["DATABASE"]
    });

    const approver = makeContext({
      actor: makeActor("admin-1", "srs_security_admin"),
      resource: makeResource({ kind: "DATABASE" })
    });
    expect(evaluatePolicies([approval], approver, silentLogger).violations).toEqual([]);

    const schemaClone = makeContext({ resource: makeResource({ kind: "SCHEMA" }) });
    expect(evaluatePolicies([approval], schemaClone, silentLogger).violations).toEqual([]);

    const databaseClone = makeContext({ resource: makeResource({ kind: "DATABASE" }) });
    expect(evaluatePolicies([approval], databaseClone, silentLogger).violations[0].details.message).toBe(
      "DATABASE clones require approval by one of SRS_SECURITY_ADMIN"
    );
  });

  test("environment and source restrictions match case-insensitively", () => {
    const policies = [
      makePolicy("NO_DATABASES", "ENVIRONMENT_RESTRICTION", { restrictedKinds: ["database"], action: "BLOCK" }, { scope: "PRD" }),
      makePolicy("NO_SALES_PII", "RESTRICTED_SOURCE", { restrictedSources: ["SALES.PII"] })
    ];
    const context = makeContext({
      scope: "PRD",
      resource: makeResource({ kind: "DATABASE", sourceDatabase: "sales", sourceSchema: "pii" })
    });

    const verdict = evaluatePolicies(policies, context, silentLogger);

    expect(verdict.violations.map((violation) => violation.details.message)).toEqual([
      "DATABASE clones are not allowed in PRD",
      "Source sales.pii is restricted"
    ]);
    expect(verdict.block).toBe(true);
  });

  test("inactive and out-of-scope policies are ignored", () => {
    const policies = [
      makePolicy("MAX_ZERO_OFF", "USER_QUOTA", { maxResources: 1, action: "BLOCK" }, { active: false }),
      makePolicy("MAX_ZERO_PRD", "USER_QUOTA", { maxResources: 1, action: "BLOCK" }, { scope: "PRD" })
    ];

    const verdict = evaluatePolicies(policies, makeContext({ scope: "DEV", liveResourceCount: 5 }), silentLogger);

    expect(verdict).toEqual({ violations: [], block: false, evaluatedPolicies: 0, skippedPolicies: [] });
  });

  test("max age never fires at operation time", () => {
    const age = makePolicy("MAX_AGE_1", "MAX_AGE", { maxAgeDays: 1 });

    const verdict = evaluatePolicies([age], makeContext(), silentLogger);

    expect(verdict.violations).toEqual([]);
    expect(verdict.evaluatedPolicies).toBe(1);
  });

  test("malformed definitions are skipped with a warning", () => {
    const log = pino({ level: "silent" });
    const warn = vi.spyOn(log, "warn");
    const policies = [
      makePolicy("BROKEN_QUOTA", "USER_QUOTA", { maxResources: "ten" }),
      makePolicy("MAX_ONE", "USER_QUOTA", { maxResources: 1 })
    ];

    const verdict = evaluatePolicies(policies, makeContext({ liveResourceCount: 3 }), log);

    expect(verdict.skippedPolicies).toEqual(["BROKEN_QUOTA"]);
    expect(verdict.evaluatedPolicies).toBe(1);
    expect(verdict.violations.map((violation) => violation.policyName)).toEqual(["MAX_ONE"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("createPolicyEvaluator", () => {
  test("toggling a policy off removes it from the next evaluation", async () => {
    const store = new InMemoryPolicyStore();
    await store.insertPolicy({
      name: "MAX_ONE",
      kind: "USER_QUOTA",
      scope: null,
      description: null,
      definition: { maxResources: 1, action: "BLOCK" },
      severity: "ERROR",
      active: true,
      createdBy: "admin",
      createdAt: TUESDAY_10_UTC
    });
    const evaluator = createPolicyEvaluator({ policies: store, logger: silentLogger });
    const context = makeContext({ liveResourceCount: 1 });

    expect((await evaluator.evaluate(context)).block).toBe(true);

    await store.updatePolicy("MAX_ONE", { active: false, updatedBy: "admin", updatedAt: TUESDAY_10_UTC });
    expect((await evaluator.evaluate(context)).violations).toEqual([]);

    await store.updatePolicy("MAX_ONE", { active: true, updatedBy: "admin", updatedAt: TUESDAY_10_UTC });
    expect((await evaluator.evaluate(context)).block).toBe(true);
  });
});

test("zonedTime reports the local hour and weekday", () => {
  expect(zonedTime(new Date("2024-06-16T03:00:00.000Z"), "America/New_York")).toEqual({ hour: 23, weekday: "SAT" });
  expect(zonedTime(SATURDAY_10_UTC, "UTC")).toEqual({ hour: 10, weekday: "SAT" });
});
