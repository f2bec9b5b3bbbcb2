import { describe, expect, test } from "vitest";
import { fixedClock } from "../src/clock";
import { createComplianceScanner } from "../src/compliance/scanner";
import { createGovernanceEngine } from "../src/engine";
import { InMemoryResourceRegistry } from "../src/registry/registry";
import type { LiveResource, LiveResourcePage } from "../src/registry/types";
import { createInMemoryStorage } from "../src/storage";
import { TUESDAY_10_UTC, makeActor, makeLiveResource, silentLogger } from "./helpers";

const admin = makeActor("admin-1", "SRS_ACCOUNT_ADMIN");

/** Aborts the scan as soon as the first page has been handed out. */
class AbortAfterFirstPage extends InMemoryResourceRegistry {
  pages = 0;

  constructor(private readonly controller: AbortController) {
    super();
  }

  async listLiveResources(page: LiveResourcePage): Promise<LiveResource[]> {
    this.pages += 1;
    const batch = await super.listLiveResources(page);
    this.controller.abort();
    return batch;
  }
}

async function setup(scanBatchSize = 200) {
  const storage = createInMemoryStorage();
  const engine = createGovernanceEngine({
    storage,
    clock: fixedClock(TUESDAY_10_UTC),
    logger: silentLogger,
    scanBatchSize
  });
  await engine.policies.createPolicy(
    { name: "PRD_MAX_7", kind: "MAX_AGE", scope: "PRD", severity: "ERROR", definition: { maxAgeDays: 7 } },
    admin,
    TUESDAY_10_UTC
  );
  await engine.policies.createPolicy(
    { name: "UAT_MAX_14", kind: "MAX_AGE", scope: "UAT", definition: { maxAgeDays: 14 } },
    admin,
    TUESDAY_10_UTC
  );
  await storage.registry.registerResource(
    makeLiveResource({ id: "clone-a", scope: "PRD", createdAt: new Date("2024-06-01T00:00:00.000Z") })
  );
  await storage.registry.registerResource(
    makeLiveResource({ id: "clone-b", scope: "UAT", owner: "analyst-2", createdAt: new Date("2024-06-10T00:00:00.000Z") })
  );
  await storage.registry.registerResource(
    makeLiveResource({ id: "clone-c", scope: "PRD", createdAt: new Date("2024-06-17T00:00:00.000Z") })
  );
  return { engine, storage };
}

describe("compliance scanner", () => {
  test("flags clones older than their scope's maximum age", async () => {
    const { engine, storage } = await setup();

    const result = await engine.scanner.scanCompliance();

    expect(result).toMatchObject({
      scannedAt: TUESDAY_10_UTC,
      compliantCount: 2,
      nonCompliantCount: 1,
      recordedCount: 1,
      cancelled: false
    });
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({
      policyName: "PRD_MAX_7",
      resourceId: "clone-a",
      owner: "analyst-1",
      ageDays: 17,
      maxAgeDays: 7,
      message: "Clone age (17 days) exceeds maximum (7 days)",
      newlyRecorded: true
    });

    const stored = await storage.violations.getViolation(result.violations[0].violationId);
    expect(stored).toMatchObject({
      status: "OPEN",
      violator: "analyst-1",
      severity: "ERROR",
      auditId: null,
      detectedAt: TUESDAY_10_UTC
    });
  });

  test("re-scans do not duplicate open violations", async () => {
    const { engine, storage } = await setup();

    const first = await engine.scanner.scanCompliance();
    const second = await engine.scanner.scanCompliance();

    expect(second.recordedCount).toBe(0);
    expect(second.violations[0].newlyRecorded).toBe(false);
    expect(second.violations[0].violationId).toBe(first.violations[0].violationId);
    expect(await storage.violations.listViolations()).toHaveLength(1);
  });

  test("a resolved finding is recorded again on the next scan", async () => {
    const { engine, storage } = await setup();
    const first = await engine.scanner.scanCompliance();
    await engine.violations.resolveViolation(first.violations[0].violationId, "admin-1", null, TUESDAY_10_UTC);

    const second = await engine.scanner.scanCompliance();

    expect(second.recordedCount).toBe(1);
    expect(await storage.violations.listViolations({ status: "OPEN" })).toHaveLength(1);
  });

  test("pages through the registry in batches", async () => {
    const { engine } = await setup(1);

    const result = await engine.scanner.scanCompliance();

    expect(result.compliantCount + result.nonCompliantCount).toBe(3);
    expect(result.nonCompliantCount).toBe(1);
  });

  test("restricts the scan to one scope", async () => {
    const { engine } = await setup();

    const result = await engine.scanner.scanCompliance({ scope: "UAT" });

    expect(result).toMatchObject({ compliantCount: 1, nonCompliantCount: 0, violations: [] });
  });

  test("stops when the signal is aborted", async () => {
    const { engine, storage } = await setup();
    const controller = new AbortController();
    controller.abort();

    const result = await engine.scanner.scanCompliance({ signal: controller.signal });

    expect(result).toMatchObject({ compliantCount: 0, nonCompliantCount: 0, cancelled: true });
    expect(await storage.violations.listViolations()).toEqual([]);
  });

  test("an abort between batches keeps the violations already recorded", async () => {
    const { storage } = await setup();
    const controller = new AbortController();
    const registry = new AbortAfterFirstPage(controller);
    await registry.registerResource(
      makeLiveResource({ id: "clone-a", scope: "PRD", createdAt: new Date("2024-06-01T00:00:00.000Z") })
    );
    await registry.registerResource(
      makeLiveResource({ id: "clone-b", scope: "PRD", createdAt: new Date("2024-06-02T00:00:00.000Z") })
    );
    const scanner = createComplianceScanner({
      policies: storage.policies,
      violations: storage.violations,
      registry,
      clock: fixedClock(TUESDAY_10_UTC),
      batchSize: 1,
      logger: silentLogger
    });

    const result = await scanner.scanCompliance({ signal: controller.signal });

    expect(registry.pages).toBe(1);
    expect(result).toMatchObject({ compliantCount: 0, nonCompliantCount: 1, recordedCount: 1, cancelled: true });
    expect(result.violations.map((finding) => finding.resourceId)).toEqual(["clone-a"]);
    const stored = await storage.violations.listViolations();
    expect(stored.map((violation) => violation.resourceId)).toEqual(["clone-a"]);
  });
});
