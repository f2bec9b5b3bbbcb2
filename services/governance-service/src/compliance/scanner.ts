import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { Clock } from "../clock";
import { wholeDaysBetween } from "../clock";
import { checkMaxAge } from "../evaluator/rules";
import { logger as defaultLogger } from "../logger";
import { safeParsePolicyRule } from "../policies/schema";
import type { PolicyStore } from "../policies/store";
import type { MaxAgeDefinition, PolicyRecord, Severity } from "../policies/types";
import { policyAppliesToScope } from "../policies/types";
import { InMemoryActorLock } from "../quota/actor-lock";
import type { LiveResource, ResourceRegistry } from "../registry/types";
import type { ViolationStore } from "../violations/store";

export type ScanFinding = {
  policyId: string;
  policyName: string;
  severity: Severity;
  resourceId: string;
  resourceName: string;
  owner: string;
  scope: string | null;
  ageDays: number;
  maxAgeDays: number;
  message: string;
  /** Id of the OPEN violation tracking this finding, new or pre-existing. */
  violationId: string;
  newlyRecorded: boolean;
};

export type ScanResult = {
  scannedAt: Date;
  compliantCount: number;
  nonCompliantCount: number;
  violations: ScanFinding[];
  recordedCount: number;
  cancelled: boolean;
};

export type ScanOptions = {
  scope?: string | null;
  signal?: AbortSignal;
};

export type ComplianceScanner = {
  scanCompliance: (options?: ScanOptions) => Promise<ScanResult>;
};

type AgePolicy = {
  policy: PolicyRecord;
  definition: MaxAgeDefinition;
};

export function createComplianceScanner(options: {
  policies: PolicyStore;
  violations: ViolationStore;
  registry: ResourceRegistry;
  clock: Clock;
  batchSize: number;
  logger?: Logger;
}): ComplianceScanner {
  const log = options.logger ?? defaultLogger;
  // Overlapping scans would race on the OPEN-violation dedupe check.
  const scanLock = new InMemoryActorLock();

  async function loadAgePolicies(): Promise<AgePolicy[]> {
    const records = await options.policies.listPolicies({ kind: "MAX_AGE", activeOnly: true });
    const agePolicies: AgePolicy[] = [];
    for (const policy of records) {
      const parsed = safeParsePolicyRule(policy.kind, policy.definition);
      if (parsed.ok && parsed.rule.kind === "MAX_AGE") {
        agePolicies.push({ policy, definition: parsed.rule.definition });
      } else {
        log.warn({ policy: policy.name }, "Skipping MAX_AGE policy with invalid definition");
      }
    }
    return agePolicies;
  }

  async function recordFinding(
    agePolicy: AgePolicy,
    resource: LiveResource,
    ageDays: number,
    message: string,
    scannedAt: Date
  ): Promise<ScanFinding> {
    const { policy, definition } = agePolicy;
    const existing = await options.violations.findOpenViolation(policy.id, resource.id);
    let violationId = existing?.id ?? null;
    if (!violationId) {
      const [created] = await options.violations.insertViolations([
        {
          id: randomUUID(),
          policyId: policy.id,
          policyName: policy.name,
          policyKind: policy.kind,
          resourceId: resource.id,
          resourceName: resource.name,
          violator: resource.owner,
          details: {
            message,
            action: definition.action,
            policyKind: policy.kind,
            ageDays,
            maxAgeDays: definition.maxAgeDays,
            scope: resource.scope
          },
          severity: policy.severity,
          detectedAt: scannedAt,
          auditId: null
        }
      ]);
      violationId = created.id;
    }
    return {
      policyId: policy.id,
      policyName: policy.name,
      severity: policy.severity,
      resourceId: resource.id,
      resourceName: resource.name,
      owner: resource.owner,
      scope: resource.scope,
      ageDays,
      maxAgeDays: definition.maxAgeDays,
      message,
      violationId,
      newlyRecorded: existing === null
    };
  }

  async function runScan(scanOptions: ScanOptions): Promise<ScanResult> {
    const scannedAt = options.clock.now();
    const agePolicies = await loadAgePolicies();
    const findings: ScanFinding[] = [];
    let compliantCount = 0;
    let nonCompliantCount = 0;
    let cancelled = false;
    let after: string | undefined;

    for (;;) {
      if (scanOptions.signal?.aborted) {
        cancelled = true;
        break;
      }
      const batch = await options.registry.listLiveResources({
        scope: scanOptions.scope,
        after,
        limit: options.batchSize
      });
      for (const resource of batch) {
        const ageDays = wholeDaysBetween(resource.createdAt, scannedAt);
        let resourceFindings = 0;
        for (const agePolicy of agePolicies) {
          if (!policyAppliesToScope(agePolicy.policy.scope, resource.scope)) {
            continue;
          }
          const match = checkMaxAge(agePolicy.definition, ageDays);
          if (match) {
            findings.push(await recordFinding(agePolicy, resource, ageDays, match.message, scannedAt));
            resourceFindings += 1;
          }
        }
        if (resourceFindings > 0) {
          nonCompliantCount += 1;
        } else {
          compliantCount += 1;
        }
      }
      if (batch.length < options.batchSize) {
        break;
      }
      after = batch[batch.length - 1].id;
    }

    const recordedCount = findings.filter((finding) => finding.newlyRecorded).length;
    log.info(
      { scope: scanOptions.scope ?? null, compliantCount, nonCompliantCount, recordedCount, cancelled },
      "Compliance scan finished"
    );
    return { scannedAt, compliantCount, nonCompliantCount, violations: findings, recordedCount, cancelled };
  }

  return {
    scanCompliance: (scanOptions = {}) => scanLock.withLock("compliance-scan", () => runScan(scanOptions))
  };
}
