import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { describeError } from "../errors";
import type { PolicyEvaluator } from "../evaluator/evaluator";
import type { ActorIdentity, ResourceDescriptor, Verdict } from "../evaluator/types";
import { logger as defaultLogger } from "../logger";
import type { ResourceRegistry } from "../registry/types";
import type { NewViolation } from "../violations/types";
import type { GovernanceLedger } from "./ledger";
import type { AccessLogStore } from "./store";
import type { AuditRecord, OperationKind, OperationStatus } from "./types";

export type OperationInput = {
  operation: OperationKind;
  status: OperationStatus;
  resource: ResourceDescriptor;
  scope: string | null;
  actor: ActorIdentity;
  occurredAt: Date;
  clientIp?: string | null;
  errorMessage?: string | null;
  metadata?: Record<string, unknown> | null;
  /** A verdict computed before the operation ran; it is persisted instead of re-evaluating. */
  verdict?: Verdict;
  /** Live clone count excluding the clone being recorded; read from the registry when absent. */
  liveResourceCount?: number;
};

export type AccessInput = {
  resourceId: string | null;
  resourceName: string;
  accessType: string;
  actor: ActorIdentity;
  occurredAt: Date;
  queryId?: string | null;
  rowsAccessed?: number | null;
};

export type RecordResult =
  | { status: "RECORDED"; auditId: string; violationIds: string[]; block: boolean }
  | { status: "NOT_RECORDED"; error: string };

export type AccessResult = { status: "RECORDED"; accessId: string } | { status: "NOT_RECORDED"; error: string };

export type RecorderStats = {
  operationsRecorded: number;
  operationsFailed: number;
  accessesRecorded: number;
  accessesFailed: number;
};

export type AuditRecorder = {
  recordOperation: (input: OperationInput) => Promise<RecordResult>;
  recordAccess: (input: AccessInput) => Promise<AccessResult>;
  stats: () => RecorderStats;
};

export function shouldEvaluate(input: Pick<OperationInput, "operation" | "status">): boolean {
  return input.operation === "CREATE" && input.status === "SUCCESS";
}

export function createAuditRecorder(options: {
  evaluator: PolicyEvaluator;
  ledger: GovernanceLedger;
  accessLog: AccessLogStore;
  registry: ResourceRegistry;
  logger?: Logger;
}): AuditRecorder {
  const log = options.logger ?? defaultLogger;
  const counters: RecorderStats = {
    operationsRecorded: 0,
    operationsFailed: 0,
    accessesRecorded: 0,
    accessesFailed: 0
  };

  // A registered clone owned by the actor is already in the count and must not count against itself.
  async function liveCountExcluding(input: OperationInput): Promise<number> {
    const count = await options.registry.countLiveResources(input.actor.id);
    if (input.resource.id === null) {
      return count;
    }
    const registered = await options.registry.getLiveResource(input.resource.id);
    return registered?.owner === input.actor.id ? Math.max(0, count - 1) : count;
  }

  async function evaluateCreate(input: OperationInput): Promise<Verdict> {
    const liveResourceCount = input.liveResourceCount ?? (await liveCountExcluding(input));
    return options.evaluator.evaluate({
      operation: input.operation,
      resource: input.resource,
      scope: input.scope,
      actor: input.actor,
      liveResourceCount,
      now: input.occurredAt
    });
  }

  const recordOperation = async (input: OperationInput): Promise<RecordResult> => {
    try {
      const metadata: Record<string, unknown> = { ...(input.metadata ?? {}) };
      let verdict: Verdict | null = input.verdict ?? null;

      if (!verdict && shouldEvaluate(input)) {
        try {
          verdict = await evaluateCreate(input);
        } catch (error) {
          log.error(
            { error: describeError(error), operation: input.operation, resource: input.resource.name },
            "Policy evaluation failed; recording operation without violations"
          );
          metadata.evaluationError = describeError(error);
        }
      }
      if (verdict?.skippedPolicies.length) {
        metadata.skippedPolicies = verdict.skippedPolicies;
      }

      const auditId = randomUUID();
      const violations: NewViolation[] = (verdict?.violations ?? []).map((candidate) => ({
        id: randomUUID(),
        policyId: candidate.policyId,
        policyName: candidate.policyName,
        policyKind: candidate.policyKind,
        resourceId: input.resource.id,
        resourceName: input.resource.name,
        violator: input.actor.id,
        details: candidate.details,
        severity: candidate.severity,
        detectedAt: input.occurredAt,
        auditId
      }));

      const audit: AuditRecord = {
        id: auditId,
        occurredAt: input.occurredAt,
        operation: input.operation,
        resourceId: input.resource.id,
        resourceName: input.resource.name,
        resourceKind: input.resource.kind,
        scope: input.scope,
        sourceDatabase: input.resource.sourceDatabase,
        sourceSchema: input.resource.sourceSchema,
        actor: input.actor.id,
        actorRole: input.actor.role,
        sessionId: input.actor.sessionId,
        clientIp: input.clientIp ?? null,
        status: input.status,
        errorMessage: input.errorMessage ?? null,
        metadata: Object.keys(metadata).length ? metadata : null,
        violationIds: violations.map((violation) => violation.id)
      };

      await options.ledger.commitOperation(audit, violations);
      counters.operationsRecorded += 1;
      return {
        status: "RECORDED",
        auditId,
        violationIds: audit.violationIds,
        block: verdict?.block ?? false
      };
    } catch (error) {
      counters.operationsFailed += 1;
      log.error(
        { error: describeError(error), operation: input.operation, resource: input.resource.name, actor: input.actor.id },
        "Failed to record governed operation"
      );
      return { status: "NOT_RECORDED", error: describeError(error) };
    }
  };

  const recordAccess = async (input: AccessInput): Promise<AccessResult> => {
    try {
      const record = await options.accessLog.insertAccessRecord({
        id: randomUUID(),
        occurredAt: input.occurredAt,
        resourceId: input.resourceId,
        resourceName: input.resourceName,
        accessType: input.accessType,
        actor: input.actor.id,
        sessionId: input.actor.sessionId,
        queryId: input.queryId ?? null,
        rowsAccessed: input.rowsAccessed ?? null
      });
      counters.accessesRecorded += 1;
      return { status: "RECORDED", accessId: record.id };
    } catch (error) {
      counters.accessesFailed += 1;
      log.error(
        { error: describeError(error), resource: input.resourceName, actor: input.actor.id },
        "Failed to record clone access"
      );
      return { status: "NOT_RECORDED", error: describeError(error) };
    }
  };

  return {
    recordOperation,
    recordAccess,
    stats: () => ({ ...counters })
  };
}
