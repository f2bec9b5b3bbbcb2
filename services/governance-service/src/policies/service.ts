import type { Logger } from "pino";
import { ZodError } from "zod";
import type { AuditRecorder } from "../audit/recorder";
import type { OperationKind } from "../audit/types";
import { GovernanceError, NotFoundError, ValidationError, toErrorResult } from "../errors";
import type { ErrorResult } from "../errors";
import type { ActorIdentity } from "../evaluator/types";
import { logger as defaultLogger } from "../logger";
import { loadDefaultPolicies } from "./defaults";
import { parseCreatePolicyInput, parsePolicyRule, updatePolicyInputSchema } from "./schema";
import type { PolicyStore } from "./store";
import type { PolicyChanges, PolicyFilters, PolicyRecord } from "./types";

export type PolicyResult = { status: "SUCCESS"; policy: PolicyRecord } | ErrorResult;

export type PolicyListResult = { status: "SUCCESS"; policies: PolicyRecord[] };

export type InstallDefaultsResult =
  | { status: "SUCCESS"; installed: string[]; skipped: string[] }
  | ErrorResult;

export type PolicyService = {
  createPolicy: (input: unknown, actor: ActorIdentity, now: Date) => Promise<PolicyResult>;
  listPolicies: (filters?: PolicyFilters) => Promise<PolicyListResult>;
  updatePolicy: (name: string, patch: unknown, actor: ActorIdentity, now: Date) => Promise<PolicyResult>;
  setPolicyStatus: (name: string, active: boolean, actor: ActorIdentity, now: Date) => Promise<PolicyResult>;
  deletePolicy: (name: string, actor: ActorIdentity, now: Date) => Promise<PolicyResult>;
  installDefaultPolicies: (actor: ActorIdentity, now: Date) => Promise<InstallDefaultsResult>;
};

/** Known failures become result documents; anything else (storage outages) propagates. */
function toResult(error: unknown): ErrorResult {
  if (error instanceof GovernanceError) {
    return toErrorResult(error);
  }
  if (error instanceof ZodError) {
    return toErrorResult(new ValidationError("Invalid request", error.issues));
  }
  throw error;
}

export function createPolicyService(options: {
  store: PolicyStore;
  recorder: AuditRecorder;
  defaultsPath: string;
  logger?: Logger;
}): PolicyService {
  const { store, recorder } = options;
  const log = options.logger ?? defaultLogger;

  async function recordChange(
    operation: OperationKind,
    policy: PolicyRecord,
    actor: ActorIdentity,
    now: Date,
    metadata: Record<string, unknown>
  ): Promise<void> {
    const result = await recorder.recordOperation({
      operation,
      status: "SUCCESS",
      resource: {
        id: policy.id,
        name: policy.name,
        kind: "POLICY",
        sourceDatabase: null,
        sourceSchema: null,
        classifications: []
      },
      scope: policy.scope,
      actor,
      occurredAt: now,
      metadata
    });
    if (result.status === "NOT_RECORDED") {
      log.warn({ operation, policy: policy.name, error: result.error }, "Policy change applied without audit record");
    }
  }

  async function requirePolicy(name: string): Promise<PolicyRecord> {
    const policy = await store.getPolicyByName(name);
    if (!policy) {
      throw new NotFoundError(`Policy ${name} not found`);
    }
    return policy;
  }

  async function applyChanges(name: string, changes: PolicyChanges): Promise<PolicyRecord> {
    const updated = await store.updatePolicy(name, changes);
    if (!updated) {
      throw new NotFoundError(`Policy ${name} not found`);
    }
    return updated;
  }

  const createPolicy = async (input: unknown, actor: ActorIdentity, now: Date): Promise<PolicyResult> => {
    try {
      const parsed = parseCreatePolicyInput(input);
      const rule = parsePolicyRule(parsed.kind, parsed.definition);
      const policy = await store.insertPolicy({
        name: parsed.name,
        kind: parsed.kind,
        scope: parsed.scope,
        description: parsed.description,
        definition: rule.definition,
        severity: parsed.severity,
        active: parsed.active,
        createdBy: actor.id,
        createdAt: now
      });
      await recordChange("POLICY_CREATE", policy, actor, now, {
        kind: policy.kind,
        severity: policy.severity,
        active: policy.active
      });
      return { status: "SUCCESS", policy };
    } catch (error) {
      return toResult(error);
    }
  };

  const listPolicies = async (filters?: PolicyFilters): Promise<PolicyListResult> => {
    const policies = await store.listPolicies(filters);
    return { status: "SUCCESS", policies };
  };

  const updatePolicy = async (
    name: string,
    patch: unknown,
    actor: ActorIdentity,
    now: Date
  ): Promise<PolicyResult> => {
    try {
      const parsed = updatePolicyInputSchema.parse(patch);
      const changedFields = Object.keys(parsed);
      if (changedFields.length === 0) {
        throw new ValidationError("No policy changes supplied");
      }
      const existing = await requirePolicy(name);
      const changes: PolicyChanges = { updatedBy: actor.id, updatedAt: now };
      if (parsed.scope !== undefined) {
        changes.scope = parsed.scope;
      }
      if (parsed.description !== undefined) {
        changes.description = parsed.description;
      }
      if (parsed.severity !== undefined) {
        changes.severity = parsed.severity;
      }
      if (parsed.definition !== undefined) {
        changes.definition = parsePolicyRule(existing.kind, parsed.definition).definition;
      }
      const policy = await applyChanges(name, changes);
      await recordChange("POLICY_UPDATE", policy, actor, now, { changedFields: changedFields.sort() });
      return { status: "SUCCESS", policy };
    } catch (error) {
      return toResult(error);
    }
  };

  const setPolicyStatus = async (
    name: string,
    active: boolean,
    actor: ActorIdentity,
    now: Date
  ): Promise<PolicyResult> => {
    try {
      const existing = await requirePolicy(name);
      const policy = await applyChanges(name, { active, updatedBy: actor.id, updatedAt: now });
      await recordChange("POLICY_STATUS_CHANGE", policy, actor, now, {
        previousActive: existing.active,
        active
      });
      return { status: "SUCCESS", policy };
    } catch (error) {
      return toResult(error);
    }
  };

  const deletePolicy = async (name: string, actor: ActorIdentity, now: Date): Promise<PolicyResult> => {
    try {
      const policy = await store.deletePolicy(name);
      if (!policy) {
        throw new NotFoundError(`Policy ${name} not found`);
      }
      await recordChange("POLICY_DELETE", policy, actor, now, { kind: policy.kind });
      return { status: "SUCCESS", policy };
    } catch (error) {
      return toResult(error);
    }
  };

  const installDefaultPolicies = async (actor: ActorIdentity, now: Date): Promise<InstallDefaultsResult> => {
    try {
      const defaults = loadDefaultPolicies(options.defaultsPath);
      const installed: string[] = [];
      const skipped: string[] = [];
      for (const input of defaults) {
        if (await store.getPolicyByName(input.name)) {
          skipped.push(input.name);
          continue;
        }
        const result = await createPolicy(input, actor, now);
        if (result.status === "SUCCESS") {
          installed.push(result.policy.name);
        } else if (result.code === "CONFLICT") {
          skipped.push(input.name);
        } else {
          return result;
        }
      }
      log.info({ installed: installed.length, skipped: skipped.length }, "Default policies installed");
      return { status: "SUCCESS", installed, skipped };
    } catch (error) {
      return toResult(error);
    }
  };

  return {
    createPolicy,
    listPolicies,
    updatePolicy,
    setPolicyStatus,
    deletePolicy,
    installDefaultPolicies
  };
}
