import type { Logger } from "pino";
import type { AuditRecorder, RecordResult } from "../audit/recorder";
import type { Clock } from "../clock";
import { describeError } from "../errors";
import type { PolicyEvaluator } from "../evaluator/evaluator";
import type { ActorIdentity, ResourceDescriptor, Verdict } from "../evaluator/types";
import { logger as defaultLogger } from "../logger";
import type { ResourceRegistry } from "../registry/types";
import type { ActorLock } from "./actor-lock";

export type CreateRequest = {
  resource: ResourceDescriptor;
  scope: string | null;
  actor: ActorIdentity;
  clientIp?: string | null;
  metadata?: Record<string, unknown> | null;
};

export type GuardOutcome<T> =
  | { status: "CREATED"; resource: T; verdict: Verdict; record: RecordResult }
  | { status: "BLOCKED"; verdict: Verdict; record: RecordResult };

export type QuotaGuard = {
  /**
   * Evaluates and creates under the actor's lock. `create` must register the
   * clone before it resolves so the next caller's count includes it.
   */
  guardCreate: <T extends { id: string }>(request: CreateRequest, create: () => Promise<T>) => Promise<GuardOutcome<T>>;
};

export function blockMessage(verdict: Verdict): string {
  const names = verdict.violations.filter((violation) => violation.blocking).map((violation) => violation.policyName);
  return `Blocked by policy: ${names.join(", ")}`;
}

export function createQuotaGuard(options: {
  lock: ActorLock;
  registry: ResourceRegistry;
  evaluator: PolicyEvaluator;
  recorder: AuditRecorder;
  clock: Clock;
  logger?: Logger;
}): QuotaGuard {
  const log = options.logger ?? defaultLogger;

  const guardCreate = <T extends { id: string }>(
    request: CreateRequest,
    create: () => Promise<T>
  ): Promise<GuardOutcome<T>> =>
    options.lock.withLock(request.actor.id, async (): Promise<GuardOutcome<T>> => {
      const now = options.clock.now();
      const liveResourceCount = await options.registry.countLiveResources(request.actor.id);
      const verdict = await options.evaluator.evaluate({
        operation: "CREATE",
        resource: request.resource,
        scope: request.scope,
        actor: request.actor,
        liveResourceCount,
        now
      });
      const base = {
        operation: "CREATE" as const,
        scope: request.scope,
        actor: request.actor,
        occurredAt: now,
        clientIp: request.clientIp,
        metadata: request.metadata
      };

      if (verdict.block) {
        const message = blockMessage(verdict);
        log.warn({ actor: request.actor.id, resource: request.resource.name, liveResourceCount }, message);
        const record = await options.recorder.recordOperation({
          ...base,
          status: "BLOCKED",
          resource: request.resource,
          errorMessage: message,
          verdict
        });
        return { status: "BLOCKED", verdict, record };
      }

      let created: T;
      try {
        created = await create();
      } catch (error) {
        await options.recorder.recordOperation({
          ...base,
          status: "FAILURE",
          resource: request.resource,
          errorMessage: describeError(error)
        });
        throw error;
      }

      const record = await options.recorder.recordOperation({
        ...base,
        status: "SUCCESS",
        resource: { ...request.resource, id: created.id },
        verdict
      });
      return { status: "CREATED", resource: created, verdict, record };
    });

  return { guardCreate };
}
