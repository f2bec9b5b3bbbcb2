import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { AuditRecorder, RecordResult } from "../audit/recorder";
import type { Clock } from "../clock";
import { GovernanceError, NotFoundError, ValidationError, toErrorResult } from "../errors";
import type { ErrorResult } from "../errors";
import type { ActorIdentity, Verdict } from "../evaluator/types";
import type { QuotaGuard } from "../quota/guard";
import type { LiveResource, ResourceRegistry } from "../registry/types";

const optionalName = z.string().trim().min(1).nullable().default(null);

export const reserveCloneSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1),
  kind: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase()),
  scope: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase())
    .nullable()
    .default(null),
  sourceDatabase: optionalName,
  sourceSchema: optionalName,
  classifications: z.array(z.string().trim().min(1)).default([]),
  metadata: z.record(z.unknown()).nullable().default(null)
});

export type ReserveResult =
  | { status: "CREATED"; clone: LiveResource; verdict: Verdict; record: RecordResult }
  | { status: "BLOCKED"; verdict: Verdict; record: RecordResult }
  | ErrorResult;

export type RetireResult = { status: "SUCCESS"; clone: LiveResource; record: RecordResult } | ErrorResult;

export type CloneService = {
  reserveClone: (input: unknown, actor: ActorIdentity, clientIp: string | null) => Promise<ReserveResult>;
  retireClone: (id: string, actor: ActorIdentity, clientIp: string | null) => Promise<RetireResult>;
};

/** Registers clones through the Quota Guard so quota checks and registration cannot interleave. */
export function createCloneService(options: {
  registry: ResourceRegistry;
  quota: QuotaGuard;
  recorder: AuditRecorder;
  clock: Clock;
}): CloneService {
  const reserveClone = async (
    input: unknown,
    actor: ActorIdentity,
    clientIp: string | null
  ): Promise<ReserveResult> => {
    const parsed = reserveCloneSchema.safeParse(input);
    if (!parsed.success) {
      return toErrorResult(new ValidationError("Invalid clone request", parsed.error.issues));
    }
    const request = parsed.data;
    const id = request.id ?? randomUUID();
    const resource = {
      id,
      name: request.name,
      kind: request.kind,
      sourceDatabase: request.sourceDatabase,
      sourceSchema: request.sourceSchema,
      classifications: request.classifications
    };

    try {
      const outcome = await options.quota.guardCreate(
        { resource, scope: request.scope, actor, clientIp, metadata: request.metadata },
        () =>
          options.registry.registerResource({
            ...resource,
            scope: request.scope,
            owner: actor.id,
            createdAt: options.clock.now()
          })
      );
      if (outcome.status === "BLOCKED") {
        return outcome;
      }
      return { status: "CREATED", clone: outcome.resource, verdict: outcome.verdict, record: outcome.record };
    } catch (error) {
      // A duplicate id surfaces as a ConflictError from the registry; the guard has already audited it.
      if (error instanceof GovernanceError) {
        return toErrorResult(error);
      }
      throw error;
    }
  };

  const retireClone = async (id: string, actor: ActorIdentity, clientIp: string | null): Promise<RetireResult> => {
    const clone = await options.registry.retireResource(id);
    if (!clone) {
      return toErrorResult(new NotFoundError(`Clone ${id} not found`));
    }
    const record = await options.recorder.recordOperation({
      operation: "DELETE",
      status: "SUCCESS",
      resource: {
        id: clone.id,
        name: clone.name,
        kind: clone.kind,
        sourceDatabase: clone.sourceDatabase,
        sourceSchema: clone.sourceSchema,
        classifications: clone.classifications
      },
      scope: clone.scope,
      actor,
      occurredAt: options.clock.now(),
      clientIp,
      metadata: { owner: clone.owner, createdAt: clone.createdAt.toISOString() }
    });
    return { status: "SUCCESS", clone, record };
  };

  return { reserveClone, retireClone };
}
