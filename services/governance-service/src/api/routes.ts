import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z, ZodError } from "zod";
import { OPERATION_KINDS, OPERATION_STATUSES } from "../audit/types";
import type { GovernanceEngine } from "../engine";
import { GovernanceError, ValidationError, statusCodeFor } from "../errors";
import type { ErrorResult } from "../errors";
import type { ActorIdentity } from "../evaluator/types";
import { logger } from "../logger";
import { policyKindSchema, severitySchema } from "../policies/schema";
import { getTraceIdFromRequest, normalizeHeader, withTraceId } from "../trace/trace";

const upperName = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toUpperCase());
const optionalText = z.string().trim().min(1).nullable().default(null);
const booleanQuery = z.enum(["true", "false"]).transform((value) => value === "true");
const pageQuery = {
  limit: z.coerce.number().int().positive().max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional()
};
const rangeQuery = {
  since: z.coerce.date().optional(),
  until: z.coerce.date().optional()
};

const resourceSchema = z.object({
  id: z.string().trim().min(1).nullable().default(null),
  name: z.string().trim().min(1),
  kind: upperName,
  sourceDatabase: optionalText,
  sourceSchema: optionalText,
  classifications: z.array(z.string().trim().min(1)).default([])
});

const nameParamsSchema = z.object({ name: z.string().min(1) });
const idParamsSchema = z.object({ id: z.string().min(1) });
const auditParamsSchema = z.object({ auditId: z.string().min(1) });

const policyQuerySchema = z.object({
  scope: upperName.optional(),
  kind: policyKindSchema.optional(),
  activeOnly: booleanQuery.optional()
});

const policyStatusSchema = z.object({ active: z.boolean() });

const evaluateSchema = z.object({
  operation: z.enum(OPERATION_KINDS).default("CREATE"),
  resource: resourceSchema,
  scope: upperName.nullable().default(null),
  liveResourceCount: z.number().int().min(0).optional()
});

const operationSchema = z.object({
  operation: z.enum(OPERATION_KINDS),
  status: z.enum(OPERATION_STATUSES),
  resource: resourceSchema,
  scope: upperName.nullable().default(null),
  errorMessage: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
  liveResourceCount: z.number().int().min(0).optional()
});

const accessSchema = z.object({
  resourceId: z.string().trim().min(1).nullable().default(null),
  resourceName: z.string().trim().min(1),
  accessType: upperName,
  queryId: z.string().nullable().optional(),
  rowsAccessed: z.number().int().min(0).nullable().optional()
});

const auditQuerySchema = z.object({
  ...rangeQuery,
  ...pageQuery,
  operation: z.enum(OPERATION_KINDS).optional(),
  actor: z.string().min(1).optional(),
  scope: upperName.optional(),
  status: z.enum(OPERATION_STATUSES).optional()
});

const accessQuerySchema = z.object({
  ...rangeQuery,
  ...pageQuery,
  actor: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional()
});

const violationQuerySchema = z.object({
  ...rangeQuery,
  ...pageQuery,
  status: z.enum(["OPEN", "RESOLVED"]).optional(),
  severity: severitySchema.optional(),
  actor: z.string().min(1).optional(),
  policyName: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional()
});

const resolveSchema = z.object({ notes: z.string().trim().min(1).nullable().default(null) });

const scanSchema = z.object({ scope: upperName.nullable().default(null) });

const purgeSchema = z.object({
  retentionDays: z.number().optional(),
  dryRun: z.boolean().optional()
});

export function actorFromRequest(request: Pick<FastifyRequest, "headers">): ActorIdentity {
  const id = normalizeHeader(request.headers["x-actor-id"])?.trim();
  if (!id) {
    throw new ValidationError("x-actor-id header is required");
  }
  return {
    id,
    role: normalizeHeader(request.headers["x-actor-role"])?.trim() || null,
    sessionId: normalizeHeader(request.headers["x-session-id"])?.trim() || null
  };
}

function sendError(reply: FastifyReply, result: ErrorResult, traceId: string): ErrorResult & { traceId: string } {
  reply.code(statusCodeFor(result.code));
  return { ...result, traceId };
}

export async function registerRoutes(app: FastifyInstance, engine: GovernanceEngine): Promise<void> {
  const { clock } = engine;

  app.setErrorHandler((error, request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    if (error instanceof ZodError) {
      reply.code(400).send({ status: "ERROR", code: "VALIDATION", message: "Invalid request", issues: error.issues, traceId });
      return;
    }
    if (error instanceof GovernanceError) {
      reply.code(error.statusCode).send({ status: "ERROR", code: error.code, message: error.message, traceId });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      withTraceId(logger, traceId).error({ error, url: request.url }, "Request failed");
    }
    reply.code(statusCode).send({ message: statusCode >= 500 ? "Internal error" : error.message, traceId });
  });

  app.get("/v1/policies", async (request) => {
    const query = policyQuerySchema.parse(request.query ?? {});
    return engine.policies.listPolicies(query);
  });

  app.post("/v1/policies", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const result = await engine.policies.createPolicy(request.body, actorFromRequest(request), clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    reply.code(201);
    return result;
  });

  app.post("/v1/policies/defaults", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const result = await engine.policies.installDefaultPolicies(actorFromRequest(request), clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.patch("/v1/policies/:name", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { name } = nameParamsSchema.parse(request.params);
    const result = await engine.policies.updatePolicy(name, request.body, actorFromRequest(request), clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.post("/v1/policies/:name/status", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { name } = nameParamsSchema.parse(request.params);
    const body = policyStatusSchema.parse(request.body);
    const result = await engine.policies.setPolicyStatus(name, body.active, actorFromRequest(request), clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.delete("/v1/policies/:name", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { name } = nameParamsSchema.parse(request.params);
    const result = await engine.policies.deletePolicy(name, actorFromRequest(request), clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  // Advisory pre-check: nothing is recorded and the count may change before creation.
  app.post("/v1/evaluate", async (request) => {
    const body = evaluateSchema.parse(request.body);
    const actor = actorFromRequest(request);
    const liveResourceCount = body.liveResourceCount ?? (await engine.storage.registry.countLiveResources(actor.id));
    return engine.evaluator.evaluate({
      operation: body.operation,
      resource: body.resource,
      scope: body.scope,
      actor,
      liveResourceCount,
      now: clock.now()
    });
  });

  app.post("/v1/operations", async (request, reply) => {
    const body = operationSchema.parse(request.body);
    const result = await engine.recorder.recordOperation({
      ...body,
      actor: actorFromRequest(request),
      occurredAt: clock.now(),
      clientIp: request.ip
    });
    reply.code(result.status === "RECORDED" ? 201 : 503);
    return { ...result, traceId: getTraceIdFromRequest(request) };
  });

  app.post("/v1/access", async (request, reply) => {
    const body = accessSchema.parse(request.body);
    const result = await engine.recorder.recordAccess({
      ...body,
      actor: actorFromRequest(request),
      occurredAt: clock.now()
    });
    reply.code(result.status === "RECORDED" ? 201 : 503);
    return { ...result, traceId: getTraceIdFromRequest(request) };
  });

  app.get("/v1/access", async (request) => {
    const query = accessQuerySchema.parse(request.query ?? {});
    const records = await engine.audit.listAccessRecords(query, clock.now());
    return { records };
  });

  app.get("/v1/audit", async (request) => {
    const query = auditQuerySchema.parse(request.query ?? {});
    const records = await engine.audit.listAuditRecords(query, clock.now());
    return { records };
  });

  app.get("/v1/audit/:auditId", async (request, reply) => {
    const { auditId } = auditParamsSchema.parse(request.params);
    const record = await engine.audit.getAuditRecord(auditId);
    if (!record) {
      reply.code(404);
      return { message: "Audit record not found", traceId: getTraceIdFromRequest(request) };
    }
    return record;
  });

  app.get("/v1/violations", async (request) => {
    const { actor, ...query } = violationQuerySchema.parse(request.query ?? {});
    const violations = await engine.violations.listViolations({ ...query, violator: actor }, clock.now());
    return { violations };
  });

  app.post("/v1/violations/:id/resolve", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { id } = idParamsSchema.parse(request.params);
    const body = resolveSchema.parse(request.body ?? {});
    const result = await engine.violations.resolveViolation(id, actorFromRequest(request).id, body.notes, clock.now());
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.post("/v1/clones", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const result = await engine.clones.reserveClone(request.body, actorFromRequest(request), request.ip);
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    reply.code(result.status === "CREATED" ? 201 : 403);
    return { ...result, traceId };
  });

  app.delete("/v1/clones/:id", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const { id } = idParamsSchema.parse(request.params);
    const result = await engine.clones.retireClone(id, actorFromRequest(request), request.ip);
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.post("/v1/compliance/scan", async (request) => {
    const body = scanSchema.parse(request.body ?? {});
    return engine.scanner.scanCompliance({ scope: body.scope });
  });

  app.post("/v1/retention/purge", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const body = purgeSchema.parse(request.body ?? {});
    const result = await engine.purger.purge(body);
    if (result.status === "ERROR") {
      return sendError(reply, result, traceId);
    }
    return result;
  });

  app.get("/v1/recorder/stats", async () => engine.recorder.stats());
}
