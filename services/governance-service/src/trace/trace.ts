import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

const TRACE_HEADER = "x-trace-id";

export type HeaderMap = Record<string, string | string[] | undefined>;

export function normalizeHeader(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export function ensureTraceId(headers?: HeaderMap): string {
  const candidate = headers ? normalizeHeader(headers[TRACE_HEADER]) : undefined;
  if (candidate && candidate.trim().length > 0) {
    return candidate;
  }
  return uuidv4();
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return ensureTraceId(request.headers);
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}

/** Pins one trace id per request and echoes it on the response. */
export function registerTraceHook(app: FastifyInstance): void {
  app.addHook("onRequest", (request, reply, done) => {
    const traceId = ensureTraceId(request.headers);
    request.headers[TRACE_HEADER] = traceId;
    reply.header(TRACE_HEADER, traceId);
    done();
  });
}
