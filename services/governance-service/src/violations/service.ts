import { daysBefore } from "../clock";
import { NotFoundError, ConflictError, toErrorResult } from "../errors";
import type { ErrorResult } from "../errors";
import type { ViolationStore } from "./store";
import type { ViolationFilters, ViolationRecord } from "./types";

export const VIOLATION_LOOKBACK_DAYS = 90;
export const DEFAULT_VIOLATION_LIMIT = 1000;

export type ResolveResult = { status: "SUCCESS"; violation: ViolationRecord } | ErrorResult;

export type ViolationService = {
  resolveViolation: (id: string, resolver: string, notes: string | null, now: Date) => Promise<ResolveResult>;
  listViolations: (filters: ViolationFilters, now: Date) => Promise<ViolationRecord[]>;
};

export function createViolationService(options: { store: ViolationStore }): ViolationService {
  const { store } = options;

  return {
    resolveViolation: async (id, resolver, notes, now) => {
      const existing = await store.getViolation(id);
      if (!existing) {
        return toErrorResult(new NotFoundError(`Violation ${id} not found`));
      }
      if (existing.status === "RESOLVED") {
        return toErrorResult(new ConflictError(`Violation ${id} is already resolved`));
      }
      const violation = await store.resolveViolation(id, { resolvedBy: resolver, resolvedAt: now, notes });
      if (!violation) {
        // Resolved concurrently between the read and the update.
        return toErrorResult(new ConflictError(`Violation ${id} is already resolved`));
      }
      return { status: "SUCCESS", violation };
    },
    listViolations: (filters, now) =>
      store.listViolations({
        ...filters,
        since: filters.since ?? daysBefore(now, VIOLATION_LOOKBACK_DAYS),
        until: filters.until ?? now,
        limit: filters.limit ?? DEFAULT_VIOLATION_LIMIT
      })
  };
}
