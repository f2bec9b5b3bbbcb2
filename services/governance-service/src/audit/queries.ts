import { daysBefore } from "../clock";
import type { AccessLogStore, AuditLogStore } from "./store";
import type { AccessFilters, AccessRecord, AuditFilters, AuditRecord } from "./types";

export const AUDIT_LOOKBACK_DAYS = 30;
export const MAX_AUDIT_LIMIT = 1000;

export type AuditQueries = {
  listAuditRecords: (filters: AuditFilters, now: Date) => Promise<AuditRecord[]>;
  getAuditRecord: (id: string) => Promise<AuditRecord | null>;
  listAccessRecords: (filters: AccessFilters, now: Date) => Promise<AccessRecord[]>;
};

function clampLimit(limit: number | undefined): number {
  return Math.min(limit ?? MAX_AUDIT_LIMIT, MAX_AUDIT_LIMIT);
}

export function createAuditQueries(options: { auditLog: AuditLogStore; accessLog: AccessLogStore }): AuditQueries {
  return {
    listAuditRecords: (filters, now) =>
      options.auditLog.listAuditRecords({
        ...filters,
        since: filters.since ?? daysBefore(now, AUDIT_LOOKBACK_DAYS),
        until: filters.until ?? now,
        limit: clampLimit(filters.limit)
      }),
    getAuditRecord: (id) => options.auditLog.getAuditRecord(id),
    listAccessRecords: (filters, now) =>
      options.accessLog.listAccessRecords({
        ...filters,
        since: filters.since ?? daysBefore(now, AUDIT_LOOKBACK_DAYS),
        until: filters.until ?? now,
        limit: clampLimit(filters.limit)
      })
  };
}
