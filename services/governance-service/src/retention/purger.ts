import type { Logger } from "pino";
import type { AccessLogStore, AuditLogStore } from "../audit/store";
import type { Clock } from "../clock";
import { daysBefore } from "../clock";
import { ValidationError, toErrorResult } from "../errors";
import type { ErrorResult } from "../errors";
import { logger as defaultLogger } from "../logger";
import type { ViolationStore } from "../violations/store";

export const DEFAULT_RETENTION_DAYS = 365;

export type PurgeMode = "DRY_RUN" | "EXECUTED";

export type PurgeCounts = {
  auditLog: number;
  violations: number;
  accessLog: number;
  total: number;
};

export type PurgeResult = {
  status: "SUCCESS";
  mode: PurgeMode;
  retentionDays: number;
  cutoff: Date;
  counts: PurgeCounts;
  cancelled: boolean;
};

export type PurgeOptions = {
  retentionDays?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
};

export type RetentionPurger = {
  purge: (options?: PurgeOptions) => Promise<PurgeResult | ErrorResult>;
};

type BatchDelete = (cutoff: Date, limit: number) => Promise<number>;

export function createRetentionPurger(options: {
  auditLog: AuditLogStore;
  violations: ViolationStore;
  accessLog: AccessLogStore;
  clock: Clock;
  batchSize: number;
  logger?: Logger;
}): RetentionPurger {
  const log = options.logger ?? defaultLogger;

  /** Returns the number deleted and whether the signal stopped it early. */
  async function drain(
    deleteBatch: BatchDelete,
    cutoff: Date,
    signal: AbortSignal | undefined
  ): Promise<{ deleted: number; cancelled: boolean }> {
    let deleted = 0;
    for (;;) {
      if (signal?.aborted) {
        return { deleted, cancelled: true };
      }
      const removed = await deleteBatch(cutoff, options.batchSize);
      deleted += removed;
      if (removed < options.batchSize) {
        return { deleted, cancelled: false };
      }
    }
  }

  const purge = async (purgeOptions: PurgeOptions = {}): Promise<PurgeResult | ErrorResult> => {
    const retentionDays = purgeOptions.retentionDays ?? DEFAULT_RETENTION_DAYS;
    const dryRun = purgeOptions.dryRun ?? true;
    if (!Number.isFinite(retentionDays) || retentionDays <= 0) {
      return toErrorResult(new ValidationError("retentionDays must be a positive number"));
    }
    const cutoff = daysBefore(options.clock.now(), retentionDays);

    if (dryRun) {
      const [auditLog, violations, accessLog] = await Promise.all([
        options.auditLog.countOlderThan(cutoff),
        options.violations.countPurgeable(cutoff),
        options.accessLog.countOlderThan(cutoff)
      ]);
      const counts = { auditLog, violations, accessLog, total: auditLog + violations + accessLog };
      log.info({ retentionDays, cutoff, counts }, "Retention purge dry run");
      return { status: "SUCCESS", mode: "DRY_RUN", retentionDays, cutoff, counts, cancelled: false };
    }

    const signal = purgeOptions.signal;
    const counts: PurgeCounts = { auditLog: 0, violations: 0, accessLog: 0, total: 0 };
    const steps: Array<[keyof Omit<PurgeCounts, "total">, BatchDelete]> = [
      ["violations", (at, limit) => options.violations.deletePurgeable(at, limit)],
      ["auditLog", (at, limit) => options.auditLog.deleteOlderThan(at, limit)],
      ["accessLog", (at, limit) => options.accessLog.deleteOlderThan(at, limit)]
    ];
    let cancelled = false;
    for (const [key, deleteBatch] of steps) {
      const outcome = await drain(deleteBatch, cutoff, signal);
      counts[key] = outcome.deleted;
      if (outcome.cancelled) {
        cancelled = true;
        break;
      }
    }
    counts.total = counts.auditLog + counts.violations + counts.accessLog;
    log.info({ retentionDays, cutoff, counts, cancelled }, "Retention purge executed");
    return { status: "SUCCESS", mode: "EXECUTED", retentionDays, cutoff, counts, cancelled };
  };

  return { purge };
}
