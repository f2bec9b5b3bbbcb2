import { compareNewestFirst } from "./types";
import type { AccessFilters, AccessRecord, AuditFilters, AuditRecord } from "./types";

/** Audit records are written through the ledger; this store only reads and purges. */
export interface AuditLogStore {
  getAuditRecord(id: string): Promise<AuditRecord | null>;
  listAuditRecords(filters?: AuditFilters): Promise<AuditRecord[]>;
  countOlderThan(cutoff: Date): Promise<number>;
  deleteOlderThan(cutoff: Date, limit: number): Promise<number>;
}

export interface AccessLogStore {
  insertAccessRecord(record: AccessRecord): Promise<AccessRecord>;
  listAccessRecords(filters?: AccessFilters): Promise<AccessRecord[]>;
  countOlderThan(cutoff: Date): Promise<number>;
  deleteOlderThan(cutoff: Date, limit: number): Promise<number>;
}

function page<T>(records: T[], filters?: { limit?: number; offset?: number }): T[] {
  const offset = filters?.offset ?? 0;
  const end = filters?.limit ? offset + filters.limit : undefined;
  return records.slice(offset, end);
}

function deleteOldest<T extends { id: string; occurredAt: Date }>(
  records: Map<string, T>,
  cutoff: Date,
  limit: number
): number {
  let deleted = 0;
  for (const record of Array.from(records.values())) {
    if (deleted >= limit) {
      break;
    }
    if (record.occurredAt < cutoff) {
      records.delete(record.id);
      deleted += 1;
    }
  }
  return deleted;
}

function countOlder(records: Iterable<{ occurredAt: Date }>, cutoff: Date): number {
  let count = 0;
  for (const record of records) {
    if (record.occurredAt < cutoff) {
      count += 1;
    }
  }
  return count;
}

export class InMemoryAuditLogStore implements AuditLogStore {
  private readonly records = new Map<string, AuditRecord>();

  append(record: AuditRecord): AuditRecord {
    const stored = { ...record, violationIds: [...record.violationIds] };
    this.records.set(stored.id, stored);
    return { ...stored };
  }

  async getAuditRecord(id: string): Promise<AuditRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async listAuditRecords(filters?: AuditFilters): Promise<AuditRecord[]> {
    const filtered = Array.from(this.records.values()).filter((record) => {
      if (filters?.since && record.occurredAt < filters.since) {
        return false;
      }
      if (filters?.until && record.occurredAt > filters.until) {
        return false;
      }
      if (filters?.operation && record.operation !== filters.operation) {
        return false;
      }
      if (filters?.actor && record.actor !== filters.actor) {
        return false;
      }
      if (filters?.scope && record.scope !== filters.scope) {
        return false;
      }
      if (filters?.status && record.status !== filters.status) {
        return false;
      }
      return true;
    });
    return page(filtered.sort(compareNewestFirst), filters).map((record) => ({ ...record }));
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    return countOlder(this.records.values(), cutoff);
  }

  async deleteOlderThan(cutoff: Date, limit: number): Promise<number> {
    return deleteOldest(this.records, cutoff, limit);
  }
}

export class InMemoryAccessLogStore implements AccessLogStore {
  private readonly records = new Map<string, AccessRecord>();

  async insertAccessRecord(record: AccessRecord): Promise<AccessRecord> {
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  async listAccessRecords(filters?: AccessFilters): Promise<AccessRecord[]> {
    const filtered = Array.from(this.records.values()).filter((record) => {
      if (filters?.since && record.occurredAt < filters.since) {
        return false;
      }
      if (filters?.until && record.occurredAt > filters.until) {
        return false;
      }
      if (filters?.actor && record.actor !== filters.actor) {
        return false;
      }
      if (filters?.resourceId && record.resourceId !== filters.resourceId) {
        return false;
      }
      return true;
    });
    return page(filtered.sort(compareNewestFirst), filters).map((record) => ({ ...record }));
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    return countOlder(this.records.values(), cutoff);
  }

  async deleteOlderThan(cutoff: Date, limit: number): Promise<number> {
    return deleteOldest(this.records, cutoff, limit);
  }
}
