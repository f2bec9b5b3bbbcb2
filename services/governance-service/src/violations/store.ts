import { severityRank } from "../policies/types";
import { toViolationRecord } from "./types";
import type { NewViolation, ViolationFilters, ViolationRecord, ViolationResolution } from "./types";

export interface ViolationStore {
  insertViolations(violations: NewViolation[]): Promise<ViolationRecord[]>;
  getViolation(id: string): Promise<ViolationRecord | null>;
  findOpenViolation(policyId: string, resourceId: string): Promise<ViolationRecord | null>;
  listViolations(filters?: ViolationFilters): Promise<ViolationRecord[]>;
  resolveViolation(id: string, resolution: ViolationResolution): Promise<ViolationRecord | null>;
  countPurgeable(cutoff: Date): Promise<number>;
  deletePurgeable(cutoff: Date, limit: number): Promise<number>;
}

export function compareViolations(a: ViolationRecord, b: ViolationRecord): number {
  const severityDiff = severityRank(b.severity) - severityRank(a.severity);
  if (severityDiff !== 0) {
    return severityDiff;
  }
  const timeDiff = b.detectedAt.getTime() - a.detectedAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}

function isPurgeable(violation: ViolationRecord, cutoff: Date): boolean {
  return violation.status === "RESOLVED" && violation.detectedAt < cutoff;
}

export class InMemoryViolationStore implements ViolationStore {
  private readonly violations = new Map<string, ViolationRecord>();

  /** Synchronous insert so the ledger can pair it with an audit append. */
  append(violations: NewViolation[]): ViolationRecord[] {
    const records = violations.map(toViolationRecord);
    for (const record of records) {
      this.violations.set(record.id, record);
    }
    return records.map((record) => ({ ...record }));
  }

  async insertViolations(violations: NewViolation[]): Promise<ViolationRecord[]> {
    return this.append(violations);
  }

  async getViolation(id: string): Promise<ViolationRecord | null> {
    const record = this.violations.get(id);
    return record ? { ...record } : null;
  }

  async findOpenViolation(policyId: string, resourceId: string): Promise<ViolationRecord | null> {
    for (const record of this.violations.values()) {
      if (record.status === "OPEN" && record.policyId === policyId && record.resourceId === resourceId) {
        return { ...record };
      }
    }
    return null;
  }

  async listViolations(filters?: ViolationFilters): Promise<ViolationRecord[]> {
    const filtered = Array.from(this.violations.values()).filter((violation) => {
      if (filters?.status && violation.status !== filters.status) {
        return false;
      }
      if (filters?.severity && violation.severity !== filters.severity) {
        return false;
      }
      if (filters?.violator && violation.violator !== filters.violator) {
        return false;
      }
      if (filters?.policyName && violation.policyName !== filters.policyName) {
        return false;
      }
      if (filters?.resourceId && violation.resourceId !== filters.resourceId) {
        return false;
      }
      if (filters?.since && violation.detectedAt < filters.since) {
        return false;
      }
      if (filters?.until && violation.detectedAt > filters.until) {
        return false;
      }
      return true;
    });

    const offset = filters?.offset ?? 0;
    const end = filters?.limit ? offset + filters.limit : undefined;
    return filtered
      .sort(compareViolations)
      .slice(offset, end)
      .map((violation) => ({ ...violation }));
  }

  async resolveViolation(id: string, resolution: ViolationResolution): Promise<ViolationRecord | null> {
    const existing = this.violations.get(id);
    if (!existing || existing.status !== "OPEN") {
      return null;
    }
    const resolved: ViolationRecord = {
      ...existing,
      status: "RESOLVED",
      resolvedBy: resolution.resolvedBy,
      resolvedAt: resolution.resolvedAt,
      resolutionNotes: resolution.notes
    };
    this.violations.set(id, resolved);
    return { ...resolved };
  }

  async countPurgeable(cutoff: Date): Promise<number> {
    let count = 0;
    for (const violation of this.violations.values()) {
      if (isPurgeable(violation, cutoff)) {
        count += 1;
      }
    }
    return count;
  }

  async deletePurgeable(cutoff: Date, limit: number): Promise<number> {
    let deleted = 0;
    for (const violation of Array.from(this.violations.values())) {
      if (deleted >= limit) {
        break;
      }
      if (isPurgeable(violation, cutoff)) {
        this.violations.delete(violation.id);
        deleted += 1;
      }
    }
    return deleted;
  }
}
