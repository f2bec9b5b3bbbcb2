import { randomUUID } from "node:crypto";
import { ConflictError } from "../errors";
import { comparePolicies, policyAppliesToScope } from "./types";
import type { NewPolicy, PolicyChanges, PolicyFilters, PolicyRecord } from "./types";

export interface PolicyStore {
  insertPolicy(policy: NewPolicy): Promise<PolicyRecord>;
  getPolicyByName(name: string): Promise<PolicyRecord | null>;
  listPolicies(filters?: PolicyFilters): Promise<PolicyRecord[]>;
  listActivePolicies(scope: string | null): Promise<PolicyRecord[]>;
  updatePolicy(name: string, changes: PolicyChanges): Promise<PolicyRecord | null>;
  deletePolicy(name: string): Promise<PolicyRecord | null>;
}

export class InMemoryPolicyStore implements PolicyStore {
  private readonly policies = new Map<string, PolicyRecord>();

  async insertPolicy(policy: NewPolicy): Promise<PolicyRecord> {
    if (this.policies.has(policy.name)) {
      throw new ConflictError(`Policy ${policy.name} already exists`);
    }
    const record: PolicyRecord = {
      id: randomUUID(),
      ...policy,
      updatedBy: null,
      updatedAt: null
    };
    this.policies.set(record.name, record);
    return { ...record };
  }

  async getPolicyByName(name: string): Promise<PolicyRecord | null> {
    const record = this.policies.get(name);
    return record ? { ...record } : null;
  }

  async listPolicies(filters?: PolicyFilters): Promise<PolicyRecord[]> {
    return Array.from(this.policies.values())
      .filter((policy) => {
        if (filters?.scope && !policyAppliesToScope(policy.scope, filters.scope)) {
          return false;
        }
        if (filters?.kind && policy.kind !== filters.kind) {
          return false;
        }
        if (filters?.activeOnly && !policy.active) {
          return false;
        }
        return true;
      })
      .sort(comparePolicies)
      .map((policy) => ({ ...policy }));
  }

  async listActivePolicies(scope: string | null): Promise<PolicyRecord[]> {
    return Array.from(this.policies.values())
      .filter((policy) => policy.active && policyAppliesToScope(policy.scope, scope))
      .map((policy) => ({ ...policy }));
  }

  async updatePolicy(name: string, changes: PolicyChanges): Promise<PolicyRecord | null> {
    const existing = this.policies.get(name);
    if (!existing) {
      return null;
    }
    const updated: PolicyRecord = {
      ...existing,
      scope: changes.scope !== undefined ? changes.scope : existing.scope,
      description: changes.description !== undefined ? changes.description : existing.description,
      definition: changes.definition ?? existing.definition,
      severity: changes.severity ?? existing.severity,
      active: changes.active ?? existing.active,
      updatedBy: changes.updatedBy,
      updatedAt: changes.updatedAt
    };
    this.policies.set(name, updated);
    return { ...updated };
  }

  async deletePolicy(name: string): Promise<PolicyRecord | null> {
    const existing = this.policies.get(name);
    if (!existing) {
      return null;
    }
    this.policies.delete(name);
    return existing;
  }
}
