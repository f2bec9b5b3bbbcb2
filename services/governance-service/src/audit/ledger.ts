import type { InMemoryViolationStore } from "../violations/store";
import type { NewViolation, ViolationRecord } from "../violations/types";
import type { InMemoryAuditLogStore } from "./store";
import type { AuditRecord } from "./types";

export type CommittedOperation = {
  audit: AuditRecord;
  violations: ViolationRecord[];
};

/**
 * Writes one audit record together with the violations it references. Readers
 * never see the violations of an operation without its audit record.
 */
export interface GovernanceLedger {
  commitOperation(audit: AuditRecord, violations: NewViolation[]): Promise<CommittedOperation>;
}

export class InMemoryGovernanceLedger implements GovernanceLedger {
  constructor(
    private readonly auditLog: InMemoryAuditLogStore,
    private readonly violations: InMemoryViolationStore
  ) {}

  async commitOperation(audit: AuditRecord, violations: NewViolation[]): Promise<CommittedOperation> {
    const storedViolations = this.violations.append(violations);
    const storedAudit = this.auditLog.append(audit);
    return { audit: storedAudit, violations: storedViolations };
  }
}
