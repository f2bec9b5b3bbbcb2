import type { PolicyAction, PolicyKind, Severity } from "../policies/types";

export type ViolationStatus = "OPEN" | "RESOLVED";

export type ViolationDetails = {
  message: string;
  action: PolicyAction;
  [key: string]: unknown;
};

export type ViolationRecord = {
  id: string;
  policyId: string;
  policyName: string;
  policyKind: PolicyKind;
  resourceId: string | null;
  resourceName: string | null;
  violator: string;
  details: ViolationDetails;
  severity: Severity;
  status: ViolationStatus;
  detectedAt: Date;
  auditId: string | null;
  resolvedBy: string | null;
  resolvedAt: Date | null;
  resolutionNotes: string | null;
};

export type NewViolation = {
  id: string;
  policyId: string;
  policyName: string;
  policyKind: PolicyKind;
  resourceId: string | null;
  resourceName: string | null;
  violator: string;
  details: ViolationDetails;
  severity: Severity;
  detectedAt: Date;
  auditId: string | null;
};

export type ViolationResolution = {
  resolvedBy: string;
  resolvedAt: Date;
  notes: string | null;
};

export type ViolationFilters = {
  status?: ViolationStatus;
  severity?: Severity;
  violator?: string;
  policyName?: string;
  resourceId?: string;
  since?: Date;
  until?: Date;
  limit?: number;
  offset?: number;
};

export function toViolationRecord(violation: NewViolation): ViolationRecord {
  return {
    ...violation,
    status: "OPEN",
    resolvedBy: null,
    resolvedAt: null,
    resolutionNotes: null
  };
}
