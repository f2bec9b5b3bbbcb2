export const POLICY_KINDS = [
  "MAX_AGE",
  "RESTRICTED_SOURCE",
  "DATA_CLASSIFICATION",
  "USER_QUOTA",
  "ENVIRONMENT_RESTRICTION",
  "TIME_RESTRICTION",
  "SENSITIVE_DATA",
  "APPROVAL_REQUIRED"
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

export const SEVERITIES = ["INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const POLICY_ACTIONS = ["BLOCK", "REQUIRE_APPROVAL", "WARN", "WARN_AND_LOG", "LOG"] as const;

export type PolicyAction = (typeof POLICY_ACTIONS)[number];

export const WEEKDAYS = ["MON", "TUE", "WED", "THU", "FRI", "SAT", "SUN"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export type MaxAgeDefinition = {
  maxAgeDays: number;
  action: PolicyAction;
};

export type RestrictedSourceDefinition = {
  restrictedSources: string[];
  action: PolicyAction;
};

export type DataClassificationDefinition = {
  restrictedClassifications: string[];
  action: PolicyAction;
};

export type UserQuotaDefinition = {
  maxResources: number;
  action: PolicyAction;
};

export type EnvironmentRestrictionDefinition = {
  restrictedKinds: string[];
  action: PolicyAction;
};

export type TimeRestrictionDefinition = {
  allowedHoursStart: number;
  allowedHoursEnd: number;
  allowedDays: Weekday[];
  timezone: string;
  action: PolicyAction;
};

export type SensitiveDataDefinition = {
  restrictedSchemas: string[];
  approvers: string[];
  action: PolicyAction;
};

export type ApprovalRequiredDefinition = {
  approvers: string[];
  appliesToKinds?: string[];
  action: PolicyAction;
};

export type PolicyRule =
  | { kind: "MAX_AGE"; definition: MaxAgeDefinition }
  | { kind: "RESTRICTED_SOURCE"; definition: RestrictedSourceDefinition }
  | { kind: "DATA_CLASSIFICATION"; definition: DataClassificationDefinition }
  | { kind: "USER_QUOTA"; definition: UserQuotaDefinition }
  | { kind: "ENVIRONMENT_RESTRICTION"; definition: EnvironmentRestrictionDefinition }
  | { kind: "TIME_RESTRICTION"; definition: TimeRestrictionDefinition }
  | { kind: "SENSITIVE_DATA"; definition: SensitiveDataDefinition }
  | { kind: "APPROVAL_REQUIRED"; definition: ApprovalRequiredDefinition };

/**
 * Stored shape of a policy. `definition` stays an untyped document at rest;
 * it is parsed into a {@link PolicyRule} when a policy is created and again
 * each time it is evaluated.
 */
export type PolicyRecord = {
  id: string;
  name: string;
  kind: PolicyKind;
  scope: string | null;
  description: string | null;
  definition: Record<string, unknown>;
  severity: Severity;
  active: boolean;
  createdBy: string;
  createdAt: Date;
  updatedBy: string | null;
  updatedAt: Date | null;
};

export type NewPolicy = {
  name: string;
  kind: PolicyKind;
  scope: string | null;
  description: string | null;
  definition: Record<string, unknown>;
  severity: Severity;
  active: boolean;
  createdBy: string;
  createdAt: Date;
};

export type PolicyChanges = {
  scope?: string | null;
  description?: string | null;
  definition?: Record<string, unknown>;
  severity?: Severity;
  active?: boolean;
  updatedBy: string;
  updatedAt: Date;
};

export type PolicyFilters = {
  scope?: string;
  kind?: PolicyKind;
  activeOnly?: boolean;
};

export function comparePolicies(a: PolicyRecord, b: PolicyRecord): number {
  const severityDiff = severityRank(b.severity) - severityRank(a.severity);
  if (severityDiff !== 0) {
    return severityDiff;
  }
  return a.name.localeCompare(b.name);
}

export function policyAppliesToScope(policyScope: string | null, scope: string | null): boolean {
  return policyScope === null || policyScope === scope;
}
