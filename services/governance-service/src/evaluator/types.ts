import type { OperationKind } from "../audit/types";
import type { PolicyAction, PolicyKind, Severity } from "../policies/types";
import type { ViolationDetails } from "../violations/types";

export type ActorIdentity = {
  id: string;
  role: string | null;
  sessionId: string | null;
};

export type ResourceDescriptor = {
  id: string | null;
  name: string;
  kind: string;
  sourceDatabase: string | null;
  sourceSchema: string | null;
  classifications: string[];
};

export type EvaluationContext = {
  operation: OperationKind;
  resource: ResourceDescriptor;
  scope: string | null;
  actor: ActorIdentity;
  liveResourceCount: number;
  now: Date;
};

export type RuleMatch = {
  message: string;
  details?: Record<string, unknown>;
};

export type ViolationCandidate = {
  policyId: string;
  policyName: string;
  policyKind: PolicyKind;
  severity: Severity;
  action: PolicyAction;
  blocking: boolean;
  details: ViolationDetails;
};

export type Verdict = {
  violations: ViolationCandidate[];
  block: boolean;
  evaluatedPolicies: number;
  skippedPolicies: string[];
};
