export const OPERATION_KINDS = [
  "CREATE",
  "DELETE",
  "EXTEND",
  "POLICY_CREATE",
  "POLICY_UPDATE",
  "POLICY_STATUS_CHANGE",
  "POLICY_DELETE"
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export const OPERATION_STATUSES = ["SUCCESS", "FAILURE", "BLOCKED"] as const;

export type OperationStatus = (typeof OPERATION_STATUSES)[number];

export type AuditRecord = {
  id: string;
  occurredAt: Date;
  operation: OperationKind;
  resourceId: string | null;
  resourceName: string | null;
  resourceKind: string | null;
  scope: string | null;
  sourceDatabase: string | null;
  sourceSchema: string | null;
  actor: string;
  actorRole: string | null;
  sessionId: string | null;
  clientIp: string | null;
  status: OperationStatus;
  errorMessage: string | null;
  metadata: Record<string, unknown> | null;
  violationIds: string[];
};

export type AuditFilters = {
  since?: Date;
  until?: Date;
  operation?: OperationKind;
  actor?: string;
  scope?: string;
  status?: OperationStatus;
  limit?: number;
  offset?: number;
};

export type AccessRecord = {
  id: string;
  occurredAt: Date;
  resourceId: string | null;
  resourceName: string;
  accessType: string;
  actor: string;
  sessionId: string | null;
  queryId: string | null;
  rowsAccessed: number | null;
};

export type AccessFilters = {
  since?: Date;
  until?: Date;
  actor?: string;
  resourceId?: string;
  limit?: number;
  offset?: number;
};

export function compareNewestFirst(
  a: { id: string; occurredAt: Date },
  b: { id: string; occurredAt: Date }
): number {
  const timeDiff = b.occurredAt.getTime() - a.occurredAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}
