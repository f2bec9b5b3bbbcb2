import type { Pool } from "pg";
import type { PolicyKind, Severity } from "../policies/types";
import type { ViolationStore } from "./store";
import type {
  NewViolation,
  ViolationDetails,
  ViolationFilters,
  ViolationRecord,
  ViolationResolution,
  ViolationStatus
} from "./types";

export type ViolationRow = {
  id: string;
  detected_at: Date;
  policy_id: string;
  policy_name: string;
  policy_kind: PolicyKind;
  resource_id: string | null;
  resource_name: string | null;
  violator: string;
  details: ViolationDetails;
  severity: Severity;
  status: ViolationStatus;
  audit_id: string | null;
  resolved_by: string | null;
  resolved_at: Date | null;
  resolution_notes: string | null;
};

export const VIOLATION_COLUMNS =
  "id, detected_at, policy_id, policy_name, policy_kind, resource_id, resource_name, violator, details, severity, status, audit_id, resolved_by, resolved_at, resolution_notes";

const PURGEABLE = "status = 'RESOLVED' AND detected_at < $1";

export function mapViolationRow(row: ViolationRow): ViolationRecord {
  return {
    id: row.id,
    policyId: row.policy_id,
    policyName: row.policy_name,
    policyKind: row.policy_kind,
    resourceId: row.resource_id,
    resourceName: row.resource_name,
    violator: row.violator,
    details: row.details,
    severity: row.severity,
    status: row.status,
    detectedAt: row.detected_at,
    auditId: row.audit_id,
    resolvedBy: row.resolved_by,
    resolvedAt: row.resolved_at,
    resolutionNotes: row.resolution_notes
  };
}

export function buildViolationInsert(violations: NewViolation[]): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const rows: string[] = [];
  violations.forEach((violation, index) => {
    const base = index * 11;
    const placeholders = Array.from({ length: 11 }, (_, offset) => `$${base + offset + 1}`);
    rows.push(`(${placeholders.join(",")},'OPEN')`);
    values.push(
      violation.id,
      violation.detectedAt,
      violation.policyId,
      violation.policyName,
      violation.policyKind,
      violation.resourceId,
      violation.resourceName,
      violation.violator,
      JSON.stringify(violation.details),
      violation.severity,
      violation.auditId
    );
  });
  return {
    text: `INSERT INTO clone_policy_violations
      (id, detected_at, policy_id, policy_name, policy_kind, resource_id, resource_name, violator, details, severity, audit_id, status)
      VALUES ${rows.join(",")}
      RETURNING ${VIOLATION_COLUMNS}`,
    values
  };
}

export class PostgresViolationStore implements ViolationStore {
  constructor(private readonly db: Pool) {}

  async insertViolations(violations: NewViolation[]): Promise<ViolationRecord[]> {
    if (!violations.length) {
      return [];
    }
    const insert = buildViolationInsert(violations);
    const result = await this.db.query<ViolationRow>(insert.text, insert.values);
    return result.rows.map(mapViolationRow);
  }

  async getViolation(id: string): Promise<ViolationRecord | null> {
    const result = await this.db.query<ViolationRow>(
      `SELECT ${VIOLATION_COLUMNS} FROM clone_policy_violations WHERE id = $1`,
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapViolationRow(result.rows[0]);
  }

  async findOpenViolation(policyId: string, resourceId: string): Promise<ViolationRecord | null> {
    const result = await this.db.query<ViolationRow>(
      `SELECT ${VIOLATION_COLUMNS} FROM clone_policy_violations
       WHERE policy_id = $1 AND resource_id = $2 AND status = 'OPEN'
       LIMIT 1`,
      [policyId, resourceId]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapViolationRow(result.rows[0]);
  }

  async listViolations(filters?: ViolationFilters): Promise<ViolationRecord[]> {
    const clauses: string[] = [];
    const values: Array<string | number | Date> = [];

    const where = (column: string, value: string | Date, operator = "="): void => {
      values.push(value);
      clauses.push(`${column} ${operator} $${values.length}`);
    };

    if (filters?.status) {
      where("status", filters.status);
    }
    if (filters?.severity) {
      where("severity", filters.severity);
    }
    if (filters?.violator) {
      where("violator", filters.violator);
    }
    if (filters?.policyName) {
      where("policy_name", filters.policyName);
    }
    if (filters?.resourceId) {
      where("resource_id", filters.resourceId);
    }
    if (filters?.since) {
      where("detected_at", filters.since, ">=");
    }
    if (filters?.until) {
      where("detected_at", filters.until, "<=");
    }

    let query = `SELECT ${VIOLATION_COLUMNS} FROM clone_policy_violations`;
    if (clauses.length) {
      query += ` WHERE ${clauses.join(" AND ")}`;
    }
    query +=
      " ORDER BY CASE severity WHEN 'CRITICAL' THEN 1 WHEN 'ERROR' THEN 2 WHEN 'WARNING' THEN 3 ELSE 4 END, detected_at DESC, id ASC";

    if (filters?.limit) {
      values.push(filters.limit);
      query += ` LIMIT $${values.length}`;
    }
    if (filters?.offset) {
      values.push(filters.offset);
      query += ` OFFSET $${values.length}`;
    }

    const result = await this.db.query<ViolationRow>(query, values);
    return result.rows.map(mapViolationRow);
  }

  async resolveViolation(id: string, resolution: ViolationResolution): Promise<ViolationRecord | null> {
    const result = await this.db.query<ViolationRow>(
      `UPDATE clone_policy_violations
       SET status = 'RESOLVED', resolved_by = $2, resolved_at = $3, resolution_notes = $4
       WHERE id = $1 AND status = 'OPEN'
       RETURNING ${VIOLATION_COLUMNS}`,
      [id, resolution.resolvedBy, resolution.resolvedAt, resolution.notes]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapViolationRow(result.rows[0]);
  }

  async countPurgeable(cutoff: Date): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM clone_policy_violations WHERE ${PURGEABLE}`,
      [cutoff]
    );
    return result.rows[0]?.count ?? 0;
  }

  async deletePurgeable(cutoff: Date, limit: number): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM clone_policy_violations
       WHERE id IN (SELECT id FROM clone_policy_violations WHERE ${PURGEABLE} ORDER BY detected_at LIMIT $2)`,
      [cutoff, limit]
    );
    return result.rowCount ?? 0;
  }
}
