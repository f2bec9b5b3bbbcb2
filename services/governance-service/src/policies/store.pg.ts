import { randomUUID } from "node:crypto";
import type { Pool } from "pg";
import { ConflictError } from "../errors";
import { isUniqueViolation } from "../db";
import type { PolicyStore } from "./store";
import type { NewPolicy, PolicyChanges, PolicyFilters, PolicyKind, PolicyRecord, Severity } from "./types";

type PolicyRow = {
  id: string;
  name: string;
  kind: PolicyKind;
  scope: string | null;
  description: string | null;
  definition: Record<string, unknown>;
  severity: Severity;
  active: boolean;
  created_by: string;
  created_at: Date;
  updated_by: string | null;
  updated_at: Date | null;
};

const COLUMNS =
  "id, name, kind, scope, description, definition, severity, active, created_by, created_at, updated_by, updated_at";

const SEVERITY_ORDER =
  "CASE severity WHEN 'CRITICAL' THEN 4 WHEN 'ERROR' THEN 3 WHEN 'WARNING' THEN 2 ELSE 1 END DESC, name ASC";

function mapRow(row: PolicyRow): PolicyRecord {
  return {
    id: row.id,
    name: row.name,
    kind: row.kind,
    scope: row.scope,
    description: row.description,
    definition: row.definition,
    severity: row.severity,
    active: row.active,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedBy: row.updated_by,
    updatedAt: row.updated_at
  };
}

export class PostgresPolicyStore implements PolicyStore {
  constructor(private readonly db: Pool) {}

  async insertPolicy(policy: NewPolicy): Promise<PolicyRecord> {
    try {
      const result = await this.db.query<PolicyRow>(
        `INSERT INTO clone_policies (id, name, kind, scope, description, definition, severity, active, created_by, created_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
         RETURNING ${COLUMNS}`,
        [
          randomUUID(),
          policy.name,
          policy.kind,
          policy.scope,
          policy.description,
          JSON.stringify(policy.definition),
          policy.severity,
          policy.active,
          policy.createdBy,
          policy.createdAt
        ]
      );
      return mapRow(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Policy ${policy.name} already exists`);
      }
      throw error;
    }
  }

  async getPolicyByName(name: string): Promise<PolicyRecord | null> {
    const result = await this.db.query<PolicyRow>(`SELECT ${COLUMNS} FROM clone_policies WHERE name = $1`, [name]);
    if (result.rows.length === 0) {
      return null;
    }
    return mapRow(result.rows[0]);
  }

  async listPolicies(filters?: PolicyFilters): Promise<PolicyRecord[]> {
    const clauses: string[] = [];
    const values: Array<string | boolean> = [];

    if (filters?.scope) {
      values.push(filters.scope);
      clauses.push(`(scope IS NULL OR scope = $${values.length})`);
    }
    if (filters?.kind) {
      values.push(filters.kind);
      clauses.push(`kind = $${values.length}`);
    }
    if (filters?.activeOnly) {
      clauses.push("active = TRUE");
    }

    let query = `SELECT ${COLUMNS} FROM clone_policies`;
    if (clauses.length) {
      query += ` WHERE ${clauses.join(" AND ")}`;
    }
    query += ` ORDER BY ${SEVERITY_ORDER}`;

    const result = await this.db.query<PolicyRow>(query, values);
    return result.rows.map(mapRow);
  }

  async listActivePolicies(scope: string | null): Promise<PolicyRecord[]> {
    const result = await this.db.query<PolicyRow>(
      `SELECT ${COLUMNS} FROM clone_policies
       WHERE active = TRUE AND (scope IS NULL OR scope = $1)`,
      [scope]
    );
    return result.rows.map(mapRow);
  }

  async updatePolicy(name: string, changes: PolicyChanges): Promise<PolicyRecord | null> {
    const assignments: string[] = [];
    const values: unknown[] = [name];

    const assign = (column: string, value: unknown): void => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (changes.scope !== undefined) {
      assign("scope", changes.scope);
    }
    if (changes.description !== undefined) {
      assign("description", changes.description);
    }
    if (changes.definition !== undefined) {
      assign("definition", JSON.stringify(changes.definition));
    }
    if (changes.severity !== undefined) {
      assign("severity", changes.severity);
    }
    if (changes.active !== undefined) {
      assign("active", changes.active);
    }
    assign("updated_by", changes.updatedBy);
    assign("updated_at", changes.updatedAt);

    const result = await this.db.query<PolicyRow>(
      `UPDATE clone_policies SET ${assignments.join(", ")} WHERE name = $1 RETURNING ${COLUMNS}`,
      values
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapRow(result.rows[0]);
  }

  async deletePolicy(name: string): Promise<PolicyRecord | null> {
    const result = await this.db.query<PolicyRow>(`DELETE FROM clone_policies WHERE name = $1 RETURNING ${COLUMNS}`, [
      name
    ]);
    if (result.rows.length === 0) {
      return null;
    }
    return mapRow(result.rows[0]);
  }
}
