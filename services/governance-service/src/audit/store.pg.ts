import type { Pool } from "pg";
import type { AccessLogStore, AuditLogStore } from "./store";
import type {
  AccessFilters,
  AccessRecord,
  AuditFilters,
  AuditRecord,
  OperationKind,
  OperationStatus
} from "./types";

type AuditRow = {
  id: string;
  occurred_at: Date;
  operation: OperationKind;
  resource_id: string | null;
  resource_name: string | null;
  resource_kind: string | null;
  scope: string | null;
  source_database: string | null;
  source_schema: string | null;
  actor: string;
  actor_role: string | null;
  session_id: string | null;
  client_ip: string | null;
  status: OperationStatus;
  error_message: string | null;
  metadata: Record<string, unknown> | null;
  violation_ids: string[] | null;
};

type AccessRow = {
  id: string;
  occurred_at: Date;
  resource_id: string | null;
  resource_name: string;
  access_type: string;
  actor: string;
  session_id: string | null;
  query_id: string | null;
  rows_accessed: number | null;
};

const AUDIT_COLUMNS =
  "id, occurred_at, operation, resource_id, resource_name, resource_kind, scope, source_database, source_schema, actor, actor_role, session_id, client_ip, status, error_message, metadata, violation_ids";

const ACCESS_COLUMNS =
  "id, occurred_at, resource_id, resource_name, access_type, actor, session_id, query_id, rows_accessed";

function mapAuditRow(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    occurredAt: row.occurred_at,
    operation: row.operation,
    resourceId: row.resource_id,
    resourceName: row.resource_name,
    resourceKind: row.resource_kind,
    scope: row.scope,
    sourceDatabase: row.source_database,
    sourceSchema: row.source_schema,
    actor: row.actor,
    actorRole: row.actor_role,
    sessionId: row.session_id,
    clientIp: row.client_ip,
    status: row.status,
    errorMessage: row.error_message,
    metadata: row.metadata,
    violationIds: row.violation_ids ?? []
  };
}

function mapAccessRow(row: AccessRow): AccessRecord {
  return {
    id: row.id,
    occurredAt: row.occurred_at,
    resourceId: row.resource_id,
    resourceName: row.resource_name,
    accessType: row.access_type,
    actor: row.actor,
    sessionId: row.session_id,
    queryId: row.query_id,
    rowsAccessed: row.rows_accessed
  };
}

export function buildAuditInsert(record: AuditRecord): { text: string; values: unknown[] } {
  return {
    text: `INSERT INTO clone_audit_log (${AUDIT_COLUMNS})
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17)`,
    values: [
      record.id,
      record.occurredAt,
      record.operation,
      record.resourceId,
      record.resourceName,
      record.resourceKind,
      record.scope,
      record.sourceDatabase,
      record.sourceSchema,
      record.actor,
      record.actorRole,
      record.sessionId,
      record.clientIp,
      record.status,
      record.errorMessage,
      record.metadata ? JSON.stringify(record.metadata) : null,
      record.violationIds
    ]
  };
}

type TimeRangeFilters = { since?: Date; until?: Date; limit?: number; offset?: number };

class WhereBuilder {
  readonly clauses: string[] = [];
  readonly values: Array<string | number | Date> = [];

  add(column: string, value: string | Date, operator = "="): void {
    this.values.push(value);
    this.clauses.push(`${column} ${operator} $${this.values.length}`);
  }

  range(filters?: TimeRangeFilters): void {
    if (filters?.since) {
      this.add("occurred_at", filters.since, ">=");
    }
    if (filters?.until) {
      this.add("occurred_at", filters.until, "<=");
    }
  }

  build(select: string, filters?: TimeRangeFilters): string {
    let query = select;
    if (this.clauses.length) {
      query += ` WHERE ${this.clauses.join(" AND ")}`;
    }
    query += " ORDER BY occurred_at DESC, id ASC";
    if (filters?.limit) {
      this.values.push(filters.limit);
      query += ` LIMIT $${this.values.length}`;
    }
    if (filters?.offset) {
      this.values.push(filters.offset);
      query += ` OFFSET $${this.values.length}`;
    }
    return query;
  }
}

async function countOlder(db: Pool, table: string, cutoff: Date): Promise<number> {
  const result = await db.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM ${table} WHERE occurred_at < $1`,
    [cutoff]
  );
  return result.rows[0]?.count ?? 0;
}

async function deleteOlder(db: Pool, table: string, cutoff: Date, limit: number): Promise<number> {
  const result = await db.query(
    `DELETE FROM ${table}
     WHERE id IN (SELECT id FROM ${table} WHERE occurred_at < $1 ORDER BY occurred_at LIMIT $2)`,
    [cutoff, limit]
  );
  return result.rowCount ?? 0;
}

export class PostgresAuditLogStore implements AuditLogStore {
  constructor(private readonly db: Pool) {}

  async getAuditRecord(id: string): Promise<AuditRecord | null> {
    const result = await this.db.query<AuditRow>(`SELECT ${AUDIT_COLUMNS} FROM clone_audit_log WHERE id = $1`, [id]);
    if (result.rows.length === 0) {
      return null;
    }
    return mapAuditRow(result.rows[0]);
  }

  async listAuditRecords(filters?: AuditFilters): Promise<AuditRecord[]> {
    const where = new WhereBuilder();
    where.range(filters);
    if (filters?.operation) {
      where.add("operation", filters.operation);
    }
    if (filters?.actor) {
      where.add("actor", filters.actor);
    }
    if (filters?.scope) {
      where.add("scope", filters.scope);
    }
    if (filters?.status) {
      where.add("status", filters.status);
    }
    const query = where.build(`SELECT ${AUDIT_COLUMNS} FROM clone_audit_log`, filters);
    const result = await this.db.query<AuditRow>(query, where.values);
    return result.rows.map(mapAuditRow);
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    return countOlder(this.db, "clone_audit_log", cutoff);
  }

  async deleteOlderThan(cutoff: Date, limit: number): Promise<number> {
    return deleteOlder(this.db, "clone_audit_log", cutoff, limit);
  }
}

export class PostgresAccessLogStore implements AccessLogStore {
  constructor(private readonly db: Pool) {}

  async insertAccessRecord(record: AccessRecord): Promise<AccessRecord> {
    await this.db.query(
      `INSERT INTO clone_access_log (${ACCESS_COLUMNS}) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
      [
        record.id,
        record.occurredAt,
        record.resourceId,
        record.resourceName,
        record.accessType,
        record.actor,
        record.sessionId,
        record.queryId,
        record.rowsAccessed
      ]
    );
    return record;
  }

  async listAccessRecords(filters?: AccessFilters): Promise<AccessRecord[]> {
    const where = new WhereBuilder();
    where.range(filters);
    if (filters?.actor) {
      where.add("actor", filters.actor);
    }
    if (filters?.resourceId) {
      where.add("resource_id", filters.resourceId);
    }
    const query = where.build(`SELECT ${ACCESS_COLUMNS} FROM clone_access_log`, filters);
    const result = await this.db.query<AccessRow>(query, where.values);
    return result.rows.map(mapAccessRow);
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    return countOlder(this.db, "clone_access_log", cutoff);
  }

  async deleteOlderThan(cutoff: Date, limit: number): Promise<number> {
    return deleteOlder(this.db, "clone_access_log", cutoff, limit);
  }
}
