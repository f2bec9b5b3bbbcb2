import type { Pool } from "pg";
import { isUniqueViolation } from "../db";
import { ConflictError } from "../errors";
import type { LiveResource, LiveResourcePage, ResourceRegistry } from "./types";

type RegistryRow = {
  id: string;
  name: string;
  kind: string;
  scope: string | null;
  owner: string;
  source_database: string | null;
  source_schema: string | null;
  classifications: string[] | null;
  created_at: Date;
};

const REGISTRY_COLUMNS =
  "id, name, kind, scope, owner, source_database, source_schema, classifications, created_at";

function mapRow(row: RegistryRow): LiveResource {
  return {
    id: row.id,
    name: row.name,
    kind: row.kind,
    scope: row.scope,
    owner: row.owner,
    sourceDatabase: row.source_database,
    sourceSchema: row.source_schema,
    classifications: row.classifications ?? [],
    createdAt: row.created_at
  };
}

export class PostgresResourceRegistry implements ResourceRegistry {
  constructor(private readonly db: Pool) {}

  async countLiveResources(owner: string): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      "SELECT COUNT(*)::int AS count FROM clone_registry WHERE owner = $1 AND status = 'ACTIVE'",
      [owner]
    );
    return result.rows[0]?.count ?? 0;
  }

  async listLiveResources(page: LiveResourcePage): Promise<LiveResource[]> {
    const clauses = ["status = 'ACTIVE'"];
    const values: Array<string | number> = [];

    if (page.scope) {
      values.push(page.scope);
      clauses.push(`scope = $${values.length}`);
    }
    if (page.after !== undefined) {
      values.push(page.after);
      clauses.push(`id > $${values.length}`);
    }
    values.push(page.limit);

    const result = await this.db.query<RegistryRow>(
      `SELECT ${REGISTRY_COLUMNS}
       FROM clone_registry
       WHERE ${clauses.join(" AND ")}
       ORDER BY id ASC
       LIMIT $${values.length}`,
      values
    );
    return result.rows.map(mapRow);
  }

  async getLiveResource(id: string): Promise<LiveResource | null> {
    const result = await this.db.query<RegistryRow>(
      `SELECT ${REGISTRY_COLUMNS} FROM clone_registry WHERE id = $1 AND status = 'ACTIVE'`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async registerResource(resource: LiveResource): Promise<LiveResource> {
    try {
      const result = await this.db.query<RegistryRow>(
        `INSERT INTO clone_registry (id, name, kind, scope, owner, source_database, source_schema, classifications, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${REGISTRY_COLUMNS}`,
        [
          resource.id,
          resource.name,
          resource.kind,
          resource.scope,
          resource.owner,
          resource.sourceDatabase,
          resource.sourceSchema,
          resource.classifications,
          resource.createdAt
        ]
      );
      return mapRow(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Clone ${resource.id} is already registered`);
      }
      throw error;
    }
  }

  async retireResource(id: string): Promise<LiveResource | null> {
    const result = await this.db.query<RegistryRow>(
      `UPDATE clone_registry SET status = 'RETIRED'
       WHERE id = $1 AND status = 'ACTIVE'
       RETURNING ${REGISTRY_COLUMNS}`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }
}
