import type { Pool } from "pg";
import { withTransaction } from "../db";
import { buildViolationInsert, mapViolationRow } from "../violations/store.pg";
import type { ViolationRow } from "../violations/store.pg";
import type { NewViolation } from "../violations/types";
import type { CommittedOperation, GovernanceLedger } from "./ledger";
import { buildAuditInsert } from "./store.pg";
import type { AuditRecord } from "./types";

export class PostgresGovernanceLedger implements GovernanceLedger {
  constructor(private readonly db: Pool) {}

  async commitOperation(audit: AuditRecord, violations: NewViolation[]): Promise<CommittedOperation> {
    return withTransaction(this.db, async (client) => {
      let stored: CommittedOperation["violations"] = [];
      if (violations.length) {
        const violationInsert = buildViolationInsert(violations);
        const result = await client.query<ViolationRow>(violationInsert.text, violationInsert.values);
        stored = result.rows.map(mapViolationRow);
      }
      const auditInsert = buildAuditInsert(audit);
      await client.query(auditInsert.text, auditInsert.values);
      return { audit, violations: stored };
    });
  }
}
