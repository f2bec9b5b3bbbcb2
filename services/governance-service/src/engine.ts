import type { Logger } from "pino";
import { createAuditQueries } from "./audit/queries";
import type { AuditQueries } from "./audit/queries";
import { createAuditRecorder } from "./audit/recorder";
import type { AuditRecorder } from "./audit/recorder";
import { systemClock } from "./clock";
import type { Clock } from "./clock";
import { createCloneService } from "./clones/service";
import type { CloneService } from "./clones/service";
import { createComplianceScanner } from "./compliance/scanner";
import type { ComplianceScanner } from "./compliance/scanner";
import { config } from "./config";
import { createPolicyEvaluator } from "./evaluator/evaluator";
import type { PolicyEvaluator } from "./evaluator/evaluator";
import { logger as defaultLogger } from "./logger";
import { resolveDefaultPoliciesPath } from "./policies/defaults";
import { createPolicyService } from "./policies/service";
import type { PolicyService } from "./policies/service";
import { createQuotaGuard } from "./quota/guard";
import type { QuotaGuard } from "./quota/guard";
import { createRetentionPurger } from "./retention/purger";
import type { RetentionPurger } from "./retention/purger";
import { createGovernanceStorage } from "./storage";
import type { GovernanceStorage } from "./storage";
import { createViolationService } from "./violations/service";
import type { ViolationService } from "./violations/service";

export type GovernanceEngine = {
  storage: GovernanceStorage;
  clock: Clock;
  evaluator: PolicyEvaluator;
  recorder: AuditRecorder;
  policies: PolicyService;
  violations: ViolationService;
  audit: AuditQueries;
  quota: QuotaGuard;
  clones: CloneService;
  scanner: ComplianceScanner;
  purger: RetentionPurger;
};

export type EngineOptions = {
  storage?: GovernanceStorage;
  clock?: Clock;
  logger?: Logger;
  scanBatchSize?: number;
  purgeBatchSize?: number;
  defaultPoliciesPath?: string;
};

export function createGovernanceEngine(options: EngineOptions = {}): GovernanceEngine {
  const storage = options.storage ?? createGovernanceStorage();
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;

  const evaluator = createPolicyEvaluator({ policies: storage.policies, logger });
  const recorder = createAuditRecorder({
    evaluator,
    ledger: storage.ledger,
    accessLog: storage.accessLog,
    registry: storage.registry,
    logger
  });

  const quota = createQuotaGuard({
    lock: storage.actorLock,
    registry: storage.registry,
    evaluator,
    recorder,
    clock,
    logger
  });

  return {
    storage,
    clock,
    evaluator,
    recorder,
    policies: createPolicyService({
      store: storage.policies,
      recorder,
      defaultsPath: options.defaultPoliciesPath ?? resolveDefaultPoliciesPath(config.policies.defaultsPath),
      logger
    }),
    violations: createViolationService({ store: storage.violations }),
    audit: createAuditQueries({ auditLog: storage.auditLog, accessLog: storage.accessLog }),
    quota,
    clones: createCloneService({ registry: storage.registry, quota, recorder, clock }),
    scanner: createComplianceScanner({
      policies: storage.policies,
      violations: storage.violations,
      registry: storage.registry,
      clock,
      batchSize: options.scanBatchSize ?? config.scanner.batchSize,
      logger
    }),
    purger: createRetentionPurger({
      auditLog: storage.auditLog,
      violations: storage.violations,
      accessLog: storage.accessLog,
      clock,
      batchSize: options.purgeBatchSize ?? config.retention.batchSize,
      logger
    })
  };
}
