import type { Logger } from "pino";
import { describeError } from "../errors";
import { logger as defaultLogger } from "../logger";
import { safeParsePolicyRule } from "../policies/schema";
import type { PolicyStore } from "../policies/store";
import { policyAppliesToScope, severityRank } from "../policies/types";
import type { PolicyRecord } from "../policies/types";
import { checkRule, isBlocking } from "./rules";
import type { EvaluationContext, RuleMatch, Verdict, ViolationCandidate } from "./types";

export function compareCandidates(a: ViolationCandidate, b: ViolationCandidate): number {
  const severityDiff = severityRank(b.severity) - severityRank(a.severity);
  if (severityDiff !== 0) {
    return severityDiff;
  }
  if (a.policyName !== b.policyName) {
    return a.policyName < b.policyName ? -1 : 1;
  }
  return a.policyId < b.policyId ? -1 : a.policyId > b.policyId ? 1 : 0;
}

/**
 * Pure verdict over the supplied policies. Inactive or out-of-scope policies
 * are ignored even if the caller passes them; a policy whose definition no
 * longer parses, or whose check throws, is skipped and reported in
 * `skippedPolicies`.
 */
export function evaluatePolicies(
  policies: PolicyRecord[],
  context: EvaluationContext,
  log: Logger = defaultLogger
): Verdict {
  const violations: ViolationCandidate[] = [];
  const skippedPolicies: string[] = [];
  let evaluatedPolicies = 0;
  let block = false;

  for (const policy of policies) {
    if (!policy.active || !policyAppliesToScope(policy.scope, context.scope)) {
      continue;
    }

    const parsed = safeParsePolicyRule(policy.kind, policy.definition);
    if (!parsed.ok) {
      log.warn({ policy: policy.name, issues: parsed.issues }, "Skipping policy with malformed definition");
      skippedPolicies.push(policy.name);
      continue;
    }

    let match: RuleMatch | null;
    try {
      match = checkRule(parsed.rule, context);
    } catch (error) {
      log.warn({ policy: policy.name, error: describeError(error) }, "Skipping policy whose check failed");
      skippedPolicies.push(policy.name);
      continue;
    }
    evaluatedPolicies += 1;

    if (!match) {
      continue;
    }

    const blocking = isBlocking(parsed.rule);
    block = block || blocking;
    violations.push({
      policyId: policy.id,
      policyName: policy.name,
      policyKind: policy.kind,
      severity: policy.severity,
      action: parsed.rule.definition.action,
      blocking,
      details: {
        ...match.details,
        message: match.message,
        action: parsed.rule.definition.action,
        policyKind: policy.kind
      }
    });
  }

  return {
    violations: violations.sort(compareCandidates),
    block,
    evaluatedPolicies,
    skippedPolicies: skippedPolicies.sort()
  };
}

export type PolicyEvaluator = {
  evaluate: (context: EvaluationContext) => Promise<Verdict>;
};

export function createPolicyEvaluator(options: { policies: PolicyStore; logger?: Logger }): PolicyEvaluator {
  const log = options.logger ?? defaultLogger;
  return {
    evaluate: async (context) => {
      const policies = await options.policies.listActivePolicies(context.scope);
      const verdict = evaluatePolicies(policies, context, log);
      if (verdict.violations.length) {
        log.info(
          {
            operation: context.operation,
            actor: context.actor.id,
            resource: context.resource.name,
            violations: verdict.violations.map((violation) => violation.policyName),
            block: verdict.block
          },
          "Policy evaluation produced violations"
        );
      }
      return verdict;
    }
  };
}
