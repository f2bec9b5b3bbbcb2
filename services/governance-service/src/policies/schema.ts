import { z } from "zod";
import { ValidationError } from "../errors";
import { POLICY_ACTIONS, POLICY_KINDS, SEVERITIES, WEEKDAYS } from "./types";
import type { PolicyKind, PolicyRule } from "./types";

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (error) {
    return false;
  }
}

const nameListSchema = z.array(z.string().trim().min(1)).min(1);
const actionSchema = z.enum(POLICY_ACTIONS);
const weekdaySchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(WEEKDAYS)
);

export const policyKindSchema = z.enum(POLICY_KINDS);
export const severitySchema = z.enum(SEVERITIES);

const maxAgeRuleSchema = z.object({
  kind: z.literal("MAX_AGE"),
  definition: z
    .object({
      maxAgeDays: z.number().positive(),
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const restrictedSourceRuleSchema = z.object({
  kind: z.literal("RESTRICTED_SOURCE"),
  definition: z
    .object({
      restrictedSources: nameListSchema,
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const dataClassificationRuleSchema = z.object({
  kind: z.literal("DATA_CLASSIFICATION"),
  definition: z
    .object({
      restrictedClassifications: nameListSchema,
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const userQuotaRuleSchema = z.object({
  kind: z.literal("USER_QUOTA"),
  definition: z
    .object({
      maxResources: z.number().int().positive(),
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const environmentRestrictionRuleSchema = z.object({
  kind: z.literal("ENVIRONMENT_RESTRICTION"),
  definition: z
    .object({
      restrictedKinds: nameListSchema,
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const timeRestrictionRuleSchema = z.object({
  kind: z.literal("TIME_RESTRICTION"),
  definition: z
    .object({
      allowedHoursStart: z.number().int().min(0).max(23),
      allowedHoursEnd: z.number().int().min(1).max(24),
      allowedDays: z.array(weekdaySchema).min(1),
      timezone: z.string().refine(isValidTimeZone, { message: "Unknown IANA time zone" }).default("UTC"),
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
    .refine((definition) => definition.allowedHoursStart < definition.allowedHoursEnd, {
      message: "allowedHoursStart must be before allowedHoursEnd",
      path: ["allowedHoursEnd"]
    })
});

const sensitiveDataRuleSchema = z.object({
  kind: z.literal("SENSITIVE_DATA"),
  definition: z
    .object({
      restrictedSchemas: nameListSchema,
      approvers: z.array(z.string().trim().min(1)).default([]),
      action: actionSchema.default("WARN_AND_LOG")
    })
    .strict()
});

const approvalRequiredRuleSchema = z.object({
  kind: z.literal("APPROVAL_REQUIRED"),
  definition: z
    .object({
      approvers: nameListSchema,
      appliesToKinds: nameListSchema.optional(),
      action: actionSchema.default("REQUIRE_APPROVAL")
    })
    .strict()
});

export const policyRuleSchema = z.discriminatedUnion("kind", [
  maxAgeRuleSchema,
  restrictedSourceRuleSchema,
  dataClassificationRuleSchema,
  userQuotaRuleSchema,
  environmentRestrictionRuleSchema,
  timeRestrictionRuleSchema,
  sensitiveDataRuleSchema,
  approvalRequiredRuleSchema
]);

const scopeSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toUpperCase());

export const createPolicyInputSchema = z.object({
  name: z.string().trim().min(1).max(255),
  kind: policyKindSchema,
  scope: scopeSchema.nullable().default(null),
  description: z.string().nullable().default(null),
  definition: z.record(z.unknown()),
  severity: severitySchema.default("WARNING"),
  active: z.boolean().default(true)
});

export type ParsedPolicyInput = z.output<typeof createPolicyInputSchema>;

export const updatePolicyInputSchema = z
  .object({
    scope: scopeSchema.nullable().optional(),
    description: z.string().nullable().optional(),
    definition: z.record(z.unknown()).optional(),
    severity: severitySchema.optional()
  })
  .strict();

export type RuleParseResult =
  | { ok: true; rule: PolicyRule }
  | { ok: false; issues: z.ZodIssue[] };

export function safeParsePolicyRule(kind: string, definition: unknown): RuleParseResult {
  const result = policyRuleSchema.safeParse({ kind, definition });
  if (!result.success) {
    return { ok: false, issues: result.error.issues };
  }
  return { ok: true, rule: result.data };
}

export function parsePolicyRule(kind: PolicyKind, definition: unknown): PolicyRule {
  const result = safeParsePolicyRule(kind, definition);
  if (!result.ok) {
    throw new ValidationError(`Invalid ${kind} policy definition`, result.issues);
  }
  return result.rule;
}

export function parseCreatePolicyInput(input: unknown): ParsedPolicyInput {
  const result = createPolicyInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError("Invalid policy", result.error.issues);
  }
  return result.data;
}
