import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "../errors";
import { createPolicyInputSchema } from "./schema";
import type { ParsedPolicyInput } from "./schema";

const DEFAULTS_FILE = "default-policies.yaml";

const defaultPolicyDocumentSchema = z.object({
  policies: z.array(createPolicyInputSchema).min(1)
});

export function resolveDefaultPoliciesPath(configured?: string): string {
  if (configured) {
    return path.resolve(configured);
  }
  const candidates = [
    path.resolve(__dirname, "..", "..", "policies", DEFAULTS_FILE),
    path.resolve(process.cwd(), "policies", DEFAULTS_FILE),
    path.resolve(process.cwd(), "services", "governance-service", "policies", DEFAULTS_FILE)
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

export function parseDefaultPolicies(raw: string): ParsedPolicyInput[] {
  const result = defaultPolicyDocumentSchema.safeParse(parseYaml(raw));
  if (!result.success) {
    throw new ValidationError("Invalid default policy document", result.error.issues);
  }
  return result.data.policies;
}

export function loadDefaultPolicies(policyPath: string): ParsedPolicyInput[] {
  return parseDefaultPolicies(readFileSync(policyPath, "utf-8"));
}
