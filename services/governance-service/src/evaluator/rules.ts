import type {
  ApprovalRequiredDefinition,
  DataClassificationDefinition,
  EnvironmentRestrictionDefinition,
  MaxAgeDefinition,
  PolicyRule,
  RestrictedSourceDefinition,
  SensitiveDataDefinition,
  TimeRestrictionDefinition,
  UserQuotaDefinition,
  Weekday
} from "../policies/types";
import { WEEKDAYS } from "../policies/types";
import type { EvaluationContext, RuleMatch } from "./types";

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      weekday: "short",
      hour: "2-digit",
      hourCycle: "h23"
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((day) => day === value);
}

export function zonedTime(now: Date, timeZone: string): { hour: number; weekday: Weekday } {
  const parts = formatterFor(timeZone).formatToParts(now);
  const hourPart = parts.find((part) => part.type === "hour")?.value;
  const weekdayPart = parts.find((part) => part.type === "weekday")?.value.toUpperCase();
  if (hourPart === undefined || weekdayPart === undefined || !isWeekday(weekdayPart)) {
    throw new Error(`Unable to resolve local time in ${timeZone}`);
  }
  return { hour: Number(hourPart) % 24, weekday: weekdayPart };
}

function sameText(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

function checkEnvironmentRestriction(
  definition: EnvironmentRestrictionDefinition,
  context: EvaluationContext
): RuleMatch | null {
  const kind = context.resource.kind;
  if (!definition.restrictedKinds.some((restricted) => sameText(restricted, kind))) {
    return null;
  }
  return {
    message: `${kind} clones are not allowed in ${context.scope ?? "any environment"}`,
    details: { resourceKind: kind }
  };
}

function checkUserQuota(definition: UserQuotaDefinition, context: EvaluationContext): RuleMatch | null {
  if (context.liveResourceCount < definition.maxResources) {
    return null;
  }
  return {
    message: `Clone limit reached: ${context.liveResourceCount} live clones (max ${definition.maxResources})`,
    details: { liveResourceCount: context.liveResourceCount, maxResources: definition.maxResources }
  };
}

function checkTimeRestriction(definition: TimeRestrictionDefinition, context: EvaluationContext): RuleMatch | null {
  const { hour, weekday } = zonedTime(context.now, definition.timezone);
  const outsideHours = hour < definition.allowedHoursStart || hour >= definition.allowedHoursEnd;
  const wrongDay = !definition.allowedDays.includes(weekday);
  if (!outsideHours && !wrongDay) {
    return null;
  }
  return {
    message:
      `Clone creation not allowed at this time. Allowed: ${definition.allowedHoursStart}:00-` +
      `${definition.allowedHoursEnd}:00 ${definition.allowedDays.join(",")} (${definition.timezone})`,
    details: { hour, weekday, timezone: definition.timezone }
  };
}

function checkSensitiveData(definition: SensitiveDataDefinition, context: EvaluationContext): RuleMatch | null {
  const schema = context.resource.sourceSchema;
  if (!schema) {
    return null;
  }
  const upperSchema = schema.toUpperCase();
  const pattern = definition.restrictedSchemas.find((restricted) => upperSchema.includes(restricted.toUpperCase()));
  if (!pattern) {
    return null;
  }
  return {
    message: `Source schema ${schema} matches restricted pattern ${pattern}`,
    details: { matchedPattern: pattern, approvers: definition.approvers }
  };
}

function checkRestrictedSource(definition: RestrictedSourceDefinition, context: EvaluationContext): RuleMatch | null {
  const { sourceDatabase, sourceSchema } = context.resource;
  if (!sourceDatabase) {
    return null;
  }
  const matched = definition.restrictedSources.find((entry) => {
    const separator = entry.indexOf(".");
    if (separator === -1) {
      return sameText(entry, sourceDatabase);
    }
    const database = entry.slice(0, separator);
    const schema = entry.slice(separator + 1);
    return sameText(database, sourceDatabase) && sourceSchema !== null && sameText(schema, sourceSchema);
  });
  if (!matched) {
    return null;
  }
  const source = sourceSchema ? `${sourceDatabase}.${sourceSchema}` : sourceDatabase;
  return {
    message: `Source ${source} is restricted`,
    details: { matchedSource: matched }
  };
}

function checkDataClassification(
  definition: DataClassificationDefinition,
  context: EvaluationContext
): RuleMatch | null {
  const matched = context.resource.classifications.filter((classification) =>
    definition.restrictedClassifications.some((restricted) => sameText(restricted, classification))
  );
  if (!matched.length) {
    return null;
  }
  return {
    message: `Source carries restricted classification ${matched.join(", ")}`,
    details: { classifications: matched }
  };
}

function checkApprovalRequired(definition: ApprovalRequiredDefinition, context: EvaluationContext): RuleMatch | null {
  const kind = context.resource.kind;
  if (definition.appliesToKinds && !definition.appliesToKinds.some((covered) => sameText(covered, kind))) {
    return null;
  }
  const role = context.actor.role;
  if (role && definition.approvers.some((approver) => sameText(approver, role))) {
    return null;
  }
  return {
    message: `${kind} clones require approval by one of ${definition.approvers.join(", ")}`,
    details: { approvers: definition.approvers, actorRole: role }
  };
}

export function checkMaxAge(definition: MaxAgeDefinition, ageDays: number): RuleMatch | null {
  if (ageDays <= definition.maxAgeDays) {
    return null;
  }
  return {
    message: `Clone age (${ageDays} days) exceeds maximum (${definition.maxAgeDays} days)`,
    details: { ageDays, maxAgeDays: definition.maxAgeDays }
  };
}

/** Operation-time check. MAX_AGE is retrospective and only the compliance scan applies it. */
export function checkRule(rule: PolicyRule, context: EvaluationContext): RuleMatch | null {
  switch (rule.kind) {
    case "ENVIRONMENT_RESTRICTION":
      return checkEnvironmentRestriction(rule.definition, context);
    case "USER_QUOTA":
      return checkUserQuota(rule.definition, context);
    case "TIME_RESTRICTION":
      return checkTimeRestriction(rule.definition, context);
    case "SENSITIVE_DATA":
      return checkSensitiveData(rule.definition, context);
    case "RESTRICTED_SOURCE":
      return checkRestrictedSource(rule.definition, context);
    case "DATA_CLASSIFICATION":
      return checkDataClassification(rule.definition, context);
    case "APPROVAL_REQUIRED":
      return checkApprovalRequired(rule.definition, context);
    case "MAX_AGE":
      return null;
  }
}

export function isBlocking(rule: PolicyRule): boolean {
  const action = rule.definition.action;
  if (action === "BLOCK") {
    return true;
  }
  return rule.kind === "SENSITIVE_DATA" && action === "REQUIRE_APPROVAL";
}
