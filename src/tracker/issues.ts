import { removeNullFields } from "../metrics.js";
import type { TrackerIssue } from "../types.js";
import type { RawIssue } from "./schemas.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walk nested objects by key; undefined as soon as a step is missing. */
export function deepGet(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Flatten a search result: common fields at the root, empty custom
 * fields dropped.
 */
export function cleanIssue(issue: RawIssue, pointsField: string): TrackerIssue {
  const points = deepGet(issue.fields, pointsField);
  return {
    key: issue.key,
    summary: asString(deepGet(issue.fields, "summary")) ?? "",
    assignee:
      asString(deepGet(issue.fields, "assignee", "name")) ??
      asString(deepGet(issue.fields, "assignee", "displayName")) ??
      "unassigned",
    status: (asString(deepGet(issue.fields, "status", "name")) ?? "").toLowerCase(),
    resolution: (asString(deepGet(issue.fields, "resolution", "name")) ?? "").toLowerCase(),
    points: typeof points === "number" ? points : 0,
    fields: removeNullFields(issue.fields),
  };
}

/** Query matching exactly the given issue keys, e.g. `key in ("A-1","B-2")`. */
export function buildKeyQuery(keys: readonly string[]): string {
  const quoted = keys.map((k) => `"${k.replace(/["\\]/g, "")}"`);
  return `key in (${quoted.join(",")})`;
}
