import { MalformedDocumentError } from "../errors.js";
import { isRecord, type ApiRecord } from "../github/types.js";

export const TEAM_ACTOR = "Team";
export const REPOSITORY_SOURCE = "Repository";

/**
 * A bypass actor. `actor_id` is an integer (null only for deploy keys); `actor_name`
 * appears in reports alone and must be resolved or dropped before a write.
 */
export type Actor = {
  actor_type: string;
  [key: string]: unknown;
};

/** category -> { include: [...], exclude: [...] } and the like. */
export type Conditions = Record<string, ApiRecord>;

export type RuleEntry = {
  type: string;
  [key: string]: unknown;
};

export type Rule = {
  id?: number;
  source?: string;
  source_type?: string;
  name: string;
  enforcement: string;
  target: string;
  bypass_actors: Actor[];
  conditions: Conditions;
  rules: RuleEntry[];
  created_at?: string;
  updated_at?: string;
  link?: string;
};

export const REQUIRED_KEYS = ["name", "enforcement", "target", "bypass_actors", "conditions", "rules"] as const;

/** Keys a rule keeps on the write path. */
export const WRITE_KEYS = ["id", "source", "source_type", ...REQUIRED_KEYS] as const;

export const PROVENANCE_KEYS = ["created_at", "updated_at", "link"] as const;

function fail(context: string, message: string): never {
  throw new MalformedDocumentError(`${context}: ${message}`);
}

function requireString(record: ApiRecord, key: string, context: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    fail(context, `'${key}' must be a string`);
  }
  return value;
}

function optionalString(record: ApiRecord, key: string, context: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    fail(context, `'${key}' must be a string`);
  }
  return value;
}

function readActor(value: unknown, context: string): Actor {
  if (!isRecord(value)) {
    fail(context, "bypass actor must be an object");
  }
  const actorType = requireString(value, "actor_type", context);
  const actorId = value.actor_id;
  if (actorId !== undefined && actorId !== null && !Number.isInteger(actorId)) {
    fail(context, `bypass actor of type ${actorType} has a non-integer actor_id`);
  }
  return { ...value, actor_type: actorType };
}

function readEntry(value: unknown, context: string): RuleEntry {
  if (!isRecord(value)) {
    fail(context, "rules entry must be an object");
  }
  return { ...value, type: requireString(value, "type", context) };
}

function readConditions(value: unknown, context: string): Conditions {
  if (!isRecord(value)) {
    fail(context, "'conditions' must be an object");
  }
  const out: Conditions = {};
  for (const [category, patterns] of Object.entries(value)) {
    if (!isRecord(patterns)) {
      fail(context, `condition '${category}' must be an object`);
    }
    out[category] = patterns;
  }
  return out;
}

function linkOf(record: ApiRecord): string | undefined {
  const links = record._links;
  if (!isRecord(links) || !isRecord(links.html)) {
    return undefined;
  }
  return typeof links.html.href === "string" ? links.html.href : undefined;
}

/** Server records may omit `conditions` (push rulesets report null); documents may not. */
export type ReadMode = "document" | "server";

/**
 * Narrows a raw record (server response or input document) to a Rule.
 * Unknown keys are dropped; provenance fields are kept when present.
 */
export function readRule(input: unknown, context: string, mode: ReadMode = "document"): Rule {
  if (!isRecord(input)) {
    fail(context, "rule must be an object");
  }
  const raw: ApiRecord = input;
  const missing = REQUIRED_KEYS.filter(
    (key) => raw[key] === undefined && !(mode === "server" && key === "conditions")
  );
  if (missing.length > 0) {
    fail(context, `missing required key(s): ${missing.join(", ")}`);
  }

  const name = requireString(raw, "name", context);
  const where = `${context} (${name})`;
  const { bypass_actors: actors, rules: entries, id } = raw;
  if (!Array.isArray(actors)) {
    fail(where, "'bypass_actors' must be a list");
  }
  if (!Array.isArray(entries)) {
    fail(where, "'rules' must be a list");
  }
  if (id !== undefined && id !== null && (typeof id !== "number" || !Number.isInteger(id))) {
    fail(where, "'id' must be an integer");
  }

  const rule: Rule = {
    name,
    enforcement: requireString(raw, "enforcement", where),
    target: requireString(raw, "target", where),
    bypass_actors: actors.map((actor: unknown) => readActor(actor, where)),
    conditions:
      mode === "server" && (raw.conditions === undefined || raw.conditions === null)
        ? {}
        : readConditions(raw.conditions, where),
    rules: entries.map((entry: unknown) => readEntry(entry, where))
  };
  if (typeof id === "number") {
    rule.id = id;
  }
  const source = optionalString(raw, "source", where);
  if (source !== undefined) {
    rule.source = source;
  }
  const sourceType = optionalString(raw, "source_type", where);
  if (sourceType !== undefined) {
    rule.source_type = sourceType;
  }
  const createdAt = optionalString(raw, "created_at", where);
  if (createdAt !== undefined) {
    rule.created_at = createdAt;
  }
  const updatedAt = optionalString(raw, "updated_at", where);
  if (updatedAt !== undefined) {
    rule.updated_at = updatedAt;
  }
  const link = optionalString(raw, "link", where) ?? linkOf(raw);
  if (link !== undefined) {
    rule.link = link;
  }
  return rule;
}

/** Body of a create/update call. */
export function writePayload(rule: Rule): ApiRecord {
  return {
    name: rule.name,
    target: rule.target,
    enforcement: rule.enforcement,
    bypass_actors: rule.bypass_actors,
    conditions: rule.conditions,
    rules: rule.rules
  };
}
