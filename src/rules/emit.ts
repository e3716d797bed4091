import { isRecord, type ApiRecord } from "../github/types.js";
import type { NameIdCache } from "../resolver.js";
import { parseIndent } from "../utils/flags.js";
import { PROVENANCE_KEYS, TEAM_ACTOR, WRITE_KEYS, type Actor, type Rule } from "./types.js";

export type EmitOptions = {
  indent: number;
  /** Append timestamps and the ruleset's html link. */
  verbose?: boolean;
  /** When given, team actors gain an `actor_name` resolved from their id. */
  teamNames?: NameIdCache | null;
};

function comma(last: boolean): string {
  return last ? "" : ",";
}

/** Single-line rendering with `, ` and `: ` separators. */
export function inline(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(inline).join(", ")}]`;
  }
  if (isRecord(value)) {
    return `{${Object.entries(value)
      .map(([k, v]) => `${JSON.stringify(k)}: ${inline(v)}`)
      .join(", ")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every((item) => typeof item === "string");
}

class Writer {
  private readonly lines: string[] = [];
  private depth = 0;

  constructor(private readonly width: number) {}

  line(text: string): void {
    this.lines.push(" ".repeat(this.width * this.depth) + text);
  }

  open(text: string): void {
    this.line(text);
    this.depth += 1;
  }

  close(text: string): void {
    this.depth -= 1;
    this.line(text);
  }

  text(): string {
    return `${this.lines.join("\n")}\n`;
  }
}

function writeFlatList(w: Writer, label: string, items: readonly ApiRecord[], last: boolean): void {
  if (items.length === 0) {
    w.line(`${label}[]${comma(last)}`);
    return;
  }
  w.open(`${label}[`);
  items.forEach((item, i) => w.line(`${inline(item)}${comma(i === items.length - 1)}`));
  w.close(`]${comma(last)}`);
}

function writeMapping(w: Writer, label: string, mapping: ApiRecord, last: boolean): void {
  const entries = Object.entries(mapping);
  if (entries.length === 0) {
    w.line(`${label}{}${comma(last)}`);
    return;
  }
  w.open(`${label}{`);
  entries.forEach(([key, value], i) => {
    const entryLast = i === entries.length - 1;
    const entryLabel = `${JSON.stringify(key)}: `;
    if (isRecord(value)) {
      writeMapping(w, entryLabel, value, entryLast);
    } else if (isStringList(value)) {
      const items = value;
      w.open(`${entryLabel}[`);
      items.forEach((item, j) => w.line(`${JSON.stringify(item)}${comma(j === items.length - 1)}`));
      w.close(`]${comma(entryLast)}`);
    } else {
      w.line(`${entryLabel}${inline(value)}${comma(entryLast)}`);
    }
  });
  w.close(`}${comma(last)}`);
}

function sortedKeys(record: ApiRecord): ApiRecord {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function reportActors(actors: readonly Actor[], teamNames: NameIdCache | null): ApiRecord[] {
  if (teamNames === null) {
    return [...actors];
  }
  const names: NameIdCache = teamNames;
  return actors.map((actor) => {
    if (actor.actor_type !== TEAM_ACTOR || typeof actor.actor_id !== "number") {
      return actor;
    }
    return sortedKeys({ ...actor, actor_name: names.nameOf(actor.actor_id) });
  });
}

function writeRule(w: Writer, rule: Rule, opts: EmitOptions, last: boolean): void {
  const keys = [...WRITE_KEYS, ...(opts.verbose ? PROVENANCE_KEYS : [])].filter((key) => rule[key] !== undefined);
  w.open("{");
  keys.forEach((key, i) => {
    const keyLast = i === keys.length - 1;
    const label = `${JSON.stringify(key)}: `;
    switch (key) {
      case "bypass_actors":
        writeFlatList(w, label, reportActors(rule.bypass_actors, opts.teamNames ?? null), keyLast);
        break;
      case "rules":
        writeFlatList(w, label, rule.rules, keyLast);
        break;
      case "conditions":
        writeMapping(w, label, rule.conditions, keyLast);
        break;
      default:
        w.line(`${label}${inline(rule[key])}${comma(keyLast)}`);
    }
  });
  w.close(`}${comma(last)}`);
}

/**
 * Renders rules as an indented JSON array. With `teamNames` or `verbose` the
 * output is a report and is not guaranteed to be accepted by the write path.
 */
export function emitRules(rules: readonly Rule[], opts: EmitOptions): string {
  const w = new Writer(parseIndent(opts.indent));
  if (rules.length === 0) {
    w.line("[]");
    return w.text();
  }
  w.open("[");
  rules.forEach((rule, i) => writeRule(w, rule, opts, i === rules.length - 1));
  w.close("]");
  return w.text();
}
