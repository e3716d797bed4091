import fs from "node:fs";
import { ConfigError, errorMessage, MalformedDocumentError } from "../errors.js";
import type { TeamLookup } from "../resolver.js";
import { sanitizeRule } from "./sanitize.js";
import type { Rule } from "./types.js";

function readDocument(file: string): unknown {
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
    throw new ConfigError(`not a readable file: '${file}'`);
  }
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new MalformedDocumentError(`Invalid JSON in ${file}: ${errorMessage(error)}`);
  }
}

async function sanitizeAll(records: readonly unknown[], teams: TeamLookup, file: string): Promise<Rule[]> {
  const rules: Rule[] = [];
  for (const [i, record] of records.entries()) {
    rules.push(await sanitizeRule(record, teams, `${file}[${i}]`));
  }
  return rules;
}

/** A rule document holds one rule object or a list of them. */
export async function loadRuleDocument(file: string, teams: TeamLookup): Promise<Rule[]> {
  const doc = readDocument(file);
  return sanitizeAll(Array.isArray(doc) ? doc : [doc], teams, file);
}

export async function loadDefaultRules(file: string, teams: TeamLookup): Promise<Rule[]> {
  const doc = readDocument(file);
  if (!Array.isArray(doc)) {
    throw new MalformedDocumentError(`${file}: default rule template must be a list of rules`);
  }
  const rules = await sanitizeAll(doc, teams, file);

  const seen = new Set<string>();
  for (const rule of rules) {
    if (rule.id !== undefined || rule.source !== undefined) {
      throw new MalformedDocumentError(`${file}: template rule '${rule.name}' must not carry id or source`);
    }
    if (seen.has(rule.name)) {
      throw new MalformedDocumentError(`${file}: duplicate template rule name '${rule.name}'`);
    }
    seen.add(rule.name);
  }
  return rules;
}
