import { MalformedDocumentError, UnresolvedReferenceError } from "../errors.js";
import { encodePath, recordId, type GitHubClient } from "../github/client.js";
import { isRecord } from "../github/types.js";
import type { Logger } from "../log.js";
import { readRule, REPOSITORY_SOURCE, writePayload, type Rule } from "./types.js";

export type ReconcileOutcome = {
  action: "created" | "updated";
  repo: string;
  name: string;
  id: number;
};

type UpsertResult = {
  outcome: ReconcileOutcome;
  existing: readonly Rule[];
};

/** Returns the repository name of an "<org>/<repo>" source, which must belong to `org`. */
export function parseSource(source: string, org: string): string {
  const parts = source.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1] || parts[0].toLowerCase() !== org.toLowerCase()) {
    throw new UnresolvedReferenceError(`Rule source '${source}' is not a repository of ${org}`);
  }
  return parts[1];
}

export function stampRule(rule: Rule, org: string, repo: string): Rule {
  return {
    source: `${org}/${repo}`,
    source_type: REPOSITORY_SOURCE,
    name: rule.name,
    enforcement: rule.enforcement,
    target: rule.target,
    bypass_actors: rule.bypass_actors,
    conditions: rule.conditions,
    rules: rule.rules
  };
}

export class RuleReconciler {
  constructor(
    private readonly client: GitHubClient,
    private readonly org: string,
    private readonly log: Logger
  ) {}

  private rulesetsPath(repo: string, id?: number): string {
    const base = encodePath("repos", this.org, repo, "rulesets");
    return id === undefined ? base : `${base}/${id}`;
  }

  /** List responses are summaries, so every ruleset is re-read by id. */
  async fetchExisting(repo: string): Promise<Rule[]> {
    const path = this.rulesetsPath(repo);
    const ids = await this.client.fold<number[]>(
      path,
      (acc, record) => {
        acc.push(recordId(record, path));
        return acc;
      },
      []
    );

    const rules: Rule[] = [];
    for (const id of ids) {
      const detail = await this.client.get(this.rulesetsPath(repo, id));
      rules.push(readRule(detail, `${this.org}/${repo} ruleset ${id}`, "server"));
    }
    return rules;
  }

  /**
   * Creates or updates each desired rule in the repository named by its `source`,
   * matching existing rules by name. Rules of one repository share one fetch of
   * the existing rules, so a name repeated in the batch is created only once.
   */
  async reconcile(desired: readonly Rule[]): Promise<ReconcileOutcome[]> {
    const byRepo = new Map<string, Rule[]>();
    for (const rule of desired) {
      if (rule.source_type === undefined || rule.source === undefined) {
        throw new MalformedDocumentError(`Rule '${rule.name}' has no source/source_type`);
      }
      if (rule.source_type !== REPOSITORY_SOURCE) {
        this.log.warning(`Skipping rule '${rule.name}': source_type ${rule.source_type} is not ${REPOSITORY_SOURCE}`);
        continue;
      }
      const repo = parseSource(rule.source, this.org);
      byRepo.set(repo, [...(byRepo.get(repo) ?? []), rule]);
    }

    const outcomes: ReconcileOutcome[] = [];
    for (const [repo, rules] of byRepo) {
      outcomes.push(...(await this.apply(repo, rules)));
    }
    return outcomes;
  }

  /** Pushes the same template to each repository, re-reading existing rules per repository. */
  async applyDefaults(repos: readonly string[], template: readonly Rule[]): Promise<ReconcileOutcome[]> {
    const outcomes: ReconcileOutcome[] = [];
    for (const repo of repos) {
      const rules = template.map((rule) => stampRule(rule, this.org, repo));
      outcomes.push(...(await this.apply(repo, rules)));
    }
    return outcomes;
  }

  private async apply(repo: string, rules: readonly Rule[]): Promise<ReconcileOutcome[]> {
    let existing: readonly Rule[] = await this.fetchExisting(repo);
    const outcomes: ReconcileOutcome[] = [];
    for (const rule of rules) {
      const result = await this.upsert(repo, rule, existing);
      existing = result.existing;
      outcomes.push(result.outcome);
    }
    return outcomes;
  }

  private async upsert(repo: string, rule: Rule, existing: readonly Rule[]): Promise<UpsertResult> {
    // Inherited organization rulesets are listed too but cannot be written through the repository.
    const targetId =
      rule.id ??
      existing.find(
        (known) => known.name === rule.name && known.source_type === REPOSITORY_SOURCE && known.id !== undefined
      )?.id;

    if (targetId !== undefined) {
      this.log.debug(`Updating ruleset ${targetId} '${rule.name}' in ${this.org}/${repo}`);
      await this.client.update(this.rulesetsPath(repo, targetId), writePayload(rule));
      return { outcome: { action: "updated", repo, name: rule.name, id: targetId }, existing };
    }

    this.log.debug(`Creating ruleset '${rule.name}' in ${this.org}/${repo}`);
    const path = this.rulesetsPath(repo);
    const created = await this.client.create(path, writePayload(rule));
    if (!isRecord(created)) {
      throw new MalformedDocumentError(`Unexpected create response from ${path}`);
    }
    const id = recordId(created, path);
    const merged: Rule = {
      ...rule,
      id,
      source: typeof created.source === "string" ? created.source : rule.source,
      source_type: typeof created.source_type === "string" ? created.source_type : rule.source_type
    };
    return {
      outcome: { action: "created", repo, name: rule.name, id },
      existing: [...existing, merged]
    };
  }
}
