import fs from "node:fs";
import type { RunConfig } from "./config.js";
import { readCredentials } from "./credentials.js";
import { encodePath, GitHubClient } from "./github/client.js";
import { createOctokitTransport } from "./github/transport.js";
import type { ApiTransport } from "./github/types.js";
import type { Logger } from "./log.js";
import { NameIdResolver } from "./resolver.js";
import { loadDefaultRules, loadRuleDocument } from "./rules/documents.js";
import { emitRules } from "./rules/emit.js";
import { RuleReconciler, type ReconcileOutcome } from "./rules/reconcile.js";
import type { Rule } from "./rules/types.js";

/** Team filter value that selects every branch. */
export const ALL_TEAMS = "*";

export type Output = (line: string) => void;

/** Everything one invocation shares: configuration, API client and the run's caches. */
export class ProjectContext {
  readonly client: GitHubClient;
  readonly teams: NameIdResolver;
  readonly reconciler: RuleReconciler;
  private repoNames: string[] | null = null;

  constructor(
    readonly config: RunConfig,
    transport: ApiTransport,
    readonly log: Logger,
    readonly out: Output
  ) {
    this.client = new GitHubClient(transport, log, config.pageSize);
    this.teams = new NameIdResolver(
      this.client,
      "team",
      encodePath("orgs", config.org, "teams"),
      { sort: "full_name" },
      config.teams
    );
    this.reconciler = new RuleReconciler(this.client, config.org, log);
  }

  async repos(): Promise<string[]> {
    if (this.repoNames === null) {
      this.repoNames = await this.client.foldNames(encodePath("orgs", this.config.org, "repos"), { sort: "full_name" });
    }
    return this.repoNames;
  }
}

export function openProject(config: RunConfig, log: Logger, out: Output): ProjectContext {
  const token = readCredentials(config.credentialsFile);
  const transport = createOctokitTransport({ baseUrl: config.apiUrl, token, apiVersion: config.apiVersion });
  return new ProjectContext(config, transport, log, out);
}

/** Branches named "<team>-..." or "<team>/..." for any of the teams, sorted. */
export function filterBranches(branches: readonly string[], teams: readonly string[]): string[] {
  const selected = teams.includes(ALL_TEAMS)
    ? [...branches]
    : branches.filter((branch) => teams.some((team) => branch.startsWith(`${team}-`) || branch.startsWith(`${team}/`)));
  return selected.sort();
}

function report(ctx: ProjectContext, outcomes: readonly ReconcileOutcome[]): void {
  let created = 0;
  let updated = 0;
  for (const outcome of outcomes) {
    ctx.out(`${outcome.action}: ${ctx.config.org}/${outcome.repo} ${outcome.name} (id ${outcome.id})`);
    if (outcome.action === "created") {
      created += 1;
    } else {
      updated += 1;
    }
  }
  ctx.out(`Summary: created=${created} updated=${updated}`);
}

export async function runListRepos(ctx: ProjectContext): Promise<void> {
  for (const name of await ctx.repos()) {
    ctx.out(name);
  }
}

export async function runListTeams(ctx: ProjectContext, withIds: boolean): Promise<void> {
  const names = await ctx.teams.names();
  const mapping = await ctx.teams.mapping();
  for (const name of names) {
    ctx.out(withIds ? `${name}: ${mapping.idOf(name)}` : name);
  }
}

export async function runListBranches(
  ctx: ProjectContext,
  repos: readonly string[],
  teams: readonly string[] | null
): Promise<void> {
  const filter = teams ?? (await ctx.teams.names());
  for (const repo of repos) {
    const branches = await ctx.client.foldNames(encodePath("repos", ctx.config.org, repo, "branches"));
    ctx.out(`==> ${repo}`);
    for (const branch of filterBranches(branches, filter)) {
      ctx.out(branch);
    }
  }
}

export async function runGetRules(
  ctx: ProjectContext,
  repos: readonly string[],
  opts: { mapActors: boolean; verbose: boolean; output?: string }
): Promise<void> {
  const rules: Rule[] = [];
  for (const repo of repos) {
    rules.push(...(await ctx.reconciler.fetchExisting(repo)));
  }

  const text = emitRules(rules, {
    indent: ctx.config.indent,
    verbose: opts.verbose,
    teamNames: opts.mapActors ? await ctx.teams.mapping() : null
  });

  if (opts.output) {
    fs.writeFileSync(opts.output, text);
    ctx.out(`Wrote ${rules.length} rule(s) to ${opts.output}`);
  } else {
    ctx.out(text.trimEnd());
  }
}

export async function runSetDefaultRules(ctx: ProjectContext, repos: readonly string[]): Promise<void> {
  const template = await loadDefaultRules(ctx.config.defaultRulesFile, ctx.teams);
  report(ctx, await ctx.reconciler.applyDefaults(repos, template));
}

export async function runSetRepoRules(ctx: ProjectContext, files: readonly string[]): Promise<void> {
  const desired: Rule[] = [];
  for (const file of files) {
    desired.push(...(await loadRuleDocument(file, ctx.teams)));
  }

  const seen = new Set<string>();
  for (const rule of desired) {
    const key = `${rule.source ?? ""}\u0000${rule.name}`;
    if (seen.has(key)) {
      ctx.log.warning(`Rule '${rule.name}' for ${rule.source ?? "<no source>"} appears more than once; later copies update the first`);
    }
    seen.add(key);
  }

  report(ctx, await ctx.reconciler.reconcile(desired));
}
