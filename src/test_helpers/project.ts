import { ProjectContext } from "../app.js";
import type { RunConfig } from "../config.js";
import { silentLogger } from "../log.js";
import { FAKE_API_URL, type FakeGitHub } from "./fake_github.js";

export function testProject(
  fake: FakeGitHub,
  overrides: Partial<RunConfig> = {}
): { ctx: ProjectContext; output: string[] } {
  const output: string[] = [];
  const config: RunConfig = {
    root: "/srv/ruleset-admin",
    apiUrl: FAKE_API_URL,
    apiVersion: "2022-11-28",
    credentialsFile: "/srv/ruleset-admin/credentials",
    pageSize: 2,
    org: fake.org,
    teams: null,
    defaultRulesFile: "/srv/ruleset-admin/config/default-rules.json",
    indent: 2,
    log: { level: "NONE", dir: "/srv/ruleset-admin/log", name: "ruleset-admin" },
    disabledCommands: [],
    ...overrides
  };
  const ctx = new ProjectContext(config, fake.transport, silentLogger, (line) => {
    output.push(line);
  });
  return { ctx, output };
}
