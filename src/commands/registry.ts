import {
  runGetRules,
  runListBranches,
  runListRepos,
  runListTeams,
  runSetDefaultRules,
  runSetRepoRules,
  type ProjectContext
} from "../app.js";
import { CommandError } from "../errors.js";
import { COMMAND_NAMES, isCommandName, type CommandName } from "./command_names.js";

export type CommandInvocation =
  | { command: "repos" }
  | { command: "teams"; ids: boolean }
  | { command: "branches"; repos: string[]; teams: string[] | null }
  | { command: "get-rules"; repos: string[]; mapActors: boolean; verbose: boolean; output?: string }
  | { command: "set-default-rules"; repos: string[] }
  | { command: "set-repo-rules"; files: string[] };

/** Validates a command name against the closed command set and the configured exclusions. */
export function resolveCommand(name: string, disabled: readonly CommandName[]): CommandName {
  if (!isCommandName(name)) {
    throw new CommandError(`Unknown command '${name}' (expected one of: ${COMMAND_NAMES.join(", ")})`);
  }
  if (disabled.includes(name)) {
    throw new CommandError(`Command '${name}' is disabled by configuration`);
  }
  return name;
}

export async function runCommand(ctx: ProjectContext, invocation: CommandInvocation): Promise<void> {
  switch (invocation.command) {
    case "repos":
      return runListRepos(ctx);
    case "teams":
      return runListTeams(ctx, invocation.ids);
    case "branches":
      return runListBranches(ctx, invocation.repos, invocation.teams);
    case "get-rules":
      return runGetRules(ctx, invocation.repos, {
        mapActors: invocation.mapActors,
        verbose: invocation.verbose,
        output: invocation.output
      });
    case "set-default-rules":
      return runSetDefaultRules(ctx, invocation.repos);
    case "set-repo-rules":
      return runSetRepoRules(ctx, invocation.files);
    default: {
      const unreachable: never = invocation;
      throw new CommandError(`Unsupported command: ${JSON.stringify(unreachable)}`);
    }
  }
}
