#!/usr/bin/env node

import { Command } from "commander";
import path from "node:path";
import { openProject } from "./app.js";
import { resolveCommand, runCommand, type CommandInvocation } from "./commands/registry.js";
import { CONFIG_FILE_NAME, loadConfig, resolveProjectRoot } from "./config.js";
import { CommandError, ConfigError, errorMessage } from "./errors.js";
import { consoleSink, fileSink, isLogLevel, Logger, styleLine, type LogMode, type LogSink } from "./log.js";
import { collectNames, parseIndent, possibleFile } from "./utils/flags.js";

type GlobalOptions = {
  config?: string;
  logLevel?: string;
  indent?: string;
  debug: boolean;
  plain: boolean;
};

const program = new Command();

program
  .name("ruleset-admin")
  .description("Administer repository rulesets of a GitHub organization")
  .version("0.1.0")
  .option("--config <file>", "configuration file")
  .option("--log-level <level>", "ALL, DEBUG, INFO, WARNING, ERROR, CRITICAL or NONE")
  .option("--indent <width>", "indent width of emitted rules (1-8)")
  .option("--debug", "print stack traces on error", false)
  .option("--plain", "disable colored output", false)
  .showHelpAfterError();

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function requireNames(params: string[], what: string): string[] {
  const names = collectNames(params);
  if (names.length === 0) {
    throw new CommandError(`No ${what} given`);
  }
  return names;
}

function logMode(): LogMode {
  return globalOptions().plain ? "plain" : "color";
}

async function execute(invocation: CommandInvocation): Promise<void> {
  const opts = globalOptions();
  const root = resolveProjectRoot();
  const configFile = opts.config ? path.resolve(opts.config) : path.resolve(root, CONFIG_FILE_NAME);
  const config = loadConfig(configFile, root);
  resolveCommand(invocation.command, config.disabledCommands);

  const level = (opts.logLevel ?? config.log.level).toUpperCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Unknown log level '${level}'`);
  }
  const indent = opts.indent === undefined ? config.indent : parseIndent(opts.indent);

  const mode = logMode();
  const sinks: LogSink[] = [consoleSink(mode)];
  if (level !== "NONE") {
    sinks.unshift(fileSink(config.log.dir, config.log.name));
  }
  const log = new Logger(level, sinks);

  log.info(`command: ${invocation.command} (config ${configFile})`);
  try {
    const ctx = openProject({ ...config, indent }, log, (line) => console.log(styleLine(line, mode)));
    await runCommand(ctx, invocation);
  } catch (error) {
    log.debug(error instanceof Error && error.stack ? error.stack : errorMessage(error));
    throw error;
  }
}

program
  .command("repos")
  .description("List the organization's repositories")
  .action(async () => {
    await execute({ command: "repos" });
  });

program
  .command("teams")
  .description("List the team working set")
  .option("--ids", "include team ids", false)
  .action(async (opts: { ids: boolean }) => {
    await execute({ command: "teams", ids: opts.ids });
  });

program
  .command("branches")
  .description("List branches whose names start with a team name")
  .argument("<repos...>", "repository names, comma separated or @file")
  .option("--teams <names>", "team names, comma separated or @file; '*' lists every branch")
  .action(async (repos: string[], opts: { teams?: string }) => {
    await execute({
      command: "branches",
      repos: requireNames(repos, "repositories"),
      teams: opts.teams === undefined ? null : collectNames([opts.teams])
    });
  });

program
  .command("get-rules")
  .description("Print the rulesets of repositories")
  .argument("<repos...>", "repository names, comma separated or @file")
  .option("--map-actors", "add team names to team bypass actors", false)
  .option("--verbose", "add timestamps and links", false)
  .option("--output <file>", "write to a file instead of stdout")
  .action(async (repos: string[], opts: { mapActors: boolean; verbose: boolean; output?: string }) => {
    await execute({
      command: "get-rules",
      repos: requireNames(repos, "repositories"),
      mapActors: opts.mapActors,
      verbose: opts.verbose,
      output: opts.output === undefined ? undefined : possibleFile(opts.output)
    });
  });

program
  .command("set-default-rules")
  .description("Create or update the default rule template in repositories")
  .argument("<repos...>", "repository names, comma separated or @file")
  .action(async (repos: string[]) => {
    await execute({ command: "set-default-rules", repos: requireNames(repos, "repositories") });
  });

program
  .command("set-repo-rules")
  .description("Create or update rules from documents written by get-rules")
  .argument("<files...>", "rule documents")
  .action(async (files: string[]) => {
    await execute({ command: "set-repo-rules", files: files.map((file) => path.resolve(file)) });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(styleLine(`[error] ${errorMessage(err)}`, logMode()));
  if (globalOptions().debug && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
});
