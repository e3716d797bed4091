import { fileURLToPath } from "node:url";
import fs from "node:fs";
import path from "node:path";
import { COMMAND_NAMES, isCommandName, type CommandName } from "./commands/command_names.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevelName } from "./log.js";
import { expandHome, parseIndent } from "./utils/flags.js";
import { MAX_PAGE_SIZE } from "./github/client.js";

const THIS_FILE = fileURLToPath(import.meta.url);
const PACKAGE_ROOT = path.resolve(path.dirname(THIS_FILE), "..");

export const CONFIG_FILE_NAME = "config/ruleset-admin.config.json";
export const DEFAULT_API_URL = "https://api.github.com";
export const DEFAULT_API_VERSION = "2022-11-28";
export const DEFAULT_CREDENTIALS = "~/.config/ruleset-admin/credentials";

export function resolveProjectRoot(): string {
  const envRoot = process.env.RULESET_ADMIN_ROOT;
  if (envRoot) {
    return path.resolve(envRoot);
  }

  const cwd = process.cwd();
  if (fs.existsSync(path.resolve(cwd, CONFIG_FILE_NAME))) {
    return cwd;
  }

  return PACKAGE_ROOT;
}

type ConfigFile = {
  version?: number;
  github?: {
    api_url?: string;
    api_version?: string;
    credentials?: string;
    page_size?: number;
  };
  project?: {
    org?: string;
    teams?: string[];
    default_rules?: string;
  };
  output?: { indent?: number };
  log?: { level?: string; dir?: string; name?: string };
  commands?: { disabled?: string[] };
};

export type RunConfig = {
  root: string;
  apiUrl: string;
  apiVersion: string;
  credentialsFile: string;
  pageSize: number;
  org: string;
  teams: string[] | null;
  defaultRulesFile: string;
  indent: number;
  log: { level: LogLevelName; dir: string; name: string };
  disabledCommands: CommandName[];
};

function parseJson<T>(raw: string, source: string): T {
  try {
    return JSON.parse(raw) as T;
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function loadJsonFile<T>(filePath: string): T {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new ConfigError(`not a readable file: '${filePath}'`);
  }
  return parseJson<T>(fs.readFileSync(filePath, "utf8"), filePath);
}

function ensureVersion(configFile: string, parsed: { version?: number }): void {
  if ((parsed.version ?? 0) !== 1) {
    throw new ConfigError(`Unsupported config version in ${configFile}: ${parsed.version ?? 0}`);
  }
}

// Leading "~" or "{{root}}", "{{config}}", "{{log}}"; anything relative resolves against root.
export function resolveConfPath(root: string, value: string, logDir?: string): string {
  let p = expandHome(value);
  if (p.startsWith("{{")) {
    const end = p.indexOf("}}");
    if (end < 0) {
      throw new ConfigError(`Unterminated substitution in path: '${value}'`);
    }
    const key = p.slice(2, end).trim().toLowerCase();
    const substitutions: Record<string, string | undefined> = {
      root,
      config: path.join(root, "config"),
      log: logDir ?? path.join(root, "log")
    };
    const replacement = substitutions[key];
    if (replacement === undefined) {
      throw new ConfigError(`Unknown substitution '{{${key}}}' in path: '${value}'`);
    }
    p = path.join(replacement, p.slice(end + 2));
  }
  return path.resolve(root, p);
}

function stringField(value: unknown, field: string, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string" || !value) {
    throw new ConfigError(`${field} must be a non-empty string`);
  }
  return value;
}

function stringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string" && item !== "")) {
    throw new ConfigError(`${field} must be a list of non-empty strings`);
  }
  return value;
}

export function loadConfig(configFile: string, root: string): RunConfig {
  const config = loadJsonFile<ConfigFile>(configFile);
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new ConfigError(`Expected a JSON object in ${configFile}`);
  }
  ensureVersion(configFile, config);

  const org = stringField(config.project?.org, "project.org", "");
  if (!org) {
    throw new ConfigError(`Missing project.org in ${configFile}`);
  }

  const pageSize = config.github?.page_size ?? MAX_PAGE_SIZE;
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ConfigError(`github.page_size must be an integer in 1..${MAX_PAGE_SIZE}`);
  }

  const level = stringField(config.log?.level, "log.level", "INFO").toUpperCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Unknown log.level '${level}'`);
  }

  const disabled = config.commands?.disabled === undefined ? [] : stringList(config.commands.disabled, "commands.disabled");
  const disabledCommands: CommandName[] = [];
  for (const name of disabled) {
    if (!isCommandName(name)) {
      throw new ConfigError(`commands.disabled names unknown command '${name}' (known: ${COMMAND_NAMES.join(", ")})`);
    }
    disabledCommands.push(name);
  }

  const logDir = resolveConfPath(root, stringField(config.log?.dir, "log.dir", "{{root}}/log"));

  return {
    root,
    apiUrl: stringField(config.github?.api_url, "github.api_url", DEFAULT_API_URL).replace(/\/+$/, ""),
    apiVersion: stringField(config.github?.api_version, "github.api_version", DEFAULT_API_VERSION),
    credentialsFile: resolveConfPath(
      root,
      stringField(config.github?.credentials, "github.credentials", DEFAULT_CREDENTIALS),
      logDir
    ),
    pageSize,
    org,
    teams: config.project?.teams === undefined ? null : stringList(config.project.teams, "project.teams"),
    defaultRulesFile: resolveConfPath(
      root,
      stringField(config.project?.default_rules, "project.default_rules", "{{config}}/default-rules.json"),
      logDir
    ),
    indent: parseIndent(config.output?.indent ?? 2),
    log: {
      level,
      dir: logDir,
      name: stringField(config.log?.name, "log.name", "ruleset-admin")
    },
    disabledCommands
  };
}
