import fs from "node:fs";
import { ConfigError } from "./errors.js";

export const TOKEN_KEY = "github.token";
export const TOKEN_PREFIXES = ["ghp_", "gho_", "ghu_", "ghs_", "ghr_", "github_pat_"] as const;

export function parseCredentials(text: string, source: string): string {
  let token = "";
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    const eq = line.indexOf("=");
    if (eq < 0) {
      continue;
    }
    if (line.slice(0, eq).trim() === TOKEN_KEY) {
      token = line.slice(eq + 1).trim();
    }
  }

  if (!token) {
    throw new ConfigError(`No ${TOKEN_KEY} entry in ${source}`);
  }
  if (!TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix))) {
    throw new ConfigError(`Unrecognized ${TOKEN_KEY} format in ${source}`);
  }
  return token;
}

export function readCredentials(file: string): string {
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
    throw new ConfigError(`not a readable file: '${file}'`);
  }
  return parseCredentials(fs.readFileSync(file, "utf8"), file);
}
