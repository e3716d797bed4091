import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../errors.js";

export const MIN_INDENT = 1;
export const MAX_INDENT = 8;

export function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
}

// "@path" reads the names from a file; otherwise commas and whitespace separate names.
export function parseNamesList(param: string): string[] {
  let raw = param;
  if (raw.startsWith("@")) {
    const file = path.resolve(expandHome(raw.slice(1)));
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new ConfigError(`not a readable file: '${file}'`);
    }
    raw = fs.readFileSync(file, "utf8");
  }
  return raw.replaceAll(",", " ").split(/\s+/).filter(Boolean);
}

export function collectNames(params: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const param of params) {
    for (const name of parseNamesList(param)) {
      if (!seen.has(name)) {
        seen.add(name);
        out.push(name);
      }
    }
  }
  return out;
}

export function parseIndent(raw: string | number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < MIN_INDENT || value > MAX_INDENT) {
    throw new ConfigError(`indent must be an integer in ${MIN_INDENT}..${MAX_INDENT}, got '${raw}'`);
  }
  return value;
}

export function possibleFile(param: string): string {
  const file = path.resolve(expandHome(param));
  if (fs.existsSync(file)) {
    if (!fs.statSync(file).isFile()) {
      throw new ConfigError(`exists but not a file: '${file}'`);
    }
    return file;
  }
  const dir = path.dirname(file);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigError(`not a directory: '${dir}'`);
  }
  return file;
}
