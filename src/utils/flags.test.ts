import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectNames, parseIndent, parseNamesList, possibleFile } from "./flags.js";

describe("name lists", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ruleset-admin-flags-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("splits on commas and whitespace", () => {
    expect(parseNamesList("api,web  docs")).toEqual(["api", "web", "docs"]);
  });

  it("reads @file arguments", () => {
    const file = path.join(dir, "repos.txt");
    fs.writeFileSync(file, "api\nweb, docs\n");

    expect(parseNamesList(`@${file}`)).toEqual(["api", "web", "docs"]);
  });

  it("fails on a missing @file", () => {
    const file = path.join(dir, "missing.txt");
    expect(() => parseNamesList(`@${file}`)).toThrow(`not a readable file: '${file}'`);
  });

  it("dedupes across arguments keeping first occurrence", () => {
    expect(collectNames(["web,api", "api docs", "web"])).toEqual(["web", "api", "docs"]);
  });

  it("accepts an output file in an existing directory", () => {
    const file = path.join(dir, "rules.json");
    expect(possibleFile(file)).toBe(file);
  });

  it("rejects an output path that is a directory", () => {
    expect(() => possibleFile(dir)).toThrow(`exists but not a file: '${dir}'`);
  });

  it("rejects an output path in a missing directory", () => {
    const missing = path.join(dir, "nope");
    expect(() => possibleFile(path.join(missing, "rules.json"))).toThrow(`not a directory: '${missing}'`);
  });
});

describe("parseIndent", () => {
  it("accepts widths 1 to 8", () => {
    expect(parseIndent("1")).toBe(1);
    expect(parseIndent(8)).toBe(8);
  });

  it("rejects anything else", () => {
    expect(() => parseIndent("0")).toThrow("indent must be an integer in 1..8, got '0'");
    expect(() => parseIndent("2.5")).toThrow("indent must be an integer in 1..8, got '2.5'");
    expect(() => parseIndent("wide")).toThrow("indent must be an integer in 1..8, got 'wide'");
  });
});
