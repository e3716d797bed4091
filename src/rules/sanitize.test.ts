import { describe, expect, it } from "vitest";
import { MalformedDocumentError } from "../errors.js";
import { NameIdCache, type TeamLookup } from "../resolver.js";
import { emitRules } from "./emit.js";
import { sanitizeRule } from "./sanitize.js";
import { readRule, type Rule } from "./types.js";

const cache = new NameIdCache("team", [
  ["core", 11],
  ["ops", 22]
]);
const teams: TeamLookup = { idOf: async (name) => cache.idOf(name) };

const reported = {
  id: 7,
  source: "acme/api",
  source_type: "Repository",
  name: "protect-main",
  enforcement: "active",
  target: "branch",
  bypass_actors: [
    { actor_id: 11, actor_name: "core", actor_type: "Team", bypass_mode: "always" },
    { actor_name: "ops", actor_type: "Team", bypass_mode: "pull_request" },
    { actor_id: null, actor_type: "DeployKey", bypass_mode: "always" }
  ],
  conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
  rules: [{ type: "deletion" }],
  created_at: "2024-01-02T03:04:05Z",
  link: "https://github.test/acme/api/rules/7"
};

describe("sanitizeRule", () => {
  it("keeps write keys and resolves team actors by name", async () => {
    const clean = await sanitizeRule(reported, teams, "doc[0]");

    expect(clean).toEqual({
      id: 7,
      source: "acme/api",
      source_type: "Repository",
      name: "protect-main",
      enforcement: "active",
      target: "branch",
      bypass_actors: [
        { actor_id: 11, actor_type: "Team", bypass_mode: "always" },
        { actor_id: 22, actor_type: "Team", bypass_mode: "pull_request" },
        { actor_id: null, actor_type: "DeployKey", bypass_mode: "always" }
      ],
      conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
      rules: [{ type: "deletion" }]
    });
  });

  it("accepts what get-rules prints with mapped actors", async () => {
    const rule: Rule = {
      id: 3,
      source: "acme/web",
      source_type: "Repository",
      name: "tags",
      enforcement: "evaluate",
      target: "tag",
      bypass_actors: [{ actor_id: 22, actor_type: "Team", bypass_mode: "always" }],
      conditions: { ref_name: { include: ["refs/tags/v*"], exclude: [] } },
      rules: [{ type: "update" }, { type: "required_signatures" }]
    };
    const printed: unknown = JSON.parse(emitRules([rule], { indent: 4, verbose: true, teamNames: cache }));
    if (!Array.isArray(printed)) {
      throw new Error("expected a list");
    }

    expect(await sanitizeRule(printed[0], teams, "doc[0]")).toEqual(rule);
  });

  it("rejects an actor that needs an id and has none", async () => {
    const raw = {
      ...reported,
      bypass_actors: [{ actor_type: "OrganizationAdmin", bypass_mode: "always" }]
    };

    await expect(sanitizeRule(raw, teams, "doc[0]")).rejects.toThrow(
      new MalformedDocumentError("doc[0] (protect-main): bypass actor of type OrganizationAdmin has no actor_id")
    );
  });

  it("rejects null conditions in a document", async () => {
    await expect(sanitizeRule({ ...reported, conditions: null }, teams, "doc[0]")).rejects.toThrow(
      new MalformedDocumentError("doc[0] (protect-main): 'conditions' must be an object")
    );
  });

  it("rejects an unknown team name", async () => {
    const raw = { ...reported, bypass_actors: [{ actor_name: "ghost", actor_type: "Team", bypass_mode: "always" }] };

    await expect(sanitizeRule(raw, teams, "doc[0]")).rejects.toThrow("Unknown team name 'ghost'");
  });
});

describe("readRule", () => {
  it("lists every missing required key", () => {
    expect(() => readRule({ name: "x" }, "doc[1]")).toThrow(
      "doc[1]: missing required key(s): enforcement, target, bypass_actors, conditions, rules"
    );
  });

  it("takes the link from the html link of a server record", () => {
    const rule = readRule(
      {
        ...reported,
        link: undefined,
        _links: { html: { href: "https://github.test/acme/api/rules/7" } }
      },
      "ruleset 7"
    );
    expect(rule.link).toBe("https://github.test/acme/api/rules/7");
  });

  it("rejects a fractional actor id", () => {
    const raw = { ...reported, bypass_actors: [{ actor_id: 1.5, actor_type: "Integration" }] };
    expect(() => readRule(raw, "doc[0]")).toThrow(
      "doc[0] (protect-main): bypass actor of type Integration has a non-integer actor_id"
    );
  });
});
