import { beforeEach, describe, expect, it } from "vitest";
import { MalformedDocumentError, UnexpectedStatusError, UnresolvedReferenceError } from "../errors.js";
import { GitHubClient } from "../github/client.js";
import { Logger, silentLogger, type LogRecord } from "../log.js";
import { FakeGitHub } from "../test_helpers/fake_github.js";
import { parseSource, RuleReconciler, stampRule } from "./reconcile.js";
import { writePayload, type Rule } from "./types.js";

const protectMain = {
  id: 5,
  name: "protect-main",
  target: "branch",
  enforcement: "active",
  bypass_actors: [],
  conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
  rules: [{ type: "deletion" }]
};

function rule(name: string, source?: string, sourceType = "Repository"): Rule {
  return {
    name,
    source,
    source_type: source === undefined ? undefined : sourceType,
    enforcement: "active",
    target: "branch",
    bypass_actors: [{ actor_id: 22, actor_type: "Team", bypass_mode: "always" }],
    conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
    rules: [{ type: "non_fast_forward" }]
  };
}

describe("RuleReconciler", () => {
  let fake: FakeGitHub;
  let reconciler: RuleReconciler;

  beforeEach(() => {
    fake = new FakeGitHub("acme", { rulesets: { api: [protectMain] } });
    reconciler = new RuleReconciler(new GitHubClient(fake.transport, silentLogger), "acme", silentLogger);
  });

  it("updates by name, creates the rest, and converges on a second run", async () => {
    const desired = [rule("protect-main", "acme/api"), rule("tags", "acme/api")];

    expect(await reconciler.reconcile(desired)).toEqual([
      { action: "updated", repo: "api", name: "protect-main", id: 5 },
      { action: "created", repo: "api", name: "tags", id: 1000 }
    ]);
    expect(await reconciler.reconcile(desired)).toEqual([
      { action: "updated", repo: "api", name: "protect-main", id: 5 },
      { action: "updated", repo: "api", name: "tags", id: 1000 }
    ]);
    expect(fake.rulesetsOf("api").map((r) => [r.id, r.name])).toEqual([
      [5, "protect-main"],
      [1000, "tags"]
    ]);
  });

  it("creates a name repeated in one batch only once", async () => {
    const outcomes = await reconciler.reconcile([rule("tags", "acme/web"), rule("tags", "acme/web")]);

    expect(outcomes).toEqual([
      { action: "created", repo: "web", name: "tags", id: 1000 },
      { action: "updated", repo: "web", name: "tags", id: 1000 }
    ]);
    expect(fake.requestsTo("POST", "/repos/acme/web/rulesets")).toHaveLength(1);
    expect(fake.requestsTo("PUT", "/repos/acme/web/rulesets/1000")).toHaveLength(1);
  });

  it("targets the rule's own id when it has one", async () => {
    const renamed: Rule = { ...rule("renamed", "acme/api"), id: 5 };

    expect(await reconciler.reconcile([renamed])).toEqual([
      { action: "updated", repo: "api", name: "renamed", id: 5 }
    ]);
    expect(fake.requestsTo("PUT", "/repos/acme/api/rulesets/5")[0]?.body).toEqual(writePayload(renamed));
  });

  it("matches the organization of a source case-insensitively", async () => {
    expect(await reconciler.reconcile([rule("tags", "ACME/web")])).toEqual([
      { action: "created", repo: "web", name: "tags", id: 1000 }
    ]);
  });

  it("refuses rules of another organization before any request", async () => {
    await expect(reconciler.reconcile([rule("tags", "other/api")])).rejects.toThrow(
      new UnresolvedReferenceError("Rule source 'other/api' is not a repository of acme")
    );
    expect(fake.requests).toHaveLength(0);
  });

  it("skips rules whose source is not a repository", async () => {
    const records: LogRecord[] = [];
    const logged = new RuleReconciler(
      new GitHubClient(fake.transport, silentLogger),
      "acme",
      new Logger("ALL", [(record) => records.push(record)])
    );

    expect(await logged.reconcile([rule("tags", "acme", "Organization")])).toEqual([]);
    expect(records.filter((r) => r.level === "WARNING").map((r) => r.message)).toEqual([
      "Skipping rule 'tags': source_type Organization is not Repository"
    ]);
  });

  it("requires a source", async () => {
    await expect(reconciler.reconcile([rule("tags")])).rejects.toThrow(
      new MalformedDocumentError("Rule 'tags' has no source/source_type")
    );
  });

  it("applies a template to each repository", async () => {
    const template = [rule("protect-main")];

    expect(await reconciler.applyDefaults(["api", "web"], template)).toEqual([
      { action: "updated", repo: "api", name: "protect-main", id: 5 },
      { action: "created", repo: "web", name: "protect-main", id: 1000 }
    ]);
    expect(fake.requestsTo("POST", "/repos/acme/web/rulesets")[0]?.body).toEqual(writePayload(template[0]));
    expect(fake.rulesetsOf("web")[0]).toMatchObject({ source: "acme/web", source_type: "Repository" });
  });

  it("fails when creation does not answer 201", async () => {
    fake.createStatus = 200;

    const error = await reconciler.reconcile([rule("tags", "acme/web")]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ message: "https://api.test/repos/acme/web/rulesets: 200 OK" });
  });

  it("reads full rules for every listed ruleset", async () => {
    const [existing] = await reconciler.fetchExisting("api");

    expect(existing).toEqual({
      ...protectMain,
      source: "acme/api",
      source_type: "Repository",
      created_at: "2024-01-02T03:04:05Z",
      updated_at: "2024-01-02T03:04:05Z",
      link: "https://github.test/acme/api/rules/5"
    });
    expect(fake.requestsTo("GET", "/repos/acme/api/rulesets/5")).toHaveLength(1);
  });
});

describe("RuleReconciler with server-shaped rulesets", () => {
  it("reads rulesets that report no conditions", async () => {
    const fake = new FakeGitHub("acme", {
      rulesets: {
        api: [
          {
            id: 1,
            name: "push-limits",
            target: "push",
            enforcement: "active",
            bypass_actors: [],
            conditions: null,
            rules: [{ type: "max_file_size", parameters: { max_file_size: 10 } }]
          }
        ]
      }
    });
    const reconciler = new RuleReconciler(new GitHubClient(fake.transport, silentLogger), "acme", silentLogger);

    const [existing] = await reconciler.fetchExisting("api");

    expect(existing?.name).toBe("push-limits");
    expect(existing?.conditions).toEqual({});
    expect(await reconciler.reconcile([rule("tags", "acme/api")])).toEqual([
      { action: "created", repo: "api", name: "tags", id: 1000 }
    ]);
  });

  it("never targets an inherited organization ruleset of the same name", async () => {
    const fake = new FakeGitHub("acme", {
      rulesets: {
        api: [
          protectMain,
          { ...protectMain, id: 77, name: "org-baseline", source: "acme", source_type: "Organization" }
        ]
      }
    });
    const reconciler = new RuleReconciler(new GitHubClient(fake.transport, silentLogger), "acme", silentLogger);
    const desired = [rule("org-baseline", "acme/api")];

    expect(await reconciler.reconcile(desired)).toEqual([
      { action: "created", repo: "api", name: "org-baseline", id: 1000 }
    ]);
    expect(await reconciler.reconcile(desired)).toEqual([
      { action: "updated", repo: "api", name: "org-baseline", id: 1000 }
    ]);
    expect(fake.requestsTo("PUT", "/repos/acme/api/rulesets/77")).toHaveLength(0);
  });
});

describe("parseSource", () => {
  it("returns the repository of an org/repo source", () => {
    expect(parseSource("acme/api", "acme")).toBe("api");
  });

  it("rejects anything else", () => {
    expect(() => parseSource("acme/api/extra", "acme")).toThrow(UnresolvedReferenceError);
    expect(() => parseSource("acme", "acme")).toThrow(UnresolvedReferenceError);
  });
});

describe("stampRule", () => {
  it("points a template rule at a repository and drops its id", () => {
    const stamped = stampRule({ ...rule("protect-main"), id: 9 }, "acme", "web");

    expect(stamped.id).toBeUndefined();
    expect(stamped).toMatchObject({ source: "acme/web", source_type: "Repository", name: "protect-main" });
  });
});
