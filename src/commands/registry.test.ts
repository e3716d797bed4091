import { describe, expect, it } from "vitest";
import { CommandError } from "../errors.js";
import { FakeGitHub } from "../test_helpers/fake_github.js";
import { testProject } from "../test_helpers/project.js";
import { resolveCommand, runCommand } from "./registry.js";

describe("resolveCommand", () => {
  it("accepts known commands", () => {
    expect(resolveCommand("get-rules", [])).toBe("get-rules");
  });

  it("rejects names outside the command set", () => {
    expect(() => resolveCommand("deploy", [])).toThrow(
      new CommandError(
        "Unknown command 'deploy' (expected one of: repos, teams, branches, get-rules, set-default-rules, set-repo-rules)"
      )
    );
  });

  it("rejects disabled commands", () => {
    expect(() => resolveCommand("set-repo-rules", ["set-repo-rules"])).toThrow(
      "Command 'set-repo-rules' is disabled by configuration"
    );
  });
});

describe("runCommand", () => {
  it("dispatches to the command flow", async () => {
    const fake = new FakeGitHub("acme", {
      teams: [
        ["core", 1],
        ["ops", 2]
      ]
    });
    const { ctx, output } = testProject(fake);

    await runCommand(ctx, { command: "teams", ids: true });

    expect(output).toEqual(["core: 1", "ops: 2"]);
  });
});
