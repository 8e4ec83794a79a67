import { mkdir, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { GitOps, RepositoryInfo } from "@gitrelay/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createGitOps, parseStatus } from "./git-ops";
import type { GitRunner, GitRunResult } from "./git-runner";

const REPOSITORY: RepositoryInfo = {
  owner: "acme",
  name: "site",
  fullName: "acme/site",
  url: "https://github.com/acme/site",
};

type Reply = Partial<GitRunResult>;

/**
 * Runner answering from a table keyed by the joined arguments. Unlisted
 * invocations succeed with no output.
 */
function createFakeRunner(replies: Record<string, Reply> = {}) {
  const calls: string[] = [];
  const runner: GitRunner = async (args) => {
    const key = args.join(" ");
    calls.push(key);
    return {
      exitCode: 0,
      stdout: "",
      stderr: "",
      timedOut: false,
      ...replies[key],
    };
  };
  return { runner, calls };
}

const ON_MAIN: Record<string, Reply> = {
  "rev-parse --abbrev-ref HEAD": { stdout: "main" },
};

let workDir: string;

function gitOps(replies: Record<string, Reply> = {}): {
  git: GitOps;
  calls: string[];
} {
  const { runner, calls } = createFakeRunner(replies);
  return {
    git: createGitOps({ runner, repository: REPOSITORY, workingCopyPath: workDir }),
    calls,
  };
}

describe("createGitOps", () => {
  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "gitrelay-git-ops-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe("pull", () => {
    it("pulls the current branch without rebasing", async () => {
      const { git, calls } = gitOps(ON_MAIN);

      const result = await git.pull();

      expect(result.success).toBe(true);
      expect(calls).toContain("pull --no-rebase origin main");
    });

    it("reports git's first error line", async () => {
      const { git } = gitOps({
        ...ON_MAIN,
        "pull --no-rebase origin main": {
          exitCode: 1,
          stderr: "\nfatal: couldn't find remote ref main\n",
        },
      });

      expect(await git.pull()).toEqual({
        success: false,
        message: "Pull failed: fatal: couldn't find remote ref main",
        error: "fatal: couldn't find remote ref main",
      });
    });

    it("fails on a detached HEAD", async () => {
      const { git, calls } = gitOps({
        "rev-parse --abbrev-ref HEAD": { stdout: "HEAD" },
      });

      const result = await git.pull();

      expect(result.success).toBe(false);
      expect(calls).toEqual(["rev-parse --abbrev-ref HEAD"]);
    });
  });

  describe("commit", () => {
    it("is a successful no-op with nothing staged", async () => {
      const { git, calls } = gitOps();

      expect(await git.commit("Update")).toEqual({
        success: true,
        message: "Nothing to commit",
        data: { commitHash: null },
      });
      expect(calls).toEqual(["add -A", "status --porcelain"]);
    });

    it("commits and reports the new hash", async () => {
      const { git, calls } = gitOps({
        "status --porcelain": { stdout: "A  notes.txt" },
        "rev-parse HEAD": { stdout: "0123456789abcdef0123456789abcdef01234567" },
      });

      expect(await git.commit("Add notes")).toEqual({
        success: true,
        message: "Created commit 01234567",
        data: {
          commitHash: "0123456789abcdef0123456789abcdef01234567",
          shortHash: "01234567",
          message: "Add notes",
        },
      });
      expect(calls).toContain("commit -m Add notes");
    });
  });

  describe("push", () => {
    it("sets the upstream on the first push of a branch", async () => {
      const { git, calls } = gitOps({
        ...ON_MAIN,
        "rev-parse --abbrev-ref --symbolic-full-name @{u}": {
          exitCode: 128,
          stderr: "fatal: no upstream configured for branch 'main'",
        },
      });

      expect(await git.push()).toEqual({
        success: true,
        message: "Pushed main to origin",
        data: { branch: "main", upstreamCreated: true },
      });
      expect(calls).toContain("push --set-upstream origin main");
    });

    it("pushes plainly once the upstream exists", async () => {
      const { git, calls } = gitOps({
        ...ON_MAIN,
        "rev-parse --abbrev-ref --symbolic-full-name @{u}": {
          stdout: "origin/main",
        },
      });

      const result = await git.push();

      expect(result.success && result.data.upstreamCreated).toBe(false);
      expect(calls).toContain("push origin main");
      expect(calls).not.toContain("push --set-upstream origin main");
    });

    it("reports a rejected push", async () => {
      const { git } = gitOps({
        ...ON_MAIN,
        "push --set-upstream origin main": {
          exitCode: 1,
          stderr: "! [rejected] main -> main (fetch first)",
        },
        "rev-parse --abbrev-ref --symbolic-full-name @{u}": { exitCode: 128 },
      });

      const result = await git.push();

      expect(result.success).toBe(false);
      expect(result.success ? null : result.error).toBe(
        "! [rejected] main -> main (fetch first)"
      );
    });
  });

  describe("createBranch", () => {
    it("creates the branch without switching to it", async () => {
      const { git, calls } = gitOps({
        "rev-parse --verify --quiet refs/heads/feature/x": { exitCode: 1 },
      });

      expect(await git.createBranch("feature/x")).toEqual({
        success: true,
        message: "Created branch 'feature/x'",
        data: { branch: "feature/x" },
      });
      expect(calls).toContain("branch feature/x");
      expect(calls.some((call) => call.startsWith("checkout"))).toBe(false);
    });

    it("refuses an existing branch", async () => {
      const { git, calls } = gitOps();

      expect(await git.createBranch("main")).toEqual({
        success: false,
        message: "Branch 'main' already exists",
        error: "Branch already exists",
      });
      expect(calls).not.toContain("branch main");
    });

    it("refuses names that look like options", async () => {
      const { git, calls } = gitOps();

      const result = await git.createBranch("--force");

      expect(result.success).toBe(false);
      expect(calls).toEqual([]);
    });
  });

  describe("switchBranch", () => {
    it("checks out a local branch", async () => {
      const { git, calls } = gitOps();

      const result = await git.switchBranch("dev");

      expect(result.success).toBe(true);
      expect(calls).toEqual([
        "rev-parse --verify --quiet refs/heads/dev",
        "checkout dev",
      ]);
    });

    it("tracks the remote branch when there is no local one", async () => {
      const { git, calls } = gitOps({
        "rev-parse --verify --quiet refs/heads/dev": { exitCode: 1 },
      });

      const result = await git.switchBranch("dev");

      expect(result).toEqual({
        success: true,
        message: "Switched to branch 'dev' tracking origin/dev",
        data: { branch: "dev", tracking: "origin/dev" },
      });
      expect(calls.slice(1)).toEqual([
        "fetch origin dev",
        "checkout -b dev --track origin/dev",
      ]);
    });

    it("fails when the branch exists nowhere", async () => {
      const { git } = gitOps({
        "rev-parse --verify --quiet refs/heads/ghost": { exitCode: 1 },
        "fetch origin ghost": {
          exitCode: 128,
          stderr: "fatal: couldn't find remote ref ghost",
        },
      });

      expect(await git.switchBranch("ghost")).toEqual({
        success: false,
        message: "Branch 'ghost' does not exist locally or on the remote",
        error: "Branch not found",
      });
    });
  });

  describe("clone", () => {
    it("clones into the working copy", async () => {
      const { git, calls } = gitOps();

      expect(await git.clone()).toEqual({
        success: true,
        message: "Cloned acme/site",
        data: { localPath: workDir, cloned: true },
      });
      expect(calls).toEqual(["clone https://github.com/acme/site.git ."]);
    });

    it("does nothing when the working copy is already a checkout", async () => {
      await mkdir(join(workDir, ".git"));
      const { git, calls } = gitOps();

      expect(await git.clone()).toEqual({
        success: true,
        message: "Working copy already cloned",
        data: { localPath: workDir, cloned: false },
      });
      expect(calls).toEqual([]);
    });
  });

  describe("configureUser", () => {
    it("falls back to the no-reply address", async () => {
      const { git, calls } = gitOps();

      const result = await git.configureUser({
        id: 42,
        login: "octo",
        name: "Octo Cat",
        email: null,
      });

      expect(result.success).toBe(true);
      expect(calls).toEqual([
        "config user.name Octo Cat",
        "config user.email 42+octo@users.noreply.github.com",
      ]);
    });
  });
});

describe("parseStatus", () => {
  it("reads the branch header and changes", () => {
    expect(
      parseStatus("## main...origin/main [ahead 1]\n M src/app.ts\n?? notes.txt")
    ).toEqual({
      branch: "main",
      upstream: "origin/main",
      clean: false,
      changes: [
        { code: " M", path: "src/app.ts" },
        { code: "??", path: "notes.txt" },
      ],
    });
  });

  it("reports a clean tree without upstream", () => {
    expect(parseStatus("## feature")).toEqual({
      branch: "feature",
      upstream: null,
      clean: true,
      changes: [],
    });
  });
});
