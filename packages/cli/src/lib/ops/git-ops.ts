/**
 * Version-control collaborator over the git executable.
 *
 * Every operation answers with an OperationResult; a non-zero git exit
 * becomes `success: false` with git's first error line as `error`.
 */

import { access } from "fs/promises";
import { join } from "path";
import {
  GIT_DIRNAME,
  type GitOps,
  type OperationResult,
  type ProviderUser,
  type RepositoryInfo,
} from "@gitrelay/core";
import { describeFailure, type GitRunner, type GitRunResult } from "./git-runner";

export type GitOpsOptions = {
  runner: GitRunner;
  repository: RepositoryInfo;
  workingCopyPath: string;
};

export type StatusEntry = {
  /** Two-letter porcelain code, e.g. " M" or "??" */
  code: string;
  path: string;
};

export function createGitOps(options: GitOpsOptions): GitOps {
  const { runner, repository, workingCopyPath } = options;

  async function currentBranch(): Promise<string | null> {
    const result = await runner(["rev-parse", "--abbrev-ref", "HEAD"]);
    const branch = result.exitCode === 0 ? result.stdout : "";
    return branch && branch !== "HEAD" ? branch : null;
  }

  async function hasLocalBranch(name: string) {
    const result = await runner([
      "rev-parse",
      "--verify",
      "--quiet",
      `refs/heads/${name}`,
    ]);
    return result.exitCode === 0;
  }

  return {
    async pull() {
      const branch = await currentBranch();
      if (!branch) {
        return noBranch("Pull");
      }
      const result = await runner(["pull", "--no-rebase", "origin", branch]);
      if (result.exitCode !== 0) {
        return failed("Pull", result);
      }
      return ok(`Pulled origin/${branch}`, { branch, output: result.stdout });
    },

    async commit(message) {
      const staged = await runner(["add", "-A"]);
      if (staged.exitCode !== 0) {
        return failed("Commit", staged);
      }

      const status = await runner(["status", "--porcelain"]);
      if (status.exitCode !== 0) {
        return failed("Commit", status);
      }
      if (!status.stdout) {
        return ok("Nothing to commit", { commitHash: null });
      }

      const committed = await runner(["commit", "-m", message]);
      if (committed.exitCode !== 0) {
        return failed("Commit", committed);
      }

      const head = await runner(["rev-parse", "HEAD"]);
      if (head.exitCode !== 0) {
        return failed("Commit", head);
      }
      const shortHash = head.stdout.slice(0, 8);
      return ok(`Created commit ${shortHash}`, {
        commitHash: head.stdout,
        shortHash,
        message,
      });
    },

    async push() {
      const branch = await currentBranch();
      if (!branch) {
        return noBranch("Push");
      }

      const upstream = await runner([
        "rev-parse",
        "--abbrev-ref",
        "--symbolic-full-name",
        "@{u}",
      ]);
      const upstreamCreated = upstream.exitCode !== 0;
      const args = upstreamCreated
        ? ["push", "--set-upstream", "origin", branch]
        : ["push", "origin", branch];

      const result = await runner(args);
      if (result.exitCode !== 0) {
        return failed("Push", result);
      }
      return ok(`Pushed ${branch} to origin`, { branch, upstreamCreated });
    },

    async createBranch(name) {
      if (!isBranchName(name)) {
        return invalidBranch(name);
      }
      if (await hasLocalBranch(name)) {
        return {
          success: false,
          message: `Branch '${name}' already exists`,
          error: "Branch already exists",
        };
      }

      const result = await runner(["branch", name]);
      if (result.exitCode !== 0) {
        return failed("Create branch", result);
      }
      return ok(`Created branch '${name}'`, { branch: name });
    },

    async switchBranch(name) {
      if (!isBranchName(name)) {
        return invalidBranch(name);
      }

      if (await hasLocalBranch(name)) {
        const result = await runner(["checkout", name]);
        if (result.exitCode !== 0) {
          return failed("Switch branch", result);
        }
        return ok(`Switched to branch '${name}'`, { branch: name, tracking: null });
      }

      const fetched = await runner(["fetch", "origin", name]);
      if (fetched.exitCode !== 0) {
        return {
          success: false,
          message: `Branch '${name}' does not exist locally or on the remote`,
          error: "Branch not found",
        };
      }

      const tracking = `origin/${name}`;
      const result = await runner(["checkout", "-b", name, "--track", tracking]);
      if (result.exitCode !== 0) {
        return failed("Switch branch", result);
      }
      return ok(`Switched to branch '${name}' tracking ${tracking}`, {
        branch: name,
        tracking,
      });
    },

    async clone() {
      if (await isCheckout(workingCopyPath)) {
        return ok("Working copy already cloned", {
          localPath: workingCopyPath,
          cloned: false,
        });
      }

      const result = await runner(["clone", `${repository.url}.git`, "."]);
      if (result.exitCode !== 0) {
        return failed("Clone", result);
      }
      return ok(`Cloned ${repository.fullName}`, {
        localPath: workingCopyPath,
        cloned: true,
      });
    },

    async status() {
      const result = await runner(["status", "--porcelain=v1", "--branch"]);
      if (result.exitCode !== 0) {
        return failed("Status", result);
      }
      const parsed = parseStatus(result.stdout);
      return ok(
        parsed.clean ? "Working tree clean" : `${parsed.changes.length} change(s)`,
        parsed
      );
    },

    async configureUser(user: ProviderUser) {
      const email = user.email ?? `${user.id}+${user.login}@users.noreply.github.com`;
      const named = await runner(["config", "user.name", user.name]);
      if (named.exitCode !== 0) {
        return failed("Configure user", named);
      }
      const mailed = await runner(["config", "user.email", email]);
      if (mailed.exitCode !== 0) {
        return failed("Configure user", mailed);
      }
      return ok(`Configured commit author ${user.name} <${email}>`, {
        name: user.name,
        email,
      });
    },
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parses `git status --porcelain=v1 --branch` output.
 */
export function parseStatus(output: string): {
  branch: string | null;
  upstream: string | null;
  clean: boolean;
  changes: StatusEntry[];
} {
  const lines = output.split("\n").filter((line) => line.length > 0);
  let branch: string | null = null;
  let upstream: string | null = null;
  const changes: StatusEntry[] = [];

  for (const line of lines) {
    if (line.startsWith("## ")) {
      const header = line.slice(3).split(" ")[0] ?? "";
      const [local, remote] = header.split("...");
      branch = local || null;
      upstream = remote || null;
      continue;
    }
    changes.push({ code: line.slice(0, 2), path: line.slice(3) });
  }

  return { branch, upstream, clean: changes.length === 0, changes };
}

function isBranchName(name: string) {
  return name.length > 0 && !name.startsWith("-") && !/\s/.test(name);
}

async function isCheckout(path: string) {
  try {
    await access(join(path, GIT_DIRNAME));
    return true;
  } catch {
    return false;
  }
}

function ok(message: string, data: Record<string, unknown>): OperationResult {
  return { success: true, message, data };
}

function failed(action: string, result: GitRunResult): OperationResult {
  const error = describeFailure(result);
  return { success: false, message: `${action} failed: ${error}`, error };
}

function noBranch(action: string): OperationResult {
  return {
    success: false,
    message: `${action} failed: no branch is checked out`,
    error: "Detached or empty HEAD",
  };
}

function invalidBranch(name: string): OperationResult {
  return {
    success: false,
    message: `'${name}' is not a valid branch name`,
    error: "Invalid branch name",
  };
}
