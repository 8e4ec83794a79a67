import type { Collaborators } from "@gitrelay/core";
import type { BatchTarget } from "@/lib/gateway/gateway";
import { createFileOps } from "./file-ops";
import { createGitOps } from "./git-ops";
import { createGitRunner } from "./git-runner";

export { createFileOps, resolveInside } from "./file-ops";
export { createGitOps, parseStatus } from "./git-ops";
export { createGitRunner, credentialEnv, type GitRunner } from "./git-runner";

/**
 * File and git collaborators bound to one working copy and credential.
 */
export function createCollaborators(target: BatchTarget): Collaborators {
  return {
    files: createFileOps(target.workingCopyPath),
    git: createGitOps({
      runner: createGitRunner({
        cwd: target.workingCopyPath,
        token: target.credential.token,
      }),
      repository: target.repository,
      workingCopyPath: target.workingCopyPath,
    }),
  };
}
