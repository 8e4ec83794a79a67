/**
 * CLI Run Command
 *
 * Executes a batch file against a repository with the stored credentials,
 * without a server. The repository is cloned into a temporary working copy
 * unless a workspace directory is given.
 */

import {
  type BatchReport,
  type Collaborators,
  RelayError,
  type RepositoryInfo,
} from "@gitrelay/core";
import { mkdir, readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { fetchRepository, repositoryLookupError } from "@/lib/api";
import { useAppContext } from "@/lib/context";
import { getWorkspaceRoot } from "@/lib/config";
import { errorCode, getErrorMessage } from "@/lib/errors";
import { type BatchTarget, runBatch } from "@/lib/gateway";
import { log } from "@/lib/log";
import { createCollaborators } from "@/lib/ops";
import {
  createWorkingCopy,
  existingWorkingCopy,
  type WorkingCopy,
} from "@/lib/sessions/working-copy";

export type RunOptions = {
  /** JSON file holding the command records */
  file: string;
  /** owner/name */
  repo: string;
  /** Keep the checkout in this directory instead of a temporary one */
  workspace?: string;
  signal?: AbortSignal;
  collaborators?: (target: BatchTarget) => Collaborators;
  /** Defaults to the REST API at `config.provider.apiUrl` */
  lookupRepository?: (
    token: string,
    owner: string,
    name: string
  ) => ReturnType<typeof fetchRepository>;
};

export type RunResult =
  | { success: true; report: BatchReport }
  | { success: false; error: string; message: string };

/** A batch file is a list of records, or an execute request body. */
const batchFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ commands: z.array(z.unknown()) }).passthrough(),
]);

const REPO_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;

export async function run(options: RunOptions): Promise<RunResult> {
  try {
    return { success: true, report: await runOrThrow(options) };
  } catch (error) {
    if (error instanceof RelayError) {
      return { success: false, error: error.kind, message: error.message };
    }
    throw error;
  }
}

async function runOrThrow(options: RunOptions): Promise<BatchReport> {
  const ctx = useAppContext();
  if (!ctx) {
    throw new Error("App context not initialized");
  }

  const match = REPO_PATTERN.exec(options.repo.trim());
  const owner = match?.[1];
  const name = match?.[2];
  if (!owner || !name) {
    throw new RelayError(
      "InvalidParameter",
      `Repository must look like owner/name, got "${options.repo}"`
    );
  }

  const records = await readBatchFile(options.file);

  const { credentials, user, config } = ctx;
  if (!credentials) {
    throw new RelayError(
      "NotAuthenticated",
      "Not logged in. Run `gitrelay login` first."
    );
  }

  const lookup =
    options.lookupRepository ??
    ((token: string, repoOwner: string, repoName: string) =>
      fetchRepository(config.provider.apiUrl, token, repoOwner, repoName));
  const found = await lookup(credentials.token, owner, name);
  if (!found.success) {
    throw repositoryLookupError(`${owner}/${name}`, found);
  }
  const repository = found.data;

  const workingCopy = await openWorkingCopy(
    repository,
    options.workspace,
    getWorkspaceRoot(config.sessions)
  );
  const collaborators = options.collaborators ?? createCollaborators;
  const target: BatchTarget = {
    repository,
    workingCopyPath: workingCopy.path,
    credential: { token: credentials.token, scope: credentials.scope },
    user: user ?? undefined,
  };

  try {
    const { git } = collaborators(target);
    const cloned = await git.clone();
    if (!cloned.success) {
      throw new RelayError(
        "CollaboratorError",
        `Could not clone ${repository.fullName}: ${cloned.error}`
      );
    }
    log.debug(cloned.message);

    if (user) {
      const configured = await git.configureUser(user);
      if (!configured.success) log.warn(configured.message);
    }

    return await runBatch(target, records, {
      collaborators,
      signal: options.signal,
    });
  } finally {
    await workingCopy.release();
  }
}

async function readBatchFile(file: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    throw new RelayError(
      "InvalidParameter",
      errorCode(error) === "ENOENT"
        ? `Batch file not found: ${file}`
        : `Could not read ${file}: ${getErrorMessage(error)}`,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new RelayError(
      "DecodeError",
      `Batch file is not JSON: ${getErrorMessage(error)}`,
      { cause: error }
    );
  }

  const batch = batchFileSchema.safeParse(parsed);
  if (!batch.success) {
    throw new RelayError(
      "InvalidParameter",
      "Batch file must be an array of commands or an object with a commands array"
    );
  }
  return Array.isArray(batch.data) ? batch.data : batch.data.commands;
}

async function openWorkingCopy(
  repository: RepositoryInfo,
  workspace: string | undefined,
  root: string
): Promise<WorkingCopy> {
  if (workspace) {
    const path = resolve(workspace);
    await mkdir(path, { recursive: true });
    return existingWorkingCopy(path);
  }
  return createWorkingCopy(root, `${repository.owner}-${repository.name}`);
}
