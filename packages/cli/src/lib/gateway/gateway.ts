/**
 * Command Gateway
 *
 * Runs one batch of command records against a session's collaborators:
 * orders the records by step, validates each one, dispatches the valid
 * ones in order and reports every step. A failed step never stops the
 * steps after it; only cancellation does.
 */

import {
  type BatchReport,
  type BearerCredential,
  type Collaborators,
  type CommandKind,
  type CommandResult,
  hasNumericStep,
  type OperationResult,
  type ParsedCommand,
  type ParsedCommandMap,
  type ProviderUser,
  RelayError,
  type RepositoryInfo,
  reportedCommand,
  reportedStep,
  type SessionStatus,
  validateCommand,
} from "@gitrelay/core";
import { getErrorMessage } from "@/lib/errors";
import { log, type ScopedLogger } from "@/lib/log";

// =============================================================================
// Types
// =============================================================================

/** Everything a batch needs from an authenticated, bound session. */
export type BatchTarget = {
  repository: RepositoryInfo;
  workingCopyPath: string;
  credential: BearerCredential;
  user?: ProviderUser;
};

export type GatewaySession = {
  status: SessionStatus;
  credential: BearerCredential | null;
};

export type ExecuteOptions = {
  /** Builds the collaborators bound to the session's working copy */
  collaborators: (target: BatchTarget) => Collaborators;
  /** Checked before each step */
  signal?: AbortSignal;
  logger?: ScopedLogger;
};

// =============================================================================
// Dispatch
// =============================================================================

type Handler<K extends CommandKind> = (
  collaborators: Collaborators,
  command: ParsedCommandMap[K]
) => Promise<OperationResult>;

const HANDLERS: { [K in CommandKind]: Handler<K> } = {
  "create.file": ({ files }, command) => files.create(command.path, command.bytes),
  "read.file": ({ files }, command) => files.read(command.path),
  "modify.file": ({ files }, command) =>
    files.modify(command.path, command.bytes, command.mode),
  "delete.file": ({ files }, command) => files.delete(command.path),
  "search.file": ({ files }, command) => files.search(command.term, command.mode),
  pull: ({ git }) => git.pull(),
  commit: ({ git }, command) => git.commit(command.message),
  push: ({ git }) => git.push(),
  "create.branch": ({ git }, command) => git.createBranch(command.branch),
  "switch.branch": ({ git }, command) => git.switchBranch(command.branch),
  clone: ({ git }) => git.clone(),
};

function dispatch<K extends CommandKind>(
  collaborators: Collaborators,
  kind: K,
  command: ParsedCommandMap[K]
): Promise<OperationResult> {
  const handler: Handler<K> = HANDLERS[kind];
  return handler(collaborators, command);
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Stable sort by step. Records without a numeric step keep their
 * submission order after all numbered records.
 */
export function orderRecords(records: readonly unknown[]): unknown[] {
  const numbered = records.filter(hasNumericStep);
  const unnumbered = records.filter((record) => !hasNumericStep(record));
  const sorted = [...numbered].sort((a, b) => reportedStep(a) - reportedStep(b));
  return [...sorted, ...unnumbered];
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Fails with NotInitialized unless the session is authenticated, bound to
 * a repository and holds a live credential.
 */
export function resolveTarget(session: GatewaySession): BatchTarget {
  const { status, credential } = session;
  if (
    status.stage !== "authenticated" ||
    !status.repository ||
    !status.workingCopyPath ||
    !credential
  ) {
    throw new RelayError(
      "NotInitialized",
      "Session is not ready. Authenticate and bind a repository first."
    );
  }
  return {
    repository: status.repository,
    workingCopyPath: status.workingCopyPath,
    credential,
    user: status.user,
  };
}

/**
 * Runs a batch for a registry session. See {@link runBatch}.
 */
export async function executeBatch(
  session: GatewaySession,
  records: readonly unknown[],
  options: ExecuteOptions
): Promise<BatchReport> {
  return runBatch(resolveTarget(session), records, options);
}

/**
 * Runs a batch against an already resolved target.
 */
export async function runBatch(
  target: BatchTarget,
  records: readonly unknown[],
  options: ExecuteOptions
): Promise<BatchReport> {
  const logger = options.logger ?? log.scope("gateway");
  const collaborators = options.collaborators(target);
  const ordered = orderRecords(records);

  const results: CommandResult[] = [];
  let executedCommands = 0;

  for (const record of ordered) {
    if (options.signal?.aborted) {
      results.push(cancelled(record));
      continue;
    }

    const validation = validateCommand(record);
    if (!validation.valid) {
      logger.debug(`Step ${validation.step} rejected: ${validation.message}`);
      results.push({
        step: validation.step,
        command: validation.command,
        success: false,
        message: validation.message,
        data: {},
        error: validation.error,
      });
      continue;
    }

    executedCommands += 1;
    results.push(await runStep(collaborators, validation.command, logger));
  }

  const successfulCommands = results.filter((result) => result.success).length;
  const report: BatchReport = {
    totalCommands: records.length,
    executedCommands,
    successfulCommands,
    failedCommands: results.length - successfulCommands,
    results,
    repositoryInfo: target.repository,
  };

  logger.info(
    `${target.repository.fullName}: ${successfulCommands}/${records.length} step(s) succeeded`
  );
  return report;
}

async function runStep(
  collaborators: Collaborators,
  command: ParsedCommand,
  logger: ScopedLogger
): Promise<CommandResult> {
  const { step, kind } = command;

  let outcome: OperationResult;
  try {
    outcome = await dispatch(collaborators, command.kind, command);
  } catch (error) {
    const cause = getErrorMessage(error);
    logger.warn(`Step ${step} (${kind}) threw: ${cause}`);
    return {
      step,
      command: kind,
      success: false,
      message: `${kind} failed: ${cause}`,
      data: {},
      error: "CollaboratorError",
      cause,
    };
  }

  if (outcome.success) {
    logger.debug(`Step ${step} (${kind}): ${outcome.message}`);
    return {
      step,
      command: kind,
      success: true,
      message: outcome.message,
      data: outcome.data,
    };
  }

  logger.debug(`Step ${step} (${kind}) failed: ${outcome.error}`);
  return {
    step,
    command: kind,
    success: false,
    message: outcome.message,
    data: outcome.data ?? {},
    error: "CollaboratorError",
    cause: outcome.error,
  };
}

function cancelled(record: unknown): CommandResult {
  return {
    step: reportedStep(record),
    command: reportedCommand(record),
    success: false,
    message: "Batch was cancelled before this step ran",
    data: {},
    error: "Cancelled",
  };
}
