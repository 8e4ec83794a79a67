/**
 * JSON shapes of the HTTP surface. Field names are snake_case on the wire.
 */

import type {
  BatchReport,
  CommandResult,
  ProviderUser,
  RepositoryInfo,
  SessionStatus,
} from "@gitrelay/core";

/** Converts object keys from camelCase to snake_case, recursively. */
export function snakeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(snakeKeys);
  }
  if (typeof value === "object" && value !== null && !(value instanceof Uint8Array)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [toSnakeCase(key), snakeKeys(entry)])
    );
  }
  return value;
}

export function toSnakeCase(key: string) {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function wireUser(user: ProviderUser) {
  return { id: user.id, login: user.login, name: user.name, email: user.email };
}

export function wireRepository(repository: RepositoryInfo) {
  return {
    owner: repository.owner,
    name: repository.name,
    full_name: repository.fullName,
    url: repository.url,
    private: repository.private,
    default_branch: repository.defaultBranch,
    permissions: repository.permissions,
  };
}

/**
 * Fields of `POST /auth/start`. `expires_in` counts the seconds left.
 */
export function wireAuthStart(status: SessionStatus, now: number) {
  const remainingMs = Date.parse(status.expiresAt) - now;
  return {
    success: true,
    session_id: status.sessionId,
    status: status.status,
    user_code: status.userCode,
    verification_uri: status.verificationUri,
    verification_uri_complete: status.verificationUriComplete,
    expires_in: Math.max(0, Math.floor(remainingMs / 1000)),
    interval: status.pollInterval,
  };
}

function wireResult(result: CommandResult) {
  const base = {
    step: result.step,
    command: result.command,
    success: result.success,
    message: result.message,
    data: snakeKeys(result.data),
  };
  if (result.success) {
    return base;
  }
  return { ...base, error: result.error, cause: result.cause };
}

export function wireReport(report: BatchReport) {
  return {
    success: true,
    all_succeeded: report.failedCommands === 0,
    total_commands: report.totalCommands,
    executed_commands: report.executedCommands,
    successful_commands: report.successfulCommands,
    failed_commands: report.failedCommands,
    results: report.results.map(wireResult),
    repository_info: wireRepository(report.repositoryInfo),
  };
}
