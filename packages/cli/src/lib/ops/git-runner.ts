/**
 * Runs the git executable with captured output.
 */

import { spawn } from "child_process";

export type GitRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/** Runs one git invocation in the runner's working copy. */
export type GitRunner = (args: readonly string[]) => Promise<GitRunResult>;

export type GitRunnerOptions = {
  cwd: string;
  /** Bearer token sent as an Authorization header on every request */
  token?: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Environment that injects the credential as a per-invocation
 * `http.extraHeader`. Nothing is written to the repository config.
 */
export function credentialEnv(token: string): Record<string, string> {
  const basic = Buffer.from(`x-access-token:${token}`).toString("base64");
  return {
    GIT_CONFIG_COUNT: "1",
    GIT_CONFIG_KEY_0: "http.extraHeader",
    GIT_CONFIG_VALUE_0: `Authorization: Basic ${basic}`,
  };
}

export function createGitRunner(options: GitRunnerOptions): GitRunner {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    GIT_PAGER: "cat",
    GIT_TERMINAL_PROMPT: "0",
    ...(options.token ? credentialEnv(options.token) : {}),
  };

  return (args) =>
    new Promise<GitRunResult>((resolve, reject) => {
      const child = spawn("git", [...args], {
        cwd: options.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        env,
      });
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });

      child.once("error", (error) => {
        clearTimeout(timeout);
        reject(error);
      });

      child.once("close", (code) => {
        clearTimeout(timeout);
        resolve({
          exitCode: code ?? -1,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          timedOut,
        });
      });
    });
}

/** First non-empty line of git's error output, for messages. */
export function describeFailure(result: GitRunResult): string {
  if (result.timedOut) {
    return "git timed out";
  }
  const text = result.stderr || result.stdout;
  const line = text
    .split("\n")
    .map((entry) => entry.trim())
    .find((entry) => entry.length > 0);
  return line ?? `git exited with code ${result.exitCode}`;
}
