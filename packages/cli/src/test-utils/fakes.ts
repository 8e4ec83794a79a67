import type {
  Collaborators,
  DeviceAuthorization,
  DeviceAuthorizationProvider,
  ExchangeOutcome,
  OperationResult,
} from "@gitrelay/core";
import type { ScopedLogger } from "@/lib/log";
import type { WorkingCopy } from "@/lib/sessions/working-copy";

export const TEST_AUTHORIZATION: DeviceAuthorization = {
  deviceCode: "test-device-code",
  userCode: "ABCD-1234",
  verificationUri: "https://github.com/login/device",
  expiresIn: 900,
  interval: 0,
};

/**
 * Scripted provider. Token requests answer from `outcomes` in order and
 * report pending once the script runs out.
 */
export function createFakeProvider(
  authorization: Partial<DeviceAuthorization> = {}
) {
  const outcomes: ExchangeOutcome[] = [];
  const calls = { requestDeviceCode: 0, exchangeDeviceCode: 0 };

  const provider: DeviceAuthorizationProvider = {
    requestDeviceCode: async () => {
      calls.requestDeviceCode += 1;
      return { ...TEST_AUTHORIZATION, ...authorization };
    },
    exchangeDeviceCode: async () => {
      calls.exchangeDeviceCode += 1;
      return outcomes.shift() ?? { type: "pending" };
    },
  };

  return {
    provider,
    calls,
    grant(accessToken = "test-token", expiresIn?: number) {
      outcomes.push({ type: "token", token: { accessToken, expiresIn } });
    },
    enqueue(...next: ExchangeOutcome[]) {
      outcomes.push(...next);
    },
  };
}

export function createClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

export function createDeferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Working copy that only counts releases. */
export function createFakeWorkingCopy(path = "/tmp/gitrelay-test") {
  const state = { releases: 0 };
  const workingCopy: WorkingCopy = {
    path,
    release: async () => {
      state.releases += 1;
    },
  };
  return { workingCopy, state };
}

type Call = { op: string; args: unknown[] };

/**
 * Collaborators that record every call and succeed unless an outcome is
 * scripted for the operation.
 */
export function createRecordingCollaborators(
  scripted: Partial<Record<string, OperationResult | Error>> = {}
) {
  const calls: Call[] = [];

  const respond = async (op: string, args: unknown[]) => {
    calls.push({ op, args });
    const outcome = scripted[op];
    if (outcome instanceof Error) throw outcome;
    return outcome ?? { success: true as const, message: `${op} ok`, data: {} };
  };

  const collaborators: Collaborators = {
    files: {
      create: (...args) => respond("files.create", args),
      read: (...args) => respond("files.read", args),
      modify: (...args) => respond("files.modify", args),
      delete: (...args) => respond("files.delete", args),
      search: (...args) => respond("files.search", args),
    },
    git: {
      pull: (...args) => respond("git.pull", args),
      commit: (...args) => respond("git.commit", args),
      push: (...args) => respond("git.push", args),
      createBranch: (...args) => respond("git.createBranch", args),
      switchBranch: (...args) => respond("git.switchBranch", args),
      clone: (...args) => respond("git.clone", args),
      status: (...args) => respond("git.status", args),
      configureUser: (...args) => respond("git.configureUser", args),
    },
  };

  return { collaborators, calls };
}

/** Logger that keeps lines in memory instead of printing them. */
export function createMemoryLogger() {
  const lines: string[] = [];
  const logger: ScopedLogger = {
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
  return { logger, lines };
}
