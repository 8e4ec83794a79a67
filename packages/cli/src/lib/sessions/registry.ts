/**
 * Session Registry
 *
 * Directory of device-flow sessions keyed by tenant (user, repository).
 *
 * - Creation under one key is serialized: concurrent callers share the
 *   same pending creation, and creation on one key never blocks another.
 * - Batches on one key run one at a time through a bounded FIFO lane.
 * - A working copy is acquired on the first bind and released exactly
 *   once, after any batch already queued on the key.
 */

import { randomUUID } from "crypto";
import {
  type BearerCredential,
  type DeviceAuthorizationProvider,
  DeviceFlow,
  type ErrorKind,
  isTerminalStage,
  type ProviderUser,
  RelayError,
  type RepositoryInfo,
  type SessionStatus,
  type TenantKey,
  tenantKeyId,
  toPublicStatus,
} from "@gitrelay/core";
import { getErrorMessage } from "@/lib/errors";
import { log, type ScopedLogger } from "@/lib/log";
import { KeyedSerialQueue } from "./serial-queue";
import type { WorkingCopy } from "./working-copy";

// =============================================================================
// Types
// =============================================================================

type Binding = {
  repository: RepositoryInfo;
  workingCopy: WorkingCopy;
};

type SessionEntry = {
  sessionId: string;
  key: TenantKey;
  keyId: string;
  flow: DeviceFlow;
  createdAt: number;
  lastActiveAt: number;
  user?: ProviderUser;
  userLookup?: Promise<void>;
  binding?: Promise<Binding>;
  bound?: Binding;
  released?: Promise<void>;
};

export type SessionRegistryOptions = {
  provider: DeviceAuthorizationProvider;
  /** Looks up the profile of a freshly authorized token */
  resolveUser?: (token: string) => Promise<ProviderUser | null>;
  /** Authenticated sessions idle this long are swept */
  idleTimeoutMs?: number;
  /** Batches allowed to wait behind a running one, per session */
  maxQueuedBatches?: number;
  now?: () => number;
  logger?: ScopedLogger;
};

export type PollOutcome = {
  status: SessionStatus;
  retryAfterMs?: number;
  error?: { kind: ErrorKind; message: string };
};

/**
 * What a batch sees of its session, captured when the batch starts.
 */
export type BatchSession = {
  status: SessionStatus;
  credential: BearerCredential | null;
};

const DEFAULT_IDLE_TIMEOUT_MS = 60 * 60 * 1000;
const DEFAULT_MAX_QUEUED_BATCHES = 4;

// =============================================================================
// Registry
// =============================================================================

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly sessionIds = new Map<string, string>();
  private readonly creating = new Map<string, Promise<SessionEntry>>();
  private readonly batches: KeyedSerialQueue;
  private readonly provider: DeviceAuthorizationProvider;
  private readonly resolveUser: SessionRegistryOptions["resolveUser"];
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: ScopedLogger;

  constructor(options: SessionRegistryOptions) {
    this.provider = options.provider;
    this.resolveUser = options.resolveUser;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? log.scope("sessions");
    this.batches = new KeyedSerialQueue({
      maxWaiting: options.maxQueuedBatches ?? DEFAULT_MAX_QUEUED_BATCHES,
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Returns the session for `key`, starting a device flow when there is
   * none. Denied and expired sessions are replaced.
   */
  async getOrCreate(key: TenantKey): Promise<SessionStatus> {
    const keyId = tenantKeyId(key);
    const existing = this.sessions.get(keyId);

    if (existing && !isTerminalStage(existing.flow.stage)) {
      existing.lastActiveAt = this.now();
      return this.describe(existing);
    }
    if (existing) {
      this.logger.debug(
        `Replacing ${existing.flow.stage} session ${existing.sessionId}`
      );
      this.forget(existing);
    }

    const pending = this.creating.get(keyId);
    if (pending) {
      return this.describe(await pending);
    }

    const creation = this.create(key, keyId);
    this.creating.set(keyId, creation);
    try {
      return this.describe(await creation);
    } finally {
      if (this.creating.get(keyId) === creation) {
        this.creating.delete(keyId);
      }
    }
  }

  status(key: TenantKey): SessionStatus | null {
    const entry = this.sessions.get(tenantKeyId(key));
    return entry ? this.describe(entry) : null;
  }

  findBySessionId(sessionId: string): SessionStatus | null {
    const keyId = this.sessionIds.get(sessionId);
    const entry = keyId ? this.sessions.get(keyId) : undefined;
    return entry ? this.describe(entry) : null;
  }

  /**
   * One device-flow poll for the session. Resolves the user profile the
   * first time the session is seen authenticated.
   */
  async poll(key: TenantKey): Promise<PollOutcome> {
    const entry = this.require(key);
    const result = await entry.flow.poll();

    if (result.stage === "authenticated") {
      await this.lookupUser(entry);
    }
    if (result.error) {
      this.logger.debug(
        `Poll for ${entry.sessionId}: ${result.error.kind} ${result.error.message}`
      );
    }

    return {
      status: this.describe(entry),
      retryAfterMs: result.retryAfterMs,
      error: result.error,
    };
  }

  /**
   * Binds a repository and working copy to an authenticated session.
   * `acquire` runs only for the first bind; later binds keep the first.
   */
  async bindRepository(
    key: TenantKey,
    repository: RepositoryInfo,
    acquire: () => Promise<WorkingCopy>
  ): Promise<SessionStatus> {
    const entry = this.require(key);
    if (!this.isAuthenticated(entry)) {
      throw new RelayError(
        "NotAuthenticated",
        "Session is not authenticated. Complete the device flow first."
      );
    }

    if (!entry.binding) {
      entry.binding = acquire().then((workingCopy) => ({
        repository,
        workingCopy,
      }));
    }

    const pending = entry.binding;
    try {
      entry.bound = await pending;
    } catch (error) {
      if (entry.binding === pending) {
        entry.binding = undefined;
      }
      throw error;
    }

    if (this.sessions.get(entry.keyId) !== entry) {
      // Evicted while the working copy was being prepared; the eviction
      // releases it once the binding settles
      throw new RelayError("SessionNotFound", "Session was logged out");
    }

    entry.lastActiveAt = this.now();
    return this.describe(entry);
  }

  /**
   * Runs `task` alone on the session's lane. The session view handed to
   * the task is taken when the task starts, after earlier batches.
   */
  runExclusive<T>(
    key: TenantKey,
    task: (session: BatchSession) => Promise<T>
  ): Promise<T> {
    const keyId = tenantKeyId(key);
    return this.batches.run(keyId, async () => {
      const entry = this.sessions.get(keyId);
      if (!entry) {
        throw new RelayError(
          "NotInitialized",
          "No session for this repository. Start the device flow first."
        );
      }
      entry.lastActiveAt = this.now();
      try {
        return await task({
          status: this.describe(entry),
          credential: entry.flow.credentials.get(this.now()),
        });
      } finally {
        entry.lastActiveAt = this.now();
      }
    });
  }

  /**
   * Removes the session and releases its working copy. Idempotent. A device
   * flow still starting on the key is removed once it has started.
   */
  async evict(key: TenantKey): Promise<boolean> {
    const keyId = tenantKeyId(key);
    const starting = this.creating.get(keyId);
    if (starting) {
      await Promise.allSettled([starting]);
    }

    const entry = this.sessions.get(keyId);
    if (!entry) {
      return false;
    }
    this.forget(entry);
    await this.release(entry);
    this.logger.info(`Logged out session ${entry.sessionId}`);
    return true;
  }

  /**
   * Removes unauthenticated sessions past their deadline and
   * authenticated sessions idle past the timeout. Returns how many.
   */
  async sweep(now: number = this.now()): Promise<number> {
    const stale: SessionEntry[] = [];

    for (const entry of this.sessions.values()) {
      const authenticated = this.isAuthenticated(entry, now);
      const lapsed = !authenticated && now >= entry.flow.expiresAt;
      const idle = authenticated && now - entry.lastActiveAt >= this.idleTimeoutMs;
      if (lapsed || idle) {
        stale.push(entry);
      }
    }

    for (const entry of stale) {
      this.forget(entry);
    }
    await Promise.all(stale.map((entry) => this.release(entry)));

    if (stale.length > 0) {
      this.logger.info(`Swept ${stale.length} session(s)`);
    }
    return stale.length;
  }

  /** Evicts every session. */
  async clear(): Promise<void> {
    if (this.creating.size > 0) {
      await Promise.allSettled([...this.creating.values()]);
    }
    const entries = [...this.sessions.values()];
    for (const entry of entries) {
      this.forget(entry);
    }
    await Promise.all(entries.map((entry) => this.release(entry)));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async create(key: TenantKey, keyId: string): Promise<SessionEntry> {
    const flow = new DeviceFlow(this.provider, { now: this.now });
    await flow.start();

    const at = this.now();
    const entry: SessionEntry = {
      sessionId: randomUUID(),
      key: { ...key },
      keyId,
      flow,
      createdAt: at,
      lastActiveAt: at,
    };
    this.sessions.set(keyId, entry);
    this.sessionIds.set(entry.sessionId, keyId);
    this.logger.info(`Started device flow ${entry.sessionId}`);
    return entry;
  }

  private require(key: TenantKey): SessionEntry {
    const entry = this.sessions.get(tenantKeyId(key));
    if (!entry) {
      throw new RelayError("SessionNotFound", "No session for this repository");
    }
    return entry;
  }

  private isAuthenticated(entry: SessionEntry, now: number = this.now()) {
    return (
      entry.flow.stage === "authenticated" && entry.flow.credentials.has(now)
    );
  }

  private lookupUser(entry: SessionEntry): Promise<void> {
    const { resolveUser } = this;
    const credential = entry.flow.credentials.get(this.now());
    if (entry.userLookup || !resolveUser || !credential) {
      return entry.userLookup ?? Promise.resolve();
    }

    entry.userLookup = resolveUser(credential.token).then(
      (user) => {
        entry.user = user ?? undefined;
      },
      (error: unknown) => {
        this.logger.warn(
          `Could not resolve user for ${entry.sessionId}: ${getErrorMessage(error)}`
        );
      }
    );
    return entry.userLookup;
  }

  private forget(entry: SessionEntry) {
    if (this.sessions.get(entry.keyId) === entry) {
      this.sessions.delete(entry.keyId);
    }
    this.sessionIds.delete(entry.sessionId);
  }

  /**
   * Releases the working copy once, after batches queued on the key.
   */
  private release(entry: SessionEntry): Promise<void> {
    entry.released ??= this.batches
      .run(entry.keyId, () => this.releaseNow(entry), { force: true })
      .catch((error: unknown) => {
        this.logger.warn(
          `Failed to release working copy for ${entry.sessionId}: ${getErrorMessage(error)}`
        );
      });
    return entry.released;
  }

  private async releaseNow(entry: SessionEntry) {
    const pending = entry.binding;
    entry.flow.credentials.clear();
    if (!pending) {
      return;
    }

    let binding: Binding;
    try {
      binding = await pending;
    } catch (error) {
      this.logger.debug(
        `No working copy to release for ${entry.sessionId}: ${getErrorMessage(error)}`
      );
      return;
    }
    await binding.workingCopy.release();
  }

  private describe(entry: SessionEntry): SessionStatus {
    const { flow } = entry;
    const grant = flow.authorization;
    const awaitingUser = flow.stage === "pending" || flow.stage === "polling";

    return {
      sessionId: entry.sessionId,
      tenantKey: { ...entry.key },
      stage: flow.stage,
      status: toPublicStatus(flow.stage),
      userCode: awaitingUser ? grant?.userCode : undefined,
      verificationUri: awaitingUser ? grant?.verificationUri : undefined,
      verificationUriComplete: awaitingUser
        ? grant?.verificationUriComplete
        : undefined,
      pollInterval: flow.interval,
      expiresAt: new Date(flow.expiresAt).toISOString(),
      user: entry.user,
      repository: entry.bound?.repository,
      workingCopyPath: entry.bound?.workingCopy.path,
      createdAt: new Date(entry.createdAt).toISOString(),
      lastActiveAt: new Date(entry.lastActiveAt).toISOString(),
    };
  }
}
