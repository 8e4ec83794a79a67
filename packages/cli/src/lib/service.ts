/**
 * Relay Service
 *
 * Application layer shared by the HTTP surface and the CLI. Owns one
 * session registry and turns tenant requests into registry, platform API
 * and gateway calls.
 */

import {
  type BatchReport,
  type Collaborators,
  type DeviceAuthorizationProvider,
  type ProviderUser,
  RelayError,
  type RepositoryInfo,
  repoFullName,
  type SessionStatus,
  type TenantKey,
} from "@gitrelay/core";
import {
  type ApiResult,
  fetchRepository,
  fetchUser,
  repositoryLookupError,
} from "@/lib/api";
import { createDeviceAuthorizationProvider } from "@/lib/auth";
import { type Config, getWorkspaceRoot } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { type BatchTarget, executeBatch } from "@/lib/gateway";
import { log, type ScopedLogger } from "@/lib/log";
import { createCollaborators } from "@/lib/ops";
import {
  type BatchSession,
  type PollOutcome,
  SessionRegistry,
} from "@/lib/sessions/registry";
import { createWorkingCopy, type WorkingCopy } from "@/lib/sessions/working-copy";

// =============================================================================
// Types
// =============================================================================

/** Platform calls the service makes with a session's token. */
export type PlatformApi = {
  fetchUser(token: string): Promise<ApiResult<ProviderUser>>;
  fetchRepository(
    token: string,
    owner: string,
    name: string
  ): Promise<ApiResult<RepositoryInfo>>;
};

export type RelayServiceOptions = {
  config: Config;
  /** Defaults to the RFC 8628 provider built from `config.provider` */
  provider?: DeviceAuthorizationProvider;
  /** Defaults to the REST API at `config.provider.apiUrl` */
  api?: PlatformApi;
  /** Creates an empty directory for a repository's checkout */
  acquireWorkingCopy?: (repository: RepositoryInfo) => Promise<WorkingCopy>;
  /** Builds the collaborators a batch runs against */
  collaborators?: (target: BatchTarget) => Collaborators;
  now?: () => number;
  logger?: ScopedLogger;
};

export type ExecuteRequestOptions = {
  signal?: AbortSignal;
};

// =============================================================================
// Service
// =============================================================================

export class RelayService {
  readonly registry: SessionRegistry;
  private readonly api: PlatformApi;
  private readonly acquireWorkingCopy: (
    repository: RepositoryInfo
  ) => Promise<WorkingCopy>;
  private readonly collaborators: (target: BatchTarget) => Collaborators;
  private readonly logger: ScopedLogger;
  private readonly gatewayLogger: ScopedLogger;

  constructor(options: RelayServiceOptions) {
    const { config } = options;
    this.logger = options.logger ?? log.scope("relay");
    this.gatewayLogger = options.logger ?? log.scope("gateway");
    this.api = options.api ?? restApi(config.provider.apiUrl);
    this.collaborators = options.collaborators ?? createCollaborators;
    this.acquireWorkingCopy =
      options.acquireWorkingCopy ??
      ((repository) =>
        createWorkingCopy(
          getWorkspaceRoot(config.sessions),
          `${repository.owner}-${repository.name}`
        ));

    const provider =
      options.provider ??
      createDeviceAuthorizationProvider({
        issuer: config.provider.url,
        clientId: config.provider.clientId,
        scope: config.provider.scope,
        deviceAuthorizationEndpoint: config.provider.deviceAuthorizationEndpoint,
        tokenEndpoint: config.provider.tokenEndpoint,
      });

    this.registry = new SessionRegistry({
      provider,
      resolveUser: async (token) => {
        const result = await this.api.fetchUser(token);
        if (!result.success) {
          this.logger.warn(`Could not load user profile: ${result.error}`);
          return null;
        }
        return result.data;
      },
      idleTimeoutMs: config.sessions.idleTimeoutMinutes * 60_000,
      maxQueuedBatches: config.sessions.maxQueuedBatches,
      now: options.now,
      logger: options.logger,
    });
  }

  get activeSessions(): number {
    return this.registry.size;
  }

  /** Returns the tenant's session, starting a device flow if needed. */
  startAuth(key: TenantKey): Promise<SessionStatus> {
    return this.registry.getOrCreate(key);
  }

  /**
   * Current status of a session by its handle, after at most one poll.
   */
  async authStatus(sessionId: string): Promise<PollOutcome> {
    const status = this.registry.findBySessionId(sessionId);
    if (!status) {
      throw new RelayError("SessionNotFound", `Unknown session: ${sessionId}`);
    }
    return this.registry.poll(status.tenantKey);
  }

  /**
   * Runs a batch for the tenant. The first batch of an authenticated
   * session clones the repository into a fresh working copy.
   */
  async execute(
    key: TenantKey,
    records: readonly unknown[],
    options: ExecuteRequestOptions = {}
  ): Promise<BatchReport> {
    const status = this.registry.status(key);
    if (!status || status.stage !== "authenticated") {
      throw notAuthenticated();
    }

    return this.registry.runExclusive(key, async (session) => {
      const ready = session.status.workingCopyPath
        ? session
        : await this.bind(key, session);
      return executeBatch(ready, records, {
        collaborators: this.collaborators,
        signal: options.signal,
        logger: this.gatewayLogger,
      });
    });
  }

  /** Ends the tenant's session. Resolves false when there was none. */
  logout(key: TenantKey): Promise<boolean> {
    return this.registry.evict(key);
  }

  sweep(now?: number): Promise<number> {
    return this.registry.sweep(now);
  }

  /** Ends every session and removes their working copies. */
  close(): Promise<void> {
    return this.registry.clear();
  }

  // ===========================================================================
  // Binding
  // ===========================================================================

  private async bind(key: TenantKey, session: BatchSession): Promise<BatchSession> {
    const { credential } = session;
    if (session.status.stage !== "authenticated" || !credential) {
      throw notAuthenticated();
    }

    const repository = await this.lookupRepository(key, credential.token);
    if (repository.permissions && !repository.permissions.write) {
      this.logger.warn(
        `No push access to ${repository.fullName}; write commands will fail`
      );
    }

    const status = await this.registry.bindRepository(key, repository, () =>
      this.prepareWorkingCopy({
        repository,
        credential,
        user: session.status.user,
      })
    );
    return { status, credential };
  }

  private async lookupRepository(key: TenantKey, token: string) {
    const result = await this.api.fetchRepository(
      token,
      key.repoOwner,
      key.repoName
    );
    if (result.success) {
      return result.data;
    }

    throw repositoryLookupError(repoFullName(key), result);
  }

  /**
   * Clones the repository into a new working copy and sets the commit
   * author. The directory is removed again if the clone fails.
   */
  private async prepareWorkingCopy(
    target: Omit<BatchTarget, "workingCopyPath">
  ): Promise<WorkingCopy> {
    const { repository, user } = target;
    const workingCopy = await this.acquireWorkingCopy(repository);
    const { git } = this.collaborators({
      ...target,
      workingCopyPath: workingCopy.path,
    });

    try {
      const cloned = await git.clone();
      if (!cloned.success) {
        throw new RelayError("CollaboratorError", cloned.error);
      }
    } catch (error) {
      await workingCopy.release();
      throw new RelayError(
        "CollaboratorError",
        `Could not clone ${repository.fullName}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    if (user) {
      const configured = await git.configureUser(user);
      if (!configured.success) {
        this.logger.warn(configured.message);
      }
    }

    this.logger.info(`Cloned ${repository.fullName} into ${workingCopy.path}`);
    return workingCopy;
  }
}

function restApi(apiUrl: string): PlatformApi {
  return {
    fetchUser: (token) => fetchUser(apiUrl, token),
    fetchRepository: (token, owner, name) =>
      fetchRepository(apiUrl, token, owner, name),
  };
}

function notAuthenticated() {
  return new RelayError(
    "NotAuthenticated",
    "Session is not authenticated. Start the device flow with /auth/start."
  );
}
