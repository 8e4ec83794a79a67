/**
 * Identifies one session: a user acting on one repository.
 */
export type TenantKey = {
  userId: string;
  repoOwner: string;
  repoName: string;
};

export type SessionStage =
  | "init"
  | "pending"
  | "polling"
  | "authenticated"
  | "denied"
  | "expired";

/** Stage as reported to HTTP callers. */
export type PublicStatus = "pending" | "authenticated" | "denied" | "expired";

export type RepositoryPermissions = {
  read: boolean;
  write: boolean;
  admin: boolean;
};

export type RepositoryInfo = {
  owner: string;
  name: string;
  /** owner/name */
  fullName: string;
  url: string;
  private?: boolean;
  defaultBranch?: string;
  permissions?: RepositoryPermissions;
};

/** Profile of the authenticated platform user. */
export type ProviderUser = {
  id: number;
  login: string;
  name: string;
  email: string | null;
};

/**
 * Public view of a session. Never carries the credential or device code.
 */
export type SessionStatus = {
  sessionId: string;
  tenantKey: TenantKey;
  stage: SessionStage;
  status: PublicStatus;
  /** Present only while the user still has to enter it */
  userCode?: string;
  verificationUri?: string;
  verificationUriComplete?: string;
  /** Seconds between polls the provider currently allows */
  pollInterval: number;
  /** ISO timestamp of the authorization deadline */
  expiresAt: string;
  user?: ProviderUser;
  repository?: RepositoryInfo;
  workingCopyPath?: string;
  createdAt: string;
  lastActiveAt: string;
};
