import type {
  PublicStatus,
  RepositoryInfo,
  SessionStage,
  TenantKey,
} from "./types";

/**
 * Stable string id for a tenant key.
 *
 * Components are URI-encoded so "a/b" + "c" and "a" + "b/c" never collide.
 * Owner and repository names are case-insensitive on the platform.
 */
export function tenantKeyId(key: TenantKey): string {
  return [
    key.userId,
    key.repoOwner.toLowerCase(),
    key.repoName.toLowerCase(),
  ]
    .map(encodeURIComponent)
    .join("/");
}

export function repoFullName(key: Pick<TenantKey, "repoOwner" | "repoName">) {
  return `${key.repoOwner}/${key.repoName}`;
}

/**
 * Minimal repository info derivable from the key alone.
 */
export function repositoryFromKey(
  key: TenantKey,
  platformUrl = "https://github.com/"
): RepositoryInfo {
  const fullName = repoFullName(key);
  return {
    owner: key.repoOwner,
    name: key.repoName,
    fullName,
    url: new URL(fullName, platformUrl).toString(),
  };
}

export function toPublicStatus(stage: SessionStage): PublicStatus {
  switch (stage) {
    case "authenticated":
      return "authenticated";
    case "denied":
      return "denied";
    case "expired":
      return "expired";
    default:
      return "pending";
  }
}

export function isTerminalStage(stage: SessionStage) {
  return stage === "denied" || stage === "expired";
}
