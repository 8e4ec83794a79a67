/**
 * Platform API - Repository metadata
 */

import { RelayError, type RepositoryInfo } from "@gitrelay/core";
import { z } from "zod";
import { type ApiResult, getJson } from "./client";

const repositoryResponseSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  private: z.boolean(),
  default_branch: z.string().optional(),
  owner: z.object({ login: z.string() }),
  permissions: z
    .object({
      admin: z.boolean(),
      push: z.boolean(),
      pull: z.boolean(),
    })
    .optional(),
});

/**
 * Fetches repository metadata as seen by the token
 * (GET /repos/{owner}/{repo}). Permissions are only present for
 * authenticated requests.
 */
export async function fetchRepository(
  apiUrl: string,
  token: string,
  owner: string,
  name: string
): Promise<ApiResult<RepositoryInfo>> {
  const path = `repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`;
  const result = await getJson(apiUrl, path, token, repositoryResponseSchema);
  if (!result.success) {
    return result;
  }

  const repo = result.data;
  return {
    success: true,
    data: {
      owner: repo.owner.login,
      name: repo.name,
      fullName: repo.full_name,
      url: repo.html_url,
      private: repo.private,
      defaultBranch: repo.default_branch,
      permissions: repo.permissions && {
        read: repo.permissions.pull,
        write: repo.permissions.push,
        admin: repo.permissions.admin,
      },
    },
  };
}

/**
 * Maps a failed repository lookup to the error a caller reports.
 */
export function repositoryLookupError(
  fullName: string,
  failure: { error: string; status?: number }
): RelayError {
  if (failure.status === 401) {
    return new RelayError(
      "NotAuthenticated",
      `Token was rejected while loading ${fullName}: ${failure.error}`
    );
  }
  if (failure.status === 403 || failure.status === 404) {
    return new RelayError(
      "NotInitialized",
      `Repository ${fullName} was not found or is not accessible`
    );
  }
  return new RelayError(
    "ProviderUnavailable",
    `Could not load ${fullName}: ${failure.error}`
  );
}
