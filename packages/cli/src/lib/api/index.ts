/**
 * Platform API Client
 *
 * REST calls made with a session's bearer credential:
 *
 * - GET user - the authenticated user
 * - GET repos/{owner}/{repo} - repository metadata and permissions
 *
 * The device flow endpoints live in `../auth/rfc-8628.ts`.
 */

export { type ApiResult, getJson } from "./client";
export { fetchRepository, repositoryLookupError } from "./repository";
export { fetchUser } from "./user";
