/**
 * Shared constants for gitrelay.
 */

/** Every command kind a batch may contain, in documentation order. */
export const COMMAND_KINDS = [
  "create.file",
  "read.file",
  "modify.file",
  "delete.file",
  "search.file",
  "pull",
  "commit",
  "push",
  "create.branch",
  "switch.branch",
  "clone",
] as const;

/** Marker inside a modify.file path that selects append mode. */
export const APPEND_MARKER = "(append)";

/** Directory skipped when walking a working copy. */
export const GIT_DIRNAME = ".git";

/** RFC 8628 §3.5: seconds added to the interval on every slow_down. */
export const SLOW_DOWN_INCREMENT_SECONDS = 5;

/** RFC 8628 §3.5: interval used when the provider does not send one. */
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/** RFC 8628 grant type for the token request. */
export const DEVICE_CODE_GRANT_TYPE =
  "urn:ietf:params:oauth:grant-type:device_code";

/**
 * HTTP endpoint paths served by the relay (relative to its base URL).
 */
export const API_ENDPOINTS = {
  root: "/",
  health: "/health",
  webhook: "/webhook",
  /** Auth endpoints */
  auth: {
    /** Start a device flow for a tenant (POST) */
    start: "/auth/start",
    /** Poll status of a device flow (GET) */
    status: (sessionId: string) => `/auth/status/${sessionId}`,
    /** Evict a tenant's session (POST) */
    logout: "/auth/logout",
  },
  /** Command endpoints */
  commands: {
    /** Execute a batch (POST) */
    execute: "/commands/execute",
  },
} as const;

/**
 * Defaults for the hosted platform (GitHub).
 */
export const GITHUB_DEFAULTS = {
  url: "https://github.com/",
  apiUrl: "https://api.github.com/",
  deviceAuthorizationEndpoint: "/login/device/code",
  tokenEndpoint: "/login/oauth/access_token",
  scope: "repo user",
} as const;
