/**
 * RFC 8628 - OAuth 2.0 Device Authorization Grant
 *
 * Provider adapter for the device flow state machine, built on openid-client.
 * Each call issues exactly one request; pacing between token requests is
 * decided by the state machine.
 *
 * GitHub answers token requests that are still pending with HTTP 200 and an
 * `error` member. Those responses are rewritten to 400 before openid-client
 * sees them so they surface as ResponseBodyError like any other OAuth error.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8628
 * @see https://github.com/panva/openid-client
 */

import {
  DEVICE_CODE_GRANT_TYPE,
  type DeviceAuthorization,
  type DeviceAuthorizationProvider,
  type ExchangeOutcome,
  GITHUB_DEFAULTS,
  RelayError,
} from "@gitrelay/core";
import * as client from "openid-client";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import { buildUrl, isLoopbackHttp } from "@/lib/url";

// =============================================================================
// Configuration
// =============================================================================

export type DeviceProviderOptions = {
  /** The authorization server's base URL (e.g., https://github.com/) */
  issuer: string;
  /** The client identifier */
  clientId: string;
  /** Optional scope for the access request */
  scope?: string;
  /** Custom device authorization endpoint (optional) */
  deviceAuthorizationEndpoint?: string;
  /** Custom token endpoint (optional) */
  tokenEndpoint?: string;
};

/** OAuth error codes that mean the application itself was rejected. */
const CLIENT_REJECTED_ERRORS = new Set([
  "invalid_client",
  "unauthorized_client",
  "incorrect_client_credentials",
  "device_flow_disabled",
]);

function createConfiguration(options: DeviceProviderOptions) {
  const deviceAuthEndpoint = buildUrl(
    options.issuer,
    options.deviceAuthorizationEndpoint ??
      GITHUB_DEFAULTS.deviceAuthorizationEndpoint
  );
  const tokenEndpoint = buildUrl(
    options.issuer,
    options.tokenEndpoint ?? GITHUB_DEFAULTS.tokenEndpoint
  );

  const serverMetadata: client.ServerMetadata = {
    issuer: options.issuer.replace(/\/$/, ""), // OpenID spec expects no trailing slash
    device_authorization_endpoint: deviceAuthEndpoint,
    token_endpoint: tokenEndpoint,
  };

  const config = new client.Configuration(
    serverMetadata,
    options.clientId,
    undefined,
    client.None()
  );
  config[client.customFetch] = fetchWithErrorStatus;

  // Allow HTTP for localhost
  if (isLoopbackHttp(options.issuer)) {
    client.allowInsecureRequests(config);
  }

  return { config, deviceAuthEndpoint, tokenEndpoint };
}

// =============================================================================
// Provider
// =============================================================================

/**
 * Creates the provider port used by every session's device flow.
 */
export function createDeviceAuthorizationProvider(
  options: DeviceProviderOptions
): DeviceAuthorizationProvider {
  if (!options.clientId) {
    throw new RelayError(
      "InvalidClient",
      "No OAuth client id configured. Set GITHUB_CLIENT_ID or provider.clientId."
    );
  }

  const { config, deviceAuthEndpoint, tokenEndpoint } =
    createConfiguration(options);

  return {
    requestDeviceCode: () =>
      requestDeviceCode(config, deviceAuthEndpoint, options.scope),
    exchangeDeviceCode: (deviceCode) =>
      exchangeDeviceCode(config, tokenEndpoint, deviceCode),
  };
}

/**
 * Request a device code from the authorization server.
 * @see https://datatracker.ietf.org/doc/html/rfc8628#section-3.1
 */
async function requestDeviceCode(
  config: client.Configuration,
  endpoint: string,
  scope: string | undefined
): Promise<DeviceAuthorization> {
  const params: Record<string, string> = {};
  if (scope) {
    params.scope = scope;
  }

  log.debug(`Device code request to: ${endpoint}`);

  let response: client.DeviceAuthorizationResponse;
  try {
    response = await client.initiateDeviceAuthorization(config, params);
  } catch (err) {
    throw toStartError(err, endpoint);
  }

  log.debug(
    `Device code issued, expires in ${response.expires_in}s, interval ${response.interval ?? "default"}`
  );

  return {
    deviceCode: response.device_code,
    userCode: response.user_code,
    verificationUri: response.verification_uri,
    verificationUriComplete: response.verification_uri_complete,
    expiresIn: response.expires_in,
    interval: response.interval,
  };
}

/**
 * One token request for a device code.
 * @see https://datatracker.ietf.org/doc/html/rfc8628#section-3.4
 */
async function exchangeDeviceCode(
  config: client.Configuration,
  endpoint: string,
  deviceCode: string
): Promise<ExchangeOutcome> {
  try {
    log.debug(`Token request to: ${endpoint}`);
    const token = await client.genericGrantRequest(
      config,
      DEVICE_CODE_GRANT_TYPE,
      { device_code: deviceCode }
    );
    return {
      type: "token",
      token: {
        accessToken: token.access_token,
        expiresIn: token.expires_in,
        scope: token.scope,
      },
    };
  } catch (err) {
    return toExchangeOutcome(err, endpoint);
  }
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Gives OAuth error bodies delivered with HTTP 200 an error status.
 */
async function fetchWithErrorStatus(
  url: string,
  options: client.CustomFetchOptions
): Promise<Response> {
  const response = await fetch(url, options);
  if (response.status !== 200) {
    return response;
  }

  const text = await response.clone().text();
  if (!hasOAuthError(text)) {
    return response;
  }

  return new Response(text, {
    status: 400,
    headers: response.headers,
  });
}

function hasOAuthError(text: string): boolean {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return false;
  }
  return (
    typeof payload === "object" &&
    payload !== null &&
    "error" in payload &&
    typeof payload.error === "string"
  );
}

// =============================================================================
// Error Handling
// =============================================================================

function toStartError(err: unknown, endpoint: string): RelayError {
  // OAuth errors have useful messages - use them
  if (err instanceof client.ResponseBodyError) {
    const message = err.error_description || err.error || "Unknown OAuth error";
    return new RelayError(
      CLIENT_REJECTED_ERRORS.has(err.error)
        ? "InvalidClient"
        : "ProviderUnavailable",
      message,
      { cause: err }
    );
  }

  const status = httpStatusOf(err);
  if (status !== undefined) {
    return new RelayError(
      status === 401 || status === 403 ? "InvalidClient" : "ProviderUnavailable",
      formatHttpError(status, endpoint),
      { cause: err }
    );
  }

  // Connection failures, generic errors
  const url = new URL(endpoint);
  log.debug(`Device code request failed: ${getErrorMessage(err)}`);
  return new RelayError(
    "ProviderUnavailable",
    `Cannot connect to ${url.host}. Is the server reachable?`,
    { cause: err }
  );
}

function toExchangeOutcome(err: unknown, endpoint: string): ExchangeOutcome {
  if (err instanceof client.ResponseBodyError) {
    switch (err.error) {
      case "authorization_pending":
        return { type: "pending" };
      case "slow_down":
        return { type: "slow_down" };
      case "access_denied":
        return { type: "denied" };
      case "expired_token":
        return { type: "expired" };
      default:
        return {
          type: "failed",
          kind: CLIENT_REJECTED_ERRORS.has(err.error)
            ? "InvalidClient"
            : "ProviderUnavailable",
          message: err.error_description || err.error,
        };
    }
  }

  const status = httpStatusOf(err);
  if (status !== undefined) {
    return {
      type: "failed",
      kind: "ProviderUnavailable",
      message: formatHttpError(status, endpoint),
    };
  }

  log.debug(`Token request failed: ${getErrorMessage(err)}`);
  return {
    type: "failed",
    kind: "ProviderUnavailable",
    message: "Lost connection to the authorization server.",
  };
}

function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof client.ClientError && err.cause instanceof Response) {
    return err.cause.status;
  }
  return;
}

function formatHttpError(status: number, endpoint: string): string {
  switch (status) {
    case 401:
    case 403:
      return `Not authorized (${status}): ${endpoint}`;
    case 404:
      return `Endpoint not found: ${endpoint}`;
    case 500:
      return `Server error (500): ${endpoint}`;
    case 502:
    case 503:
      return `Server unavailable (${status}): ${endpoint}`;
    default:
      return `HTTP ${status}: ${endpoint}`;
  }
}
