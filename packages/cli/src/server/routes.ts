/**
 * HTTP routes
 *
 * Transport-free request handling: the server hands in method, path,
 * headers and the raw body, and writes back the status and JSON body.
 *
 * - POST /auth/start        start (or resume) a tenant's device flow
 * - GET  /auth/status/:id   poll a session once
 * - POST /commands/execute  run a batch
 * - POST /auth/logout       end a tenant's session
 * - GET  /health            liveness and session count
 * - GET  /                  service description
 * - POST /webhook           signed platform events
 */

import {
  API_ENDPOINTS,
  type ErrorKind,
  executeRequestSchema,
  isRelayError,
  type TenantKey,
  type TenantRequest,
  tenantRequestSchema,
} from "@gitrelay/core";
import { z } from "zod";
import type { Config } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { log, type ScopedLogger } from "@/lib/log";
import type { RelayService } from "@/lib/service";
import { describeDelivery, verifySignature } from "./webhook";
import { wireAuthStart, wireReport, wireRepository, wireUser } from "./wire";

// =============================================================================
// Types
// =============================================================================

export type RelayRequest = {
  method: string;
  /** Path and query, e.g. "/auth/status/abc" */
  url: string;
  /** Lower-cased header names */
  headers: Record<string, string | undefined>;
  body: string;
};

export type RelayResponse = {
  status: number;
  body: unknown;
};

export type RouteContext = {
  service: RelayService;
  config: Config;
  version: string;
  now?: () => number;
  logger?: ScopedLogger;
};

type Route = {
  method: "GET" | "POST";
  pattern: RegExp;
  handle: (
    request: RelayRequest,
    params: string[],
    context: Required<RouteContext>
  ) => Promise<RelayResponse>;
};

// =============================================================================
// Routes
// =============================================================================

const ROUTES: Route[] = [
  {
    method: "GET",
    pattern: /^\/$/,
    handle: async (_request, _params, { config, version }) => {
      const base = config.server.baseUrl ?? `http://localhost:${config.server.port}`;
      return ok({
        name: "gitrelay",
        description: "Device-flow authenticated command relay for git repositories",
        version,
        endpoints: {
          auth_start: endpointUrl(base, API_ENDPOINTS.auth.start),
          auth_status: endpointUrl(base, API_ENDPOINTS.auth.status("{session_id}")),
          auth_logout: endpointUrl(base, API_ENDPOINTS.auth.logout),
          execute: endpointUrl(base, API_ENDPOINTS.commands.execute),
          webhook: endpointUrl(base, API_ENDPOINTS.webhook),
          health: endpointUrl(base, API_ENDPOINTS.health),
        },
      });
    },
  },
  {
    method: "GET",
    pattern: /^\/health$/,
    handle: async (_request, _params, { service, now }) =>
      ok({
        status: "healthy",
        active_sessions: service.activeSessions,
        timestamp: new Date(now()).toISOString(),
      }),
  },
  {
    method: "POST",
    pattern: /^\/auth\/start$/,
    handle: async (request, _params, { service, now }) => {
      const key = tenantKeyOf(parseBody(request, tenantRequestSchema));
      const status = await service.startAuth(key);
      return ok(wireAuthStart(status, now()));
    },
  },
  {
    method: "GET",
    pattern: /^\/auth\/status\/([^/]+)$/,
    handle: async (_request, [sessionId = ""], { service }) => {
      const outcome = await service.authStatus(decodeURIComponent(sessionId));
      const { status } = outcome;
      return ok({
        success: true,
        status: status.status,
        user: status.user && wireUser(status.user),
        repository: status.repository && wireRepository(status.repository),
        retry_after: toSeconds(outcome.retryAfterMs),
        error: outcome.error?.kind,
        message: outcome.error?.message,
      });
    },
  },
  {
    method: "POST",
    pattern: /^\/commands\/execute$/,
    handle: async (request, _params, { service }) => {
      const body = parseBody(request, executeRequestSchema);
      const report = await service.execute(tenantKeyOf(body), body.commands);
      return ok(wireReport(report));
    },
  },
  {
    method: "POST",
    pattern: /^\/auth\/logout$/,
    handle: async (request, _params, { service }) => {
      const key = tenantKeyOf(parseBody(request, tenantRequestSchema));
      const evicted = await service.logout(key);
      return ok({
        success: true,
        evicted,
        message: evicted ? "Logged out" : "No session to log out",
      });
    },
  },
  {
    method: "POST",
    pattern: /^\/webhook$/,
    handle: async (request, _params, { config, logger }) => {
      const signature = request.headers["x-hub-signature-256"];
      if (!verifySignature(config.server.webhookSecret, request.body, signature)) {
        logger.warn("Rejected webhook with an invalid signature");
        return { status: 403, body: { success: false, error: "Invalid signature" } };
      }
      const message = describeDelivery(
        { event: request.headers["x-github-event"], payload: parseJson(request.body) },
        logger
      );
      return ok({ success: true, message });
    },
  },
];

// =============================================================================
// Dispatch
// =============================================================================

export async function handleRequest(
  request: RelayRequest,
  context: RouteContext
): Promise<RelayResponse> {
  const resolved: Required<RouteContext> = {
    ...context,
    now: context.now ?? Date.now,
    logger: context.logger ?? log.scope("http"),
  };
  const path = new URL(request.url, "http://localhost").pathname;

  let allowed = false;
  for (const route of ROUTES) {
    const match = route.pattern.exec(path);
    if (!match) continue;
    if (route.method !== request.method) {
      allowed = true;
      continue;
    }
    try {
      return await route.handle(request, match.slice(1), resolved);
    } catch (error) {
      return errorResponse(error, resolved.logger);
    }
  }

  if (allowed) {
    return failure(405, "MethodNotAllowed", `${request.method} is not allowed on ${path}`);
  }
  return failure(404, "NotFound", `No route for ${request.method} ${path}`);
}

// =============================================================================
// Errors
// =============================================================================

class BadRequest extends Error {
  readonly kind: "MissingParameter" | "InvalidParameter";

  constructor(kind: "MissingParameter" | "InvalidParameter", message: string) {
    super(message);
    this.name = "BadRequest";
    this.kind = kind;
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ProviderUnavailable: 502,
  InvalidClient: 502,
  AuthorizationDenied: 403,
  AuthorizationExpired: 410,
  NotAuthenticated: 401,
  NotInitialized: 409,
  UnknownCommand: 400,
  MissingParameter: 400,
  InvalidParameter: 400,
  DecodeError: 400,
  CollaboratorError: 500,
  ConcurrentBatchRejected: 429,
  SessionNotFound: 404,
  Cancelled: 503,
};

/** Appends an endpoint path to the base URL, keeping the base's own path. */
function endpointUrl(base: string, path: string) {
  return `${base.replace(/\/+$/, "")}${path}`;
}

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

function errorResponse(error: unknown, logger: ScopedLogger): RelayResponse {
  if (error instanceof BadRequest) {
    return failure(400, error.kind, error.message);
  }
  if (isRelayError(error)) {
    const status = statusForKind(error.kind);
    if (status >= 500) {
      logger.error(`${error.kind}: ${error.message}`);
    }
    return failure(status, error.kind, error.message);
  }
  logger.error(`Unhandled error: ${getErrorMessage(error)}`);
  return failure(500, "InternalError", "Internal server error");
}

// =============================================================================
// Helpers
// =============================================================================

function ok(body: unknown): RelayResponse {
  return { status: 200, body };
}

function failure(status: number, error: string, message: string): RelayResponse {
  return { status, body: { success: false, error, message } };
}

function parseJson(body: string): unknown {
  if (!body.trim()) {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new BadRequest(
      "InvalidParameter",
      `Request body must be JSON: ${getErrorMessage(error)}`
    );
  }
}

function parseBody<T extends z.ZodTypeAny>(request: RelayRequest, schema: T): z.infer<T> {
  const parsed = schema.safeParse(parseJson(request.body));
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const missing =
    issue !== undefined &&
    ((issue.code === "invalid_type" && issue.received === "undefined") ||
      issue.code === "too_small");
  throw new BadRequest(
    missing ? "MissingParameter" : "InvalidParameter",
    issue?.message ?? "Invalid request body"
  );
}

function tenantKeyOf(body: TenantRequest): TenantKey {
  return {
    userId: body.user_id,
    repoOwner: body.repo_owner,
    repoName: body.repo_name,
  };
}

function toSeconds(ms: number | undefined) {
  return ms === undefined ? undefined : Math.ceil(ms / 1000);
}
