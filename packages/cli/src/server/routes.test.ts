import { encodeBase64 } from "@gitrelay/core";
import { beforeEach, describe, expect, it } from "vitest";
import { type Config, defaultConfig } from "@/lib/config";
import { RelayService } from "@/lib/service";
import {
  createClock,
  createFakeProvider,
  createFakeWorkingCopy,
  createMemoryLogger,
  createRecordingCollaborators,
} from "@/test-utils/fakes";
import { handleRequest, type RelayRequest, statusForKind } from "./routes";
import { signPayload } from "./webhook";

const TENANT = { repo_owner: "acme", repo_name: "site", user_id: "u1" };

type Scripted = Parameters<typeof createRecordingCollaborators>[0];

function setup(scripted: Scripted = {}) {
  const config: Config = defaultConfig();
  const clock = createClock(Date.parse("2026-03-01T12:00:00.000Z"));
  const fake = createFakeProvider();
  const recording = createRecordingCollaborators(scripted);
  const { logger, lines } = createMemoryLogger();

  const service = new RelayService({
    config,
    provider: fake.provider,
    api: {
      fetchUser: async () => ({
        success: true,
        data: { id: 7, login: "octo", name: "Octo Cat", email: null },
      }),
      fetchRepository: async () => ({
        success: true,
        data: {
          owner: "acme",
          name: "site",
          fullName: "acme/site",
          url: "https://github.com/acme/site",
        },
      }),
    },
    acquireWorkingCopy: async () => createFakeWorkingCopy("/tmp/acme-site").workingCopy,
    collaborators: () => recording.collaborators,
    now: clock.now,
    logger,
  });

  const send = (
    method: string,
    url: string,
    body?: unknown,
    headers: RelayRequest["headers"] = {}
  ) =>
    handleRequest(
      {
        method,
        url,
        headers,
        body: typeof body === "string" ? body : body === undefined ? "" : JSON.stringify(body),
      },
      { service, config, version: "1.2.3", now: clock.now, logger }
    );

  async function start() {
    const { body } = await send("POST", "/auth/start", TENANT);
    return typeof body === "object" && body !== null && "session_id" in body
      ? String(body.session_id)
      : "";
  }

  async function authenticate() {
    const sessionId = await start();
    fake.grant();
    await send("GET", `/auth/status/${sessionId}`);
    return sessionId;
  }

  return { config, clock, fake, send, start, authenticate, lines };
}

let ctx: ReturnType<typeof setup>;

describe("handleRequest", () => {
  beforeEach(() => {
    ctx = setup();
  });

  describe("GET /", () => {
    it("describes the service", async () => {
      const response = await ctx.send("GET", "/");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        name: "gitrelay",
        version: "1.2.3",
        endpoints: {
          auth_start: "http://localhost:8000/auth/start",
          auth_status: "http://localhost:8000/auth/status/{session_id}",
          webhook: "http://localhost:8000/webhook",
          health: "http://localhost:8000/health",
        },
      });
    });

    it("uses the configured base URL", async () => {
      ctx.config.server.baseUrl = "https://relay.example.com/";

      const response = await ctx.send("GET", "/");

      expect(response.body).toMatchObject({
        endpoints: { execute: "https://relay.example.com/commands/execute" },
      });
    });
  });

  it("GET /health reports the session count", async () => {
    await ctx.send("POST", "/auth/start", TENANT);

    expect(await ctx.send("GET", "/health")).toEqual({
      status: 200,
      body: {
        status: "healthy",
        active_sessions: 1,
        timestamp: "2026-03-01T12:00:00.000Z",
      },
    });
  });

  describe("POST /auth/start", () => {
    it("returns the user code and verification URI", async () => {
      const response = await ctx.send("POST", "/auth/start", TENANT);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        status: "pending",
        user_code: "ABCD-1234",
        verification_uri: "https://github.com/login/device",
        expires_in: 900,
        interval: 0,
      });
    });

    it("accepts a numeric user id", async () => {
      const response = await ctx.send("POST", "/auth/start", { ...TENANT, user_id: 42 });
      expect(response.status).toBe(200);
    });

    it("returns the same session on a repeated start", async () => {
      const first = await ctx.send("POST", "/auth/start", TENANT);
      const second = await ctx.send("POST", "/auth/start", TENANT);

      expect(second.body).toMatchObject({
        session_id: expect.any(String),
      });
      expect(second.body).toEqual(first.body);
      expect(ctx.fake.calls.requestDeviceCode).toBe(1);
    });

    it("rejects a missing field", async () => {
      expect(
        await ctx.send("POST", "/auth/start", { repo_owner: "acme", user_id: "u1" })
      ).toEqual({
        status: 400,
        body: {
          success: false,
          error: "MissingParameter",
          message: "repo_name is required",
        },
      });
    });

    it("rejects a blank field", async () => {
      const response = await ctx.send("POST", "/auth/start", { ...TENANT, repo_owner: " " });
      expect(response.body).toMatchObject({ error: "MissingParameter" });
    });

    it("rejects a field of the wrong type", async () => {
      const response = await ctx.send("POST", "/auth/start", { ...TENANT, repo_name: 5 });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: "InvalidParameter",
        message: "repo_name must be a string",
      });
    });

    it("rejects a repository name that is not a single path segment", async () => {
      expect(
        await ctx.send("POST", "/auth/start", { ...TENANT, repo_name: "../etc" })
      ).toEqual({
        status: 400,
        body: {
          success: false,
          error: "InvalidParameter",
          message: "repo_name may only contain letters, digits, '-', '_' and '.'",
        },
      });
      expect(ctx.fake.calls.requestDeviceCode).toBe(0);
    });

    it("accepts a numeric user id", async () => {
      const response = await ctx.send("POST", "/auth/start", { ...TENANT, user_id: 7 });

      expect(response.status).toBe(200);
    });

    it("rejects a body that is not JSON", async () => {
      const response = await ctx.send("POST", "/auth/start", "{not json");

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: "InvalidParameter" });
    });
  });

  describe("GET /auth/status/:id", () => {
    it("reports an authenticated session with its user", async () => {
      const sessionId = await ctx.start();
      ctx.fake.grant();

      const response = await ctx.send("GET", `/auth/status/${sessionId}`);

      expect(response).toEqual({
        status: 200,
        body: {
          success: true,
          status: "authenticated",
          user: { id: 7, login: "octo", name: "Octo Cat", email: null },
          repository: undefined,
          retry_after: undefined,
          error: undefined,
          message: undefined,
        },
      });
    });

    it("reports a denied session", async () => {
      const sessionId = await ctx.start();
      ctx.fake.enqueue({ type: "denied" });

      const response = await ctx.send("GET", `/auth/status/${sessionId}`);

      expect(response.body).toMatchObject({
        status: "denied",
        error: "AuthorizationDenied",
      });
    });

    it("returns 404 for an unknown session", async () => {
      const response = await ctx.send("GET", "/auth/status/missing");

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ error: "SessionNotFound" });
    });
  });

  describe("POST /commands/execute", () => {
    it("returns 401 without an authenticated session", async () => {
      const response = await ctx.send("POST", "/commands/execute", {
        ...TENANT,
        commands: [{ step: 1, command: "pull" }],
      });

      expect(response.status).toBe(401);
      expect(response.body).toMatchObject({ success: false, error: "NotAuthenticated" });
    });

    it("requires commands to be an array", async () => {
      await ctx.authenticate();

      const response = await ctx.send("POST", "/commands/execute", {
        ...TENANT,
        commands: "pull",
      });

      expect(response).toEqual({
        status: 400,
        body: {
          success: false,
          error: "InvalidParameter",
          message: "commands must be an array",
        },
      });
    });

    it("returns a snake_case report", async () => {
      ctx = setup({
        "git.commit": {
          success: true,
          message: "Created commit abc12345",
          data: { commitHash: "abc12345ffff", shortHash: "abc12345" },
        },
      });
      await ctx.authenticate();

      const response = await ctx.send("POST", "/commands/execute", {
        ...TENANT,
        commands: [
          { step: 2, command: "rebase" },
          { step: 1, command: "commit", content: encodeBase64("Update") },
        ],
      });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        all_succeeded: false,
        total_commands: 2,
        executed_commands: 1,
        successful_commands: 1,
        failed_commands: 1,
        results: [
          {
            step: 1,
            command: "commit",
            success: true,
            message: "Created commit abc12345",
            data: { commit_hash: "abc12345ffff", short_hash: "abc12345" },
          },
          {
            step: 2,
            command: "rebase",
            success: false,
            message:
              'Unknown command "rebase". Supported: create.file, read.file, modify.file, delete.file, search.file, pull, commit, push, create.branch, switch.branch, clone',
            data: {},
            error: "UnknownCommand",
            cause: undefined,
          },
        ],
        repository_info: {
          owner: "acme",
          name: "site",
          full_name: "acme/site",
          url: "https://github.com/acme/site",
          private: undefined,
          default_branch: undefined,
          permissions: undefined,
        },
      });
    });
  });

  describe("POST /auth/logout", () => {
    it("evicts the session", async () => {
      await ctx.authenticate();

      expect((await ctx.send("POST", "/auth/logout", TENANT)).body).toEqual({
        success: true,
        evicted: true,
        message: "Logged out",
      });
      expect((await ctx.send("POST", "/auth/logout", TENANT)).body).toMatchObject({
        evicted: false,
      });
    });
  });

  describe("POST /webhook", () => {
    const payload = JSON.stringify({
      action: "created",
      installation: { id: 99, account: { login: "acme" } },
      repositories: [{ full_name: "acme/site" }],
    });

    it("refuses deliveries when no secret is configured", async () => {
      const response = await ctx.send("POST", "/webhook", payload, {
        "x-hub-signature-256": signPayload("test-secret", payload),
      });
      expect(response.status).toBe(403);
    });

    it("accepts a correctly signed delivery", async () => {
      ctx.config.server.webhookSecret = "test-secret";

      const response = await ctx.send("POST", "/webhook", payload, {
        "x-hub-signature-256": signPayload("test-secret", payload),
        "x-github-event": "installation",
      });

      expect(response).toEqual({
        status: 200,
        body: { success: true, message: "Installation created" },
      });
      expect(ctx.lines).toContain(
        "info Installation 99 created for acme (1 repositories)"
      );
    });

    it("refuses a wrong signature", async () => {
      ctx.config.server.webhookSecret = "test-secret";

      const response = await ctx.send("POST", "/webhook", payload, {
        "x-hub-signature-256": signPayload("other-secret", payload),
      });

      expect(response).toEqual({
        status: 403,
        body: { success: false, error: "Invalid signature" },
      });
    });
  });

  describe("routing", () => {
    it("returns 404 for unknown paths", async () => {
      expect((await ctx.send("GET", "/nope")).status).toBe(404);
    });

    it("returns 405 for the wrong method", async () => {
      expect((await ctx.send("GET", "/auth/start")).status).toBe(405);
    });
  });
});

describe("statusForKind", () => {
  it("maps fatal kinds to HTTP statuses", () => {
    expect(statusForKind("NotAuthenticated")).toBe(401);
    expect(statusForKind("NotInitialized")).toBe(409);
    expect(statusForKind("ConcurrentBatchRejected")).toBe(429);
    expect(statusForKind("ProviderUnavailable")).toBe(502);
    expect(statusForKind("InvalidClient")).toBe(502);
  });
});
