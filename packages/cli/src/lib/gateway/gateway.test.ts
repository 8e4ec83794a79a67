import type { BearerCredential, SessionStatus } from "@gitrelay/core";
import { encodeBase64, RelayError } from "@gitrelay/core";
import { describe, expect, it } from "vitest";
import {
  createMemoryLogger,
  createRecordingCollaborators,
} from "@/test-utils/fakes";
import { type BatchTarget, executeBatch, orderRecords } from "./gateway";

const CREDENTIAL: BearerCredential = { token: "test-token" };

function readyStatus(overrides: Partial<SessionStatus> = {}): SessionStatus {
  return {
    sessionId: "session-1",
    tenantKey: { userId: "u1", repoOwner: "acme", repoName: "site" },
    stage: "authenticated",
    status: "authenticated",
    pollInterval: 5,
    expiresAt: "2026-01-01T00:15:00.000Z",
    repository: {
      owner: "acme",
      name: "site",
      fullName: "acme/site",
      url: "https://github.com/acme/site",
    },
    workingCopyPath: "/tmp/work",
    createdAt: "2026-01-01T00:00:00.000Z",
    lastActiveAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function setup(scripted: Parameters<typeof createRecordingCollaborators>[0] = {}) {
  const recording = createRecordingCollaborators(scripted);
  const { logger } = createMemoryLogger();
  const targets: BatchTarget[] = [];
  const run = (
    records: unknown[],
    options: { status?: SessionStatus; signal?: AbortSignal } = {}
  ) =>
    executeBatch(
      { status: options.status ?? readyStatus(), credential: CREDENTIAL },
      records,
      {
        collaborators: (target) => {
          targets.push(target);
          return recording.collaborators;
        },
        signal: options.signal,
        logger,
      }
    );
  return { ...recording, targets, run };
}

describe("executeBatch", () => {
  describe("preconditions", () => {
    it.each([
      ["a pending session", readyStatus({ stage: "pending", status: "pending" })],
      ["no repository binding", readyStatus({ repository: undefined })],
      ["no working copy", readyStatus({ workingCopyPath: undefined })],
    ])("fails with NotInitialized for %s", async (_label, status) => {
      const { run, calls, targets } = setup();

      const error = await run([{ step: 1, command: "pull" }], { status }).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(RelayError);
      expect(error instanceof RelayError && error.kind).toBe("NotInitialized");
      expect(targets).toHaveLength(0);
      expect(calls).toHaveLength(0);
    });

    it("fails with NotInitialized without a live credential", async () => {
      const recording = createRecordingCollaborators();

      await expect(
        executeBatch(
          { status: readyStatus(), credential: null },
          [{ step: 1, command: "pull" }],
          { collaborators: () => recording.collaborators }
        )
      ).rejects.toMatchObject({ kind: "NotInitialized" });
      expect(recording.calls).toHaveLength(0);
    });

    it("binds collaborators to the session's working copy", async () => {
      const { run, targets } = setup();

      await run([]);

      expect(targets).toEqual([
        {
          repository: readyStatus().repository,
          workingCopyPath: "/tmp/work",
          credential: CREDENTIAL,
          user: undefined,
        },
      ]);
    });
  });

  describe("ordering", () => {
    it("runs steps in ascending order", async () => {
      const { run, calls } = setup();

      const report = await run([
        { step: 3, command: "push" },
        { step: 1, command: "create.file", path: "a.txt", content: encodeBase64("hi") },
        { step: 2, command: "commit", content: encodeBase64("Add a.txt") },
      ]);

      expect(calls.map((call) => call.op)).toEqual([
        "files.create",
        "git.commit",
        "git.push",
      ]);
      expect(calls[1]?.args).toEqual(["Add a.txt"]);
      expect(report.results.map((result) => result.step)).toEqual([1, 2, 3]);
    });

    it("keeps submission order for equal steps", async () => {
      const { run, calls } = setup();

      await run([
        { step: 1, command: "push" },
        { step: 0, command: "clone" },
        { step: 1, command: "pull" },
      ]);

      expect(calls.map((call) => call.op)).toEqual([
        "git.clone",
        "git.push",
        "git.pull",
      ]);
    });

    it("reports records without a numeric step last, as step -1", async () => {
      const { run } = setup();

      const report = await run([
        { step: "first", command: "pull" },
        { step: 5, command: "push" },
      ]);

      expect(report.results).toEqual([
        {
          step: 5,
          command: "push",
          success: true,
          message: "git.push ok",
          data: {},
        },
        {
          step: -1,
          command: "pull",
          success: false,
          message: "step must be a non-negative integer",
          data: {},
          error: "InvalidParameter",
        },
      ]);
    });
  });

  describe("partial failure", () => {
    it("continues past invalid steps", async () => {
      const { run, calls } = setup();

      const report = await run([
        { step: 1, command: "create.file", path: "a.txt", content: encodeBase64("a") },
        { step: 2, command: "rebase" },
        { step: 3, command: "read.file" },
        { step: 4, command: "commit", content: encodeBase64("Add a.txt") },
      ]);

      expect(calls.map((call) => call.op)).toEqual(["files.create", "git.commit"]);
      expect(report.results.map((result) => result.success)).toEqual([
        true,
        false,
        false,
        true,
      ]);
      expect(report.results[1]).toMatchObject({
        step: 2,
        command: "rebase",
        error: "UnknownCommand",
      });
      expect(report.results[2]).toMatchObject({
        step: 3,
        command: "read.file",
        error: "MissingParameter",
        message: "read.file requires path",
      });
      expect(report).toMatchObject({
        totalCommands: 4,
        executedCommands: 2,
        successfulCommands: 2,
        failedCommands: 2,
      });
    });

    it("reports a collaborator failure with its error as the cause", async () => {
      const { run } = setup({
        "git.push": {
          success: false,
          message: "Push failed",
          error: "remote rejected",
        },
      });

      const report = await run([
        { step: 1, command: "push" },
        { step: 2, command: "pull" },
      ]);

      expect(report.results[0]).toEqual({
        step: 1,
        command: "push",
        success: false,
        message: "Push failed",
        data: {},
        error: "CollaboratorError",
        cause: "remote rejected",
      });
      expect(report.results[1]?.success).toBe(true);
      expect(report.executedCommands).toBe(2);
    });

    it("converts a thrown error into a failed step", async () => {
      const { run } = setup({ "files.delete": new Error("disk full") });

      const report = await run([
        { step: 1, command: "delete.file", path: "old.txt" },
        { step: 2, command: "push" },
      ]);

      expect(report.results[0]).toEqual({
        step: 1,
        command: "delete.file",
        success: false,
        message: "delete.file failed: disk full",
        data: {},
        error: "CollaboratorError",
        cause: "disk full",
      });
      expect(report.results[1]?.success).toBe(true);
    });

    it("keeps collaborator data verbatim", async () => {
      const { run } = setup({
        "git.commit": {
          success: true,
          message: "Committed abc1234",
          data: { commitHash: "abc1234def", shortHash: "abc1234" },
        },
      });

      const report = await run([
        { step: 1, command: "commit", content: encodeBase64("msg") },
      ]);

      expect(report.results[0]).toEqual({
        step: 1,
        command: "commit",
        success: true,
        message: "Committed abc1234",
        data: { commitHash: "abc1234def", shortHash: "abc1234" },
      });
    });
  });

  describe("decoded parameters", () => {
    it("appends when the path carries the append marker", async () => {
      const { run, calls } = setup();

      await run([
        {
          step: 1,
          command: "modify.file",
          path: "notes.txt (append)",
          content: encodeBase64("more"),
        },
      ]);

      expect(calls[0]?.op).toBe("files.modify");
      const [path, bytes, mode] = calls[0]?.args ?? [];
      expect(path).toBe("notes.txt");
      expect(mode).toBe("append");
      expect(Buffer.from(bytes instanceof Uint8Array ? bytes : []).toString()).toBe(
        "more"
      );
    });

    it("searches by extension and by content", async () => {
      const { run, calls } = setup();

      await run([
        { step: 1, command: "search.file", content: encodeBase64("ext:.py") },
        { step: 2, command: "search.file", content: encodeBase64("content:TODO") },
      ]);

      expect(calls.map((call) => call.args)).toEqual([
        [".py", "extension"],
        ["TODO", "content"],
      ]);
    });

    it("takes the branch name from the path", async () => {
      const { run, calls } = setup();

      await run([
        { step: 1, command: "create.branch", path: "feature/login" },
        { step: 2, command: "switch.branch", path: "feature/login" },
      ]);

      expect(calls).toEqual([
        { op: "git.createBranch", args: ["feature/login"] },
        { op: "git.switchBranch", args: ["feature/login"] },
      ]);
    });
  });

  describe("cancellation", () => {
    it("reports every step cancelled when already aborted", async () => {
      const { run, calls } = setup();
      const controller = new AbortController();
      controller.abort();

      const report = await run(
        [
          { step: 1, command: "pull" },
          { step: 2, command: "push" },
        ],
        { signal: controller.signal }
      );

      expect(calls).toHaveLength(0);
      expect(report.results.map((result) => result.success || result.error)).toEqual([
        "Cancelled",
        "Cancelled",
      ]);
      expect(report.executedCommands).toBe(0);
    });

    it("starts no step after the signal fires", async () => {
      const recording = createRecordingCollaborators();
      const controller = new AbortController();
      const { collaborators } = recording;
      collaborators.git.pull = async () => {
        controller.abort();
        return { success: true, message: "Pulled", data: {} };
      };

      const report = await executeBatch(
        { status: readyStatus(), credential: CREDENTIAL },
        [
          { step: 1, command: "pull" },
          { step: 2, command: "push" },
        ],
        {
          collaborators: () => collaborators,
          signal: controller.signal,
          logger: createMemoryLogger().logger,
        }
      );

      expect(report.results[0]?.success).toBe(true);
      expect(report.results[1]).toMatchObject({
        step: 2,
        command: "push",
        success: false,
        error: "Cancelled",
      });
      expect(recording.calls).toHaveLength(0);
    });
  });

  it("reports an empty batch", async () => {
    const { run } = setup();

    const report = await run([]);

    expect(report).toEqual({
      totalCommands: 0,
      executedCommands: 0,
      successfulCommands: 0,
      failedCommands: 0,
      results: [],
      repositoryInfo: readyStatus().repository,
    });
  });
});

describe("orderRecords", () => {
  it("moves non-numeric steps after numbered ones", () => {
    const late = { step: null, command: "pull" };
    const first = { step: 0, command: "clone" };
    expect(orderRecords([late, first])).toEqual([first, late]);
  });
});
