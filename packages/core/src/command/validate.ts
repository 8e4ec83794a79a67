import { COMMAND_KINDS } from "../constants";
import type { StepErrorKind } from "../errors";
import { encodeUtf8 } from "../utils/encoding";
import {
  decodeContentBytes,
  decodeContentText,
  parseModifyContent,
  parseSearchTerm,
  stripAppendMarker,
} from "./grammar";
import type {
  CommandKind,
  CommandValidationResult,
  ParsedCommand,
} from "./types";

const COMMAND_KIND_SET = new Set<string>(COMMAND_KINDS);

export function isCommandKind(value: unknown): value is CommandKind {
  return typeof value === "string" && COMMAND_KIND_SET.has(value);
}

/** Step value used for ordering and reporting; -1 when unusable. */
export function reportedStep(record: unknown): number {
  if (!isRecord(record)) return -1;
  const { step } = record;
  return typeof step === "number" && Number.isFinite(step) ? step : -1;
}

/** Command name used for reporting; "unknown" when unusable. */
export function reportedCommand(record: unknown): string {
  if (!isRecord(record)) return "unknown";
  const kind = record.command ?? record.commandKind;
  return typeof kind === "string" ? kind : "unknown";
}

/** True when the record carries a finite numeric step. */
export function hasNumericStep(record: unknown): boolean {
  if (!isRecord(record)) return false;
  return typeof record.step === "number" && Number.isFinite(record.step);
}

/**
 * Validates one raw command record and decodes its parameters.
 *
 * Levels, in order: structure (object, step, kind, field types), required
 * fields for the kind, then content shape (prefix grammar).
 */
export function validateCommand(record: unknown): CommandValidationResult {
  if (!isRecord(record)) {
    return invalid(-1, "unknown", "InvalidParameter", "Command must be an object");
  }

  const rawKind = record.command ?? record.commandKind;
  const commandName = reportedCommand(record);
  const step = reportedStep(record);

  if (
    typeof record.step !== "number" ||
    !Number.isInteger(record.step) ||
    record.step < 0
  ) {
    return invalid(
      step,
      commandName,
      "InvalidParameter",
      "step must be a non-negative integer"
    );
  }

  if (!isCommandKind(rawKind)) {
    return invalid(
      step,
      commandName,
      "UnknownCommand",
      `Unknown command "${commandName}". Supported: ${COMMAND_KINDS.join(", ")}`
    );
  }

  const path = optionalString(record.path);
  const content = optionalString(record.content);
  if (path === false || content === false) {
    return invalid(
      step,
      rawKind,
      "InvalidParameter",
      `${path === false ? "path" : "content"} must be a string`
    );
  }

  const parsed = parseFields(rawKind, step, path, content);
  if ("error" in parsed) {
    return invalid(step, rawKind, parsed.error, parsed.message);
  }
  return { valid: true, command: parsed };
}

// =============================================================================
// Per-kind fields
// =============================================================================

type FieldError = { error: StepErrorKind; message: string };

function parseFields(
  kind: CommandKind,
  step: number,
  path: string | undefined,
  content: string | undefined
): ParsedCommand | FieldError {
  switch (kind) {
    case "create.file":
      if (!path) return missing(kind, "path");
      return { kind, step, path, bytes: decodeContentBytes(content) };

    case "read.file":
    case "delete.file":
      if (!path) return missing(kind, "path");
      return { kind, step, path };

    case "modify.file": {
      if (!path) return missing(kind, "path");
      if (!content) return missing(kind, "content");
      const marker = stripAppendMarker(path);
      if (!marker.path) return missing(kind, "path");
      const body = parseModifyContent(decodeContentText(content).text);
      return {
        kind,
        step,
        path: marker.path,
        mode: marker.append ? "append" : body.mode,
        bytes: encodeUtf8(body.text),
      };
    }

    case "search.file": {
      if (!content) return missing(kind, "content");
      const { mode, term } = parseSearchTerm(decodeContentText(content).text);
      if (!term) {
        return { error: "MissingParameter", message: "Search term is empty" };
      }
      return { kind, step, mode, term };
    }

    case "commit": {
      if (!content) return missing(kind, "content");
      const message = decodeContentText(content).text;
      if (!message.trim()) {
        return { error: "MissingParameter", message: "Commit message is empty" };
      }
      return { kind, step, message };
    }

    case "create.branch":
    case "switch.branch": {
      const branch =
        path?.trim() ||
        (content ? decodeContentText(content).text.trim() : "");
      if (!branch) return missing(kind, "path or content");
      return { kind, step, branch };
    }

    case "pull":
    case "push":
    case "clone":
      return { kind, step };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * undefined for absent/null/blank, false for a non-string value.
 */
function optionalString(value: unknown): string | undefined | false {
  if (value === undefined || value === null) return;
  if (typeof value !== "string") return false;
  return value.trim() ? value : undefined;
}

function missing(kind: CommandKind, field: string): FieldError {
  return {
    error: "MissingParameter",
    message: `${kind} requires ${field}`,
  };
}

function invalid(
  step: number,
  command: string,
  error: StepErrorKind,
  message: string
): CommandValidationResult {
  return { valid: false, step, command, error, message };
}
