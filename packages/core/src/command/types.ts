import type { COMMAND_KINDS } from "../constants";
import type { StepErrorKind } from "../errors";
import type { RepositoryInfo } from "../session/types";

export type CommandKind = (typeof COMMAND_KINDS)[number];

export type SearchMode = "name" | "extension" | "content";

export type ModifyMode = "replace" | "append";

/**
 * One command as submitted on the wire. Content is base64.
 */
export type CommandRecord = {
  step: number;
  command: CommandKind;
  path?: string;
  content?: string;
};

/**
 * A validated command with its parameters decoded. One variant per kind.
 */
export type ParsedCommand =
  | { kind: "create.file"; step: number; path: string; bytes: Uint8Array }
  | { kind: "read.file"; step: number; path: string }
  | {
      kind: "modify.file";
      step: number;
      path: string;
      mode: ModifyMode;
      bytes: Uint8Array;
    }
  | { kind: "delete.file"; step: number; path: string }
  | { kind: "search.file"; step: number; term: string; mode: SearchMode }
  | { kind: "pull"; step: number }
  | { kind: "commit"; step: number; message: string }
  | { kind: "push"; step: number }
  | { kind: "create.branch"; step: number; branch: string }
  | { kind: "switch.branch"; step: number; branch: string }
  | { kind: "clone"; step: number };

/** Parsed command variants keyed by kind. */
export type ParsedCommandMap = {
  [C in ParsedCommand as C["kind"]]: C;
};

export type ParsedCommandOf<K extends CommandKind> = ParsedCommandMap[K];

export type CommandValidationResult =
  | { valid: true; command: ParsedCommand }
  | {
      valid: false;
      step: number;
      command: string;
      error: StepErrorKind;
      message: string;
    };

export type CommandResult =
  | {
      step: number;
      command: string;
      success: true;
      message: string;
      data: Record<string, unknown>;
    }
  | {
      step: number;
      command: string;
      success: false;
      message: string;
      data: Record<string, unknown>;
      error: StepErrorKind;
      /** Error text reported by a collaborator, when one failed */
      cause?: string;
    };

export type BatchReport = {
  totalCommands: number;
  /** Steps that passed validation and reached a collaborator */
  executedCommands: number;
  successfulCommands: number;
  failedCommands: number;
  results: CommandResult[];
  repositoryInfo: RepositoryInfo;
};
