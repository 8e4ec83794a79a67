/**
 * Contracts of the file and version-control collaborators a batch runs
 * against. The gateway treats every result as opaque.
 */

import type { ModifyMode, SearchMode } from "../command/types";
import type { ProviderUser } from "../session/types";

export type OperationResult<TData extends object = Record<string, unknown>> =
  | { success: true; message: string; data: TData }
  | { success: false; message: string; data?: TData; error: string };

export type SearchMatch = {
  /** POSIX path relative to the working copy */
  path: string;
  name: string;
  size: number;
};

export type FileOps = {
  create(path: string, bytes: Uint8Array): Promise<OperationResult>;
  read(path: string): Promise<OperationResult>;
  modify(
    path: string,
    bytes: Uint8Array,
    mode: ModifyMode
  ): Promise<OperationResult>;
  delete(path: string): Promise<OperationResult>;
  search(term: string, mode: SearchMode): Promise<OperationResult>;
};

export type GitOps = {
  pull(): Promise<OperationResult>;
  /** data.commitHash is null when there was nothing to commit */
  commit(message: string): Promise<OperationResult>;
  /** data.upstreamCreated is true on the first push of a branch */
  push(): Promise<OperationResult>;
  createBranch(name: string): Promise<OperationResult>;
  switchBranch(name: string): Promise<OperationResult>;
  /** data.localPath is the working copy */
  clone(): Promise<OperationResult>;
  status(): Promise<OperationResult>;
  configureUser(user: ProviderUser): Promise<OperationResult>;
};

export type Collaborators = {
  files: FileOps;
  git: GitOps;
};
