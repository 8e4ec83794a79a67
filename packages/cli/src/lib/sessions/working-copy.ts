import { mkdir, mkdtemp, rm } from "fs/promises";
import { join } from "path";
import { log } from "@/lib/log";

/**
 * A directory holding one checkout, released exactly once.
 */
export type WorkingCopy = {
  readonly path: string;
  release(): Promise<void>;
};

/**
 * Creates an empty temporary directory under `root`.
 */
export async function createWorkingCopy(
  root: string,
  label: string
): Promise<WorkingCopy> {
  await mkdir(root, { recursive: true });
  const path = await mkdtemp(join(root, `${toDirectoryName(label)}-`));
  log.debug(`Created working copy ${path}`);

  let released: Promise<void> | null = null;
  return {
    path,
    release() {
      released ??= rm(path, { recursive: true, force: true }).then(() => {
        log.debug(`Removed working copy ${path}`);
      });
      return released;
    },
  };
}

/**
 * Wraps a directory the caller owns; releasing it leaves it in place.
 */
export function existingWorkingCopy(path: string): WorkingCopy {
  return {
    path,
    release: () => Promise.resolve(),
  };
}

function toDirectoryName(label: string) {
  const name = label.toLowerCase().replace(/[^a-z0-9._-]+/g, "-");
  return name.replace(/^[-.]+|-+$/g, "") || "repo";
}
