/**
 * File collaborator scoped to one working copy.
 *
 * Paths are POSIX-style and relative to the working copy. Anything that
 * resolves outside it, or into the repository's .git directory, is refused,
 * both before and after symbolic links are followed. Writes and deletes
 * never act on a symbolic link itself.
 */

import {
  appendFile,
  lstat,
  mkdir,
  readdir,
  readFile,
  realpath,
  rm,
  stat,
  writeFile,
} from "fs/promises";
import { basename, dirname, extname, isAbsolute, join, relative, resolve } from "path";
import {
  encodeBase64,
  type FileOps,
  GIT_DIRNAME,
  type OperationResult,
  type SearchMatch,
  type SearchMode,
  toPosixPath,
} from "@gitrelay/core";
import { errorCode, getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

type ResolvedPath =
  | { success: true; absolute: string; relativePath: string }
  | { success: false; result: OperationResult };

/**
 * Maps a caller path onto the working copy, or explains why it cannot.
 */
export function resolveInside(root: string, path: string): ResolvedPath {
  const absolute = resolve(root, path);
  const relativePath = toPosixPath(relative(root, absolute));

  if (
    relativePath === "" ||
    relativePath === ".." ||
    relativePath.startsWith("../") ||
    isAbsolute(relativePath)
  ) {
    return {
      success: false,
      result: refused(path, "Path is outside the working copy"),
    };
  }
  if (relativePath.split("/")[0] === GIT_DIRNAME) {
    return {
      success: false,
      result: refused(path, "Path is inside the .git directory"),
    };
  }
  return { success: true, absolute, relativePath };
}

/**
 * {@link resolveInside}, then the same checks against the path with symbolic
 * links followed as far as it exists on disk.
 */
export async function locateInside(
  root: string,
  path: string,
  options: { allowLink?: boolean } = {}
): Promise<ResolvedPath> {
  const target = resolveInside(root, path);
  if (!target.success) return target;

  try {
    const realRoot = await realpath(root);
    const existing = await realAncestor(target.absolute);
    if (existing === null) {
      return {
        success: false,
        result: refused(path, "Path goes through a broken symbolic link"),
      };
    }

    const realRelative = toPosixPath(relative(realRoot, existing));
    if (
      realRelative === ".." ||
      realRelative.startsWith("../") ||
      isAbsolute(realRelative)
    ) {
      return {
        success: false,
        result: refused(path, "Path is outside the working copy"),
      };
    }
    if (realRelative.split("/")[0] === GIT_DIRNAME) {
      return {
        success: false,
        result: refused(path, "Path is inside the .git directory"),
      };
    }

    if (!options.allowLink && (await isSymbolicLink(target.absolute))) {
      return {
        success: false,
        result: refused(path, "Path is a symbolic link"),
      };
    }
  } catch (error) {
    return { success: false, result: ioFailure("resolve", path, error) };
  }
  return target;
}

/**
 * Real path of the deepest part of `path` that exists, or null when that
 * part is a dangling symbolic link.
 */
async function realAncestor(path: string): Promise<string | null> {
  let current = path;
  for (;;) {
    try {
      return await realpath(current);
    } catch (error) {
      const code = errorCode(error);
      const parent = dirname(current);
      if ((code !== "ENOENT" && code !== "ENOTDIR") || parent === current) {
        throw error;
      }
      if (await isSymbolicLink(current)) return null;
      current = parent;
    }
  }
}

async function isSymbolicLink(path: string) {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") return false;
    throw error;
  }
}

export function createFileOps(root: string): FileOps {
  return {
    async create(path, bytes) {
      const target = await locateInside(root, path);
      if (!target.success) return target.result;

      try {
        await mkdir(dirname(target.absolute), { recursive: true });
        await writeFile(target.absolute, bytes);
      } catch (error) {
        return ioFailure("create", target.relativePath, error);
      }
      return ok(`Created ${target.relativePath}`, {
        path: target.relativePath,
        size: bytes.length,
      });
    },

    async read(path) {
      const target = await locateInside(root, path, { allowLink: true });
      if (!target.success) return target.result;

      let contents: Buffer;
      try {
        contents = await readFile(target.absolute);
      } catch (error) {
        return ioFailure("read", target.relativePath, error);
      }
      return ok(`Read ${target.relativePath}`, {
        path: target.relativePath,
        content: encodeBase64(contents),
        size: contents.length,
      });
    },

    async modify(path, bytes, mode) {
      const target = await locateInside(root, path);
      if (!target.success) return target.result;

      try {
        const info = await stat(target.absolute);
        if (!info.isFile()) {
          return refused(target.relativePath, "Not a file");
        }
        if (mode === "append") {
          await appendFile(target.absolute, bytes);
        } else {
          await writeFile(target.absolute, bytes);
        }
        const { size } = await stat(target.absolute);
        return ok(
          `${mode === "append" ? "Appended to" : "Replaced"} ${target.relativePath}`,
          { path: target.relativePath, mode, size }
        );
      } catch (error) {
        return ioFailure("modify", target.relativePath, error);
      }
    },

    async delete(path) {
      const target = await locateInside(root, path);
      if (!target.success) return target.result;

      try {
        const info = await stat(target.absolute);
        await rm(target.absolute, { recursive: info.isDirectory() });
        return ok(`Deleted ${target.relativePath}`, {
          path: target.relativePath,
          directory: info.isDirectory(),
        });
      } catch (error) {
        return ioFailure("delete", target.relativePath, error);
      }
    },

    async search(term, mode) {
      const matches: SearchMatch[] = [];
      try {
        const matchesFile = fileMatcher(term, mode);
        for await (const file of walk(root)) {
          if (await matchesFile(file)) {
            const { size } = await stat(file);
            matches.push({
              path: toPosixPath(relative(root, file)),
              name: basename(file),
              size,
            });
          }
        }
      } catch (error) {
        return {
          success: false,
          message: `Search failed: ${getErrorMessage(error)}`,
          error: getErrorMessage(error),
        };
      }

      matches.sort((a, b) => a.path.localeCompare(b.path));
      return ok(`Found ${matches.length} match(es)`, {
        term,
        mode,
        matches,
        count: matches.length,
      });
    },
  };
}

// =============================================================================
// Search
// =============================================================================

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name === GIT_DIRNAME) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(full);
    } else if (entry.isFile()) {
      yield full;
    }
  }
}

type FileMatcher = (file: string) => Promise<boolean>;

function fileMatcher(term: string, mode: SearchMode): FileMatcher {
  const needle = term.toLowerCase();
  switch (mode) {
    case "name": {
      const pattern = namePattern(term);
      return async (file) => pattern.test(basename(file));
    }
    case "extension": {
      const wanted = needle.startsWith(".") ? needle.slice(1) : needle;
      return async (file) =>
        wanted !== "" && extname(file).toLowerCase().slice(1) === wanted;
    }
    case "content":
      return async (file) => {
        let text: string;
        try {
          text = await readFile(file, "utf8");
        } catch (error) {
          log.debug(`Skipping unreadable ${file}: ${getErrorMessage(error)}`);
          return false;
        }
        return text.toLowerCase().includes(needle);
      };
  }
}

/**
 * Case-insensitive shell-style pattern (`*`, `?`, `[abc]`, `[!abc]`) matched
 * anywhere in a file name. A term without wildcards matches as a substring.
 */
export function namePattern(term: string): RegExp {
  let source = "";
  for (let i = 0; i < term.length; i++) {
    const char = term.charAt(i);
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      let end = i + 1;
      if (term.charAt(end) === "!") end++;
      if (term.charAt(end) === "]") end++;
      const close = term.indexOf("]", end);
      if (close === -1) {
        source += "\\[";
        continue;
      }
      let body = term.slice(i + 1, close);
      const negated = body.startsWith("!");
      if (negated) body = body.slice(1);
      source += `[${negated ? "^" : ""}${body.replace(/[\\\]^]/g, "\\$&")}]`;
      i = close;
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(source, "i");
}

// =============================================================================
// Results
// =============================================================================

function ok(message: string, data: Record<string, unknown>): OperationResult {
  return { success: true, message, data };
}

function refused(path: string, reason: string): OperationResult {
  return { success: false, message: `${reason}: ${path}`, error: reason };
}

function ioFailure(action: string, path: string, error: unknown): OperationResult {
  const code = errorCode(error);
  if (code === "ENOENT") {
    return { success: false, message: `File not found: ${path}`, error: "File not found" };
  }
  if (code === "EISDIR") {
    return { success: false, message: `${path} is a directory`, error: "Is a directory" };
  }
  return {
    success: false,
    message: `Could not ${action} ${path}: ${getErrorMessage(error)}`,
    error: getErrorMessage(error),
  };
}
