/**
 * Content grammar for command parameters.
 *
 * Content arrives base64-encoded. Once decoded, a leading prefix selects a
 * sub-mode for the commands that have one:
 *
 * - search.file: `ext:` / `extension:`, `content:`, `name:` (default)
 * - modify.file: `append:`, `replace:` (default)
 *
 * A value that does not decode is used literally.
 */

import { APPEND_MARKER } from "../constants";
import { decodeBase64, decodeBase64Text, encodeUtf8 } from "../utils/encoding";
import type { ModifyMode, SearchMode } from "./types";

const SEARCH_PREFIXES: ReadonlyArray<[prefix: string, mode: SearchMode]> = [
  ["name:", "name"],
  ["extension:", "extension"],
  ["ext:", "extension"],
  ["content:", "content"],
];

const MODIFY_PREFIXES: ReadonlyArray<[prefix: string, mode: ModifyMode]> = [
  ["append:", "append"],
  ["replace:", "replace"],
];

export type DecodedText = {
  text: string;
  /** False when the value was not base64 and was taken literally */
  decoded: boolean;
};

export function decodeContentText(content: string): DecodedText {
  const text = decodeBase64Text(content);
  return text === null
    ? { text: content, decoded: false }
    : { text, decoded: true };
}

/**
 * Raw bytes of a content value, keeping binary payloads intact.
 */
export function decodeContentBytes(content: string | undefined): Uint8Array {
  if (!content) return new Uint8Array(0);
  return decodeBase64(content) ?? encodeUtf8(content);
}

export function parseSearchTerm(text: string): {
  mode: SearchMode;
  term: string;
} {
  for (const [prefix, mode] of SEARCH_PREFIXES) {
    if (text.startsWith(prefix)) {
      return { mode, term: text.slice(prefix.length).trim() };
    }
  }
  return { mode: "name", term: text.trim() };
}

export function parseModifyContent(text: string): {
  mode: ModifyMode;
  text: string;
} {
  for (const [prefix, mode] of MODIFY_PREFIXES) {
    if (text.startsWith(prefix)) {
      return { mode, text: text.slice(prefix.length) };
    }
  }
  return { mode: "replace", text };
}

/**
 * Removes the `(append)` marker from a path.
 */
export function stripAppendMarker(path: string): {
  path: string;
  append: boolean;
} {
  if (!path.includes(APPEND_MARKER)) {
    return { path, append: false };
  }
  return { path: path.split(APPEND_MARKER).join("").trim(), append: true };
}
