const BASE64_REGEX = /^[A-Za-z0-9+/]*={0,2}$/;

export function toPosixPath(pathValue: string) {
  return pathValue.split("\\").join("/");
}

export function encodeUtf8(value: string) {
  if (typeof Buffer !== "undefined") {
    return new Uint8Array(Buffer.from(value, "utf8"));
  }
  return new TextEncoder().encode(value);
}

export function decodeUtf8(payload: ArrayBuffer | ArrayBufferView) {
  const bytes = toUint8Array(payload);
  if (typeof Buffer !== "undefined") {
    return Buffer.from(bytes).toString("utf8");
  }
  return new TextDecoder("utf-8", { fatal: false, ignoreBOM: false }).decode(
    bytes
  );
}

export function toUint8Array(payload: ArrayBuffer | ArrayBufferView) {
  if (payload instanceof Uint8Array) {
    return payload;
  }
  if (ArrayBuffer.isView(payload)) {
    return new Uint8Array(
      payload.buffer,
      payload.byteOffset,
      payload.byteLength
    );
  }
  return new Uint8Array(payload);
}

export function encodeBase64(payload: ArrayBuffer | ArrayBufferView | string) {
  const bytes =
    typeof payload === "string" ? encodeUtf8(payload) : toUint8Array(payload);
  return Buffer.from(bytes).toString("base64");
}

/**
 * Strictly decodes standard base64. Returns null for anything that is not
 * canonical padded base64 (Buffer alone accepts almost any input).
 */
export function decodeBase64(value: string): Uint8Array | null {
  const compact = value.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_REGEX.test(compact)) {
    return null;
  }
  return new Uint8Array(Buffer.from(compact, "base64"));
}

/**
 * Decodes base64 that must carry UTF-8 text. Returns null when the value is
 * not base64 or the bytes are not valid UTF-8.
 */
export function decodeBase64Text(value: string): string | null {
  const bytes = decodeBase64(value);
  if (!bytes) return null;
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}
