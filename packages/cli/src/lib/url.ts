/**
 * URL Utilities
 */

/**
 * Builds a full URL from a base URL and path.
 * Handles trailing slashes correctly.
 *
 * @param base - Base URL (e.g., "https://github.com" or "https://github.com/")
 * @param path - Path to append (e.g., "/login/device/code")
 */
export function buildUrl(base: string, path: string): string {
  return new URL(path, base).toString();
}

/**
 * True for plain-HTTP loopback URLs, which are allowed for local testing.
 */
export function isLoopbackHttp(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      parsed.protocol === "http:" &&
      (parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1")
    );
  } catch {
    return false;
  }
}
