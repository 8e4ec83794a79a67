/**
 * Platform API - shared request helper
 */

import type { z } from "zod";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import { buildUrl } from "@/lib/url";

export type ApiResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; status?: number };

/**
 * GET a JSON resource with a bearer token and validate it.
 */
export async function getJson<T extends z.ZodTypeAny>(
  apiUrl: string,
  path: string,
  token: string,
  schema: T
): Promise<ApiResult<z.infer<T>>> {
  const url = buildUrl(apiUrl, path);
  log.debug(`GET ${url}`);

  try {
    const response = await fetch(url, {
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `Bearer ${token}`,
      },
    });

    log.debug(`Response status: ${response.status}`);

    if (!response.ok) {
      return {
        success: false,
        error: await errorMessageOf(response),
        status: response.status,
      };
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      return { success: false, error: `Unexpected response from ${url}` };
    }
    return { success: true, data: parsed.data };
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  }
}

async function errorMessageOf(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const body: unknown = JSON.parse(text);
    if (
      typeof body === "object" &&
      body !== null &&
      "message" in body &&
      typeof body.message === "string"
    ) {
      return body.message;
    }
  } catch {
    log.debug(`Non-JSON error body: ${text.slice(0, 200)}`);
  }
  return `HTTP ${response.status}`;
}
