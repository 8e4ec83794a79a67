/**
 * Platform API - Authenticated user
 */

import type { ProviderUser } from "@gitrelay/core";
import { z } from "zod";
import { type ApiResult, getJson } from "./client";

const userResponseSchema = z.object({
  id: z.number(),
  login: z.string(),
  name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
});

/**
 * Fetches the user the token belongs to (GET /user).
 */
export async function fetchUser(
  apiUrl: string,
  token: string
): Promise<ApiResult<ProviderUser>> {
  const result = await getJson(apiUrl, "user", token, userResponseSchema);
  if (!result.success) {
    return result;
  }

  const { id, login, name, email } = result.data;
  return {
    success: true,
    data: { id, login, name: name || login, email: email ?? null },
  };
}
