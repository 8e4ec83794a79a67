/**
 * CLI Whoami Command
 *
 * Displays information about the currently authenticated user.
 */

import type { ProviderUser } from "@gitrelay/core";
import { useAppContext } from "@/lib/context";

export type WhoamiResult = {
  success: boolean;
  loggedIn: boolean;
  user?: ProviderUser;
  /** Provider the credentials are stored for */
  providerUrl: string;
  /** Token expiration date */
  expiresAt?: string;
  scope?: string;
};

export async function whoami(): Promise<WhoamiResult> {
  const ctx = useAppContext();
  if (!ctx) {
    throw new Error("App context not initialized");
  }

  return {
    success: true,
    loggedIn: ctx.isLoggedIn,
    user: ctx.user ?? undefined,
    providerUrl: ctx.config.provider.url,
    expiresAt: ctx.credentials?.expiresAt,
    scope: ctx.credentials?.scope,
  };
}
