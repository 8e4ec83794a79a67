/**
 * CLI Logout Command
 *
 * Clears stored credentials from the local machine.
 */

import { clearAllCredentials, clearCredentials } from "@/lib/auth";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export type LogoutOptions = {
  /** Clear credentials for every provider */
  all?: boolean;
};

export type LogoutResult = {
  success: boolean;
  /** Whether credentials were actually cleared (false if none existed) */
  hadCredentials: boolean;
};

export async function logout(
  options: LogoutOptions = {}
): Promise<LogoutResult> {
  if (options.all) {
    log.debug("Clearing all stored credentials");
    await clearAllCredentials();
    return { success: true, hadCredentials: true };
  }

  const ctx = useAppContext();
  if (!ctx) {
    throw new Error("App context not initialized");
  }

  const providerUrl = ctx.config.provider.url;
  const hadCredentials = await clearCredentials(providerUrl);
  log.debug(
    hadCredentials
      ? `Cleared credentials for ${providerUrl}`
      : `No credentials found for ${providerUrl}`
  );

  return { success: true, hadCredentials };
}
