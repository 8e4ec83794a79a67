/**
 * Application Context
 *
 * Centralizes loading of config, credentials, and user info to avoid
 * redundant file I/O across commands. Created once at startup and
 * passed to commands that need it.
 */

import type { ProviderUser } from "@gitrelay/core";
import { fetchUser } from "./api";
import { getCredentials, type StoredCredentials, saveCredentials } from "./auth";
import { type Config, loadConfig } from "./config";
import { log } from "./log";

/**
 * Application context loaded at startup
 */
export type AppContext = {
  /** CLI configuration (provider, server, sessions) */
  config: Config;
  /** Stored credentials for the configured provider (null if not logged in) */
  credentials: StoredCredentials | null;
  /** User info (null if not logged in or not available) */
  user: ProviderUser | null;
  /** Whether a token is stored for the configured provider */
  isLoggedIn: boolean;
};

/**
 * Creates the application context by loading config, credentials, and user info.
 * This should be called once at startup and the result passed to commands.
 */
export async function createAppContext(): Promise<AppContext> {
  log.debug("Loading app context");
  const config = await loadConfig();
  const providerUrl = config.provider.url;

  const credentials = await getCredentials(providerUrl);
  const isLoggedIn = credentials !== null;

  let user: ProviderUser | null = null;

  if (credentials) {
    user = cachedUser(credentials);
    if (user) {
      log.debug("Using cached user info");
    } else {
      // Older credentials files carry no user; look it up once and cache it
      log.debug("Fetching user info from provider");
      const result = await fetchUser(config.provider.apiUrl, credentials.token);
      if (result.success) {
        user = result.data;
        await saveCredentials(providerUrl, {
          ...credentials,
          userId: user.id,
          login: user.login,
          name: user.name,
          email: user.email,
        });
        log.debug("Saved fetched user info to credentials");
      } else {
        log.debug(`Failed to fetch user info: ${result.error}`);
      }
    }
  }

  log.debug(
    `App context loaded: isLoggedIn=${isLoggedIn}, user=${user?.login ?? "none"}`
  );

  return { config, credentials, user, isLoggedIn };
}

function cachedUser(credentials: StoredCredentials): ProviderUser | null {
  const { userId, login, name, email } = credentials;
  if (userId === undefined || !login) {
    return null;
  }
  return { id: userId, login, name: name ?? login, email: email ?? null };
}

// =============================================================================
// Global context singleton (for commands that need it)
// =============================================================================

let globalContext: AppContext | null = null;

/**
 * Gets the global app context, or null if not initialized.
 */
export function useAppContext(): AppContext | null {
  return globalContext;
}

/**
 * Initializes the global app context. Call this once at startup.
 */
export async function initAppContext(): Promise<AppContext> {
  globalContext = await createAppContext();
  return globalContext;
}
