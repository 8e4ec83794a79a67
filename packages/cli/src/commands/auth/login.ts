/**
 * CLI Login Command
 *
 * Authenticates with the provider using the OAuth 2.0 Device Authorization
 * Grant (RFC 8628). This allows authentication in headless environments
 * (SSH, CI/CD, etc.) without requiring a browser redirect.
 */

import {
  type DeviceAuthorizationProvider,
  DeviceFlow,
  type PollResult,
  type ProviderUser,
} from "@gitrelay/core";
import { execFile } from "child_process";
import { promisify } from "util";
import { fetchUser } from "@/lib/api";
import { createDeviceAuthorizationProvider, saveCredentials } from "@/lib/auth";
import { useAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

const execFileAsync = promisify(execFile);

export type DeviceCodeData = {
  /** User code to display (formatted as XXXX-XXXX) */
  userCode: string;
  /** URL for manual entry */
  verificationUri: string;
  /** URL with code included (if available) */
  verificationUriComplete?: string;
};

export type LoginOptions = {
  /** Skip opening browser automatically */
  noBrowser?: boolean;
  /** Force re-login even if already authenticated */
  force?: boolean;
  /** Called when device code is received - display this to the user */
  onDeviceCode?: (data: DeviceCodeData) => void;
  /** Called after browser open attempt - true if opened, false if manual entry needed */
  onBrowserOpen?: (opened: boolean) => void | Promise<void>;
  /** Called while waiting for the user to authorize */
  onPending?: (result: PollResult) => void;
  signal?: AbortSignal;
  /** Replaces the provider built from config */
  provider?: DeviceAuthorizationProvider;
  now?: () => number;
};

export type LoginResult = {
  /** Whether login was successful */
  success: boolean;
  /** Error message if login failed */
  error?: string;
  /** User the token belongs to */
  user?: ProviderUser;
  /** Whether login was skipped because already authenticated */
  alreadyLoggedIn?: boolean;
};

/**
 * Performs device code flow login and stores the token.
 */
export async function login(options: LoginOptions = {}): Promise<LoginResult> {
  const {
    noBrowser = false,
    force = false,
    onDeviceCode,
    onBrowserOpen,
    onPending,
    signal,
    now = Date.now,
  } = options;

  const ctx = useAppContext();
  if (!ctx) {
    throw new Error("App context not initialized");
  }

  const { provider: settings } = ctx.config;
  log.debug(`Authenticating with ${settings.url}`);

  if (!force && ctx.credentials) {
    log.debug("Already logged in, skipping authentication");
    return {
      success: true,
      alreadyLoggedIn: true,
      user: ctx.user ?? undefined,
    };
  }

  try {
    const provider =
      options.provider ??
      createDeviceAuthorizationProvider({
        issuer: settings.url,
        clientId: settings.clientId,
        scope: settings.scope,
        deviceAuthorizationEndpoint: settings.deviceAuthorizationEndpoint,
        tokenEndpoint: settings.tokenEndpoint,
      });
    const flow = new DeviceFlow(provider, { now });

    log.debug("Requesting device code");
    const authorization = await flow.start();

    onDeviceCode?.({
      userCode: formatUserCode(authorization.userCode),
      verificationUri: authorization.verificationUri,
      verificationUriComplete: authorization.verificationUriComplete,
    });

    let browserOpened = false;
    if (!noBrowser) {
      const urlToOpen =
        authorization.verificationUriComplete ?? authorization.verificationUri;
      try {
        log.debug(`Opening browser: ${urlToOpen}`);
        await openBrowser(urlToOpen);
        browserOpened = true;
      } catch (error) {
        log.debug(`Failed to open browser: ${getErrorMessage(error)}`);
      }
    }
    await onBrowserOpen?.(browserOpened);

    log.debug("Waiting for user authorization");
    const outcome = await flow.waitForCompletion({ signal, onPending });
    const credential = flow.credentials.get(now());

    if (outcome.stage !== "authenticated" || !credential) {
      return {
        success: false,
        error: outcome.error?.message ?? "Authorization did not complete.",
      };
    }

    log.debug("Fetching user info");
    const userResult = await fetchUser(settings.apiUrl, credential.token);
    const user = userResult.success ? userResult.data : undefined;
    if (!userResult.success) {
      log.debug(`Could not fetch user info: ${userResult.error}`);
    }

    log.debug("Saving credentials");
    await saveCredentials(settings.url, {
      token: credential.token,
      expiresAt:
        credential.expiresAt === undefined
          ? undefined
          : new Date(credential.expiresAt).toISOString(),
      scope: credential.scope,
      userId: user?.id,
      login: user?.login,
      name: user?.name,
      email: user?.email,
    });

    return { success: true, user };
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  }
}

/**
 * Format user code as XXXX-XXXX for display.
 */
function formatUserCode(code: string): string {
  const cleaned = code.toUpperCase().replace(/[^A-Z0-9]/g, "");
  if (cleaned.length <= 4) return cleaned;
  return `${cleaned.slice(0, 4)}-${cleaned.slice(4, 8)}`;
}

/**
 * Opens a URL in the default browser.
 */
async function openBrowser(url: string): Promise<void> {
  const platform = process.platform;

  const commands: Record<string, [string, string[]]> = {
    darwin: ["open", [url]],
    win32: ["cmd", ["/c", "start", "", url]],
    linux: ["xdg-open", [url]],
  };

  const command = commands[platform];
  if (!command) {
    throw new Error(`Unsupported platform: ${platform}`);
  }

  await execFileAsync(command[0], command[1]);
}
