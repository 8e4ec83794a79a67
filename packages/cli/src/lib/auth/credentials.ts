/**
 * Credential storage for the standalone CLI
 *
 * Stores access tokens per provider URL so `gitrelay run` can act without a
 * server. Credentials are stored in ~/.gitrelay/credentials.json with 0600
 * permissions. The relay server keeps its credentials in memory only.
 */

import { chmod, mkdir, readFile, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { z } from "zod";
import { getConfigDir } from "@/lib/config";
import { errorCode, getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

const CREDENTIALS_FILENAME = "credentials.json";

const storedCredentialsSchema = z.object({
  token: z.string().min(1),
  /** ISO timestamp */
  expiresAt: z.string().optional(),
  scope: z.string().optional(),
  userId: z.number().optional(),
  login: z.string().optional(),
  name: z.string().optional(),
  email: z.string().nullable().optional(),
});

const credentialsFileSchema = z.record(storedCredentialsSchema);

/**
 * Credentials for a single provider
 */
export type StoredCredentials = z.infer<typeof storedCredentialsSchema>;

/**
 * All stored credentials, keyed by normalized provider URL
 */
export type CredentialsFile = z.infer<typeof credentialsFileSchema>;

export function getCredentialsPath(): string {
  return join(getConfigDir(), CREDENTIALS_FILENAME);
}

/**
 * Normalizes a provider URL for use as a key
 */
function normalizeUrl(url: string): string {
  return url.replace(/\/$/, "").toLowerCase();
}

async function loadStore(): Promise<CredentialsFile> {
  const credentialsPath = getCredentialsPath();

  let raw: string;
  try {
    raw = await readFile(credentialsPath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      log.debug(`Credentials file not found at ${credentialsPath}`);
      return {};
    }
    throw error;
  }

  try {
    const result = credentialsFileSchema.safeParse(JSON.parse(raw));
    if (!result.success) {
      log.warn(`Ignoring malformed credentials file ${credentialsPath}`);
      return {};
    }
    log.debug(
      `Loaded credentials for ${Object.keys(result.data).length} providers`
    );
    return result.data;
  } catch (error) {
    log.warn(
      `Ignoring unreadable credentials file ${credentialsPath}: ${getErrorMessage(error)}`
    );
    return {};
  }
}

async function saveStore(store: CredentialsFile): Promise<void> {
  const credentialsPath = getCredentialsPath();

  await mkdir(dirname(credentialsPath), { recursive: true });
  await writeFile(credentialsPath, JSON.stringify(store, null, 2), {
    encoding: "utf8",
    mode: 0o600,
  });
  // mode only applies when the file is created
  await chmod(credentialsPath, 0o600);
  log.debug(
    `Saved credentials for ${Object.keys(store).length} providers to ${credentialsPath}`
  );
}

/**
 * Gets credentials for a provider. Expired credentials are cleared.
 */
export async function getCredentials(
  providerUrl: string,
  now: number = Date.now()
): Promise<StoredCredentials | null> {
  const store = await loadStore();
  const credentials = store[normalizeUrl(providerUrl)];

  if (!credentials) {
    log.debug(`No credentials found for ${providerUrl}`);
    return null;
  }

  if (credentials.expiresAt) {
    const expiresAt = new Date(credentials.expiresAt).getTime();
    if (expiresAt <= now) {
      log.debug(`Credentials expired for ${providerUrl}, clearing them`);
      await clearCredentials(providerUrl);
      return null;
    }
  }

  return credentials;
}

export async function saveCredentials(
  providerUrl: string,
  credentials: StoredCredentials
): Promise<void> {
  const store = await loadStore();
  store[normalizeUrl(providerUrl)] = credentials;
  log.debug(
    `Saving credentials for ${providerUrl}${credentials.expiresAt ? ` (expires ${credentials.expiresAt})` : ""}`
  );
  await saveStore(store);
}

/**
 * Clears credentials for a provider. Returns whether any were stored.
 */
export async function clearCredentials(providerUrl: string): Promise<boolean> {
  const store = await loadStore();
  const key = normalizeUrl(providerUrl);
  if (!store[key]) {
    return false;
  }
  delete store[key];
  log.debug(`Cleared credentials for ${providerUrl}`);

  if (Object.keys(store).length === 0) {
    await rm(getCredentialsPath(), { force: true });
    log.debug("Removed empty credentials file");
  } else {
    await saveStore(store);
  }
  return true;
}

export async function clearAllCredentials(): Promise<void> {
  await rm(getCredentialsPath(), { force: true });
}
