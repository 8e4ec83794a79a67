import { GITHUB_DEFAULTS } from "@gitrelay/core";
import { constants as fsConstants } from "fs";
import { access, mkdir, readFile, writeFile } from "fs/promises";
import { homedir, tmpdir } from "os";
import { dirname, join } from "path";
import { z } from "zod";
import { errorCode, getErrorMessage } from "./errors";
import { log } from "./log";

/** Directory for configuration and credentials (e.g., ~/.gitrelay/) */
const CONFIG_DIRNAME = ".gitrelay";
const CONFIG_FILENAME = "config.json";
const CONFIG_HOME_ENV = "GITRELAY_HOME";

const urlSchema = z.string().url();

const providerSchema = z.object({
  /** Platform web URL; device flow endpoints are resolved against it */
  url: urlSchema.default(GITHUB_DEFAULTS.url),
  /** REST API base URL */
  apiUrl: urlSchema.default(GITHUB_DEFAULTS.apiUrl),
  /** OAuth application client id */
  clientId: z.string().default(""),
  scope: z.string().default(GITHUB_DEFAULTS.scope),
  deviceAuthorizationEndpoint: z
    .string()
    .default(GITHUB_DEFAULTS.deviceAuthorizationEndpoint),
  tokenEndpoint: z.string().default(GITHUB_DEFAULTS.tokenEndpoint),
});

const serverSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.number().int().min(0).max(65_535).default(8000),
  /** Public URL the service is reachable at */
  baseUrl: urlSchema.optional(),
  /** Shared secret for X-Hub-Signature-256 verification */
  webhookSecret: z.string().optional(),
});

const sessionsSchema = z.object({
  idleTimeoutMinutes: z.number().positive().default(60),
  sweepIntervalSeconds: z.number().positive().default(60),
  /** Batches allowed to wait behind a running one, per session */
  maxQueuedBatches: z.number().int().min(0).default(4),
  /** Parent directory of working copies; defaults to the OS temp dir */
  workspaceRoot: z.string().optional(),
});

export const configSchema = z.object({
  provider: providerSchema.default({}),
  server: serverSchema.default({}),
  sessions: sessionsSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ProviderSettings = Config["provider"];
export type ServerSettings = Config["server"];
export type SessionSettings = Config["sessions"];

export function defaultConfig(): Config {
  return configSchema.parse({});
}

export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  await ensureConfigDir();
  const configPath = getConfigPath();
  log.debug(`Loading config from ${configPath}`);

  try {
    await access(configPath, fsConstants.F_OK);
  } catch (error: unknown) {
    if (errorCode(error) === "ENOENT") {
      log.debug("Config file not found, creating default config");
      await writeDefaultConfig();
      return applyEnvOverrides(defaultConfig(), env);
    }

    throw error instanceof Error ? error : new Error(String(error));
  }

  const raw = await readFile(configPath, "utf8");
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse ${configPath}: ${getErrorMessage(error)}`);
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new Error(
      `Invalid config ${configPath}: ${where} ${issue?.message ?? "is invalid"}`
    );
  }

  return applyEnvOverrides(result.data, env);
}

export async function saveConfig(config: Config) {
  await ensureConfigDir();
  const configPath = getConfigPath();
  log.debug(`Saving config to ${configPath}`);
  await writeFile(configPath, JSON.stringify(config, null, 2), "utf8");
}

/**
 * Environment variables win over the file.
 */
export function applyEnvOverrides(
  config: Config,
  env: NodeJS.ProcessEnv
): Config {
  const next = structuredClone(config);

  if (env.GITHUB_CLIENT_ID?.trim()) {
    next.provider.clientId = env.GITHUB_CLIENT_ID.trim();
  }
  if (env.GITHUB_WEBHOOK_SECRET) {
    next.server.webhookSecret = env.GITHUB_WEBHOOK_SECRET;
  }
  if (env.APP_BASE_URL?.trim()) {
    next.server.baseUrl = normalizeBaseUrl(env.APP_BASE_URL.trim());
  }
  if (env.PORT?.trim()) {
    const port = Number.parseInt(env.PORT, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65_535) {
      throw new Error(`Invalid PORT "${env.PORT}"`);
    }
    next.server.port = port;
  }

  return next;
}

export function getConfigPath() {
  return join(getConfigDir(), CONFIG_FILENAME);
}

export function getConfigDir() {
  const customDir = process.env[CONFIG_HOME_ENV];
  if (customDir && customDir.trim().length > 0) {
    return customDir;
  }
  return join(homedir(), CONFIG_DIRNAME);
}

/** Directory under which working copies are created. */
export function getWorkspaceRoot(settings: SessionSettings) {
  return settings.workspaceRoot ?? join(tmpdir(), "gitrelay");
}

/**
 * Normalizes a URL to a base URL with trailing slash.
 *
 * Examples:
 * - "https://example.com" → "https://example.com/"
 * - "https://example.com/custom" → "https://example.com/custom/"
 */
export function normalizeBaseUrl(input: string) {
  try {
    const parsed = new URL(input);
    if (!parsed.pathname.endsWith("/")) {
      parsed.pathname = `${parsed.pathname}/`;
    }
    return parsed.toString();
  } catch (error) {
    throw new Error(`Invalid URL "${input}": ${getErrorMessage(error)}`);
  }
}

async function ensureConfigDir() {
  await mkdir(getConfigDir(), { recursive: true });
}

async function writeDefaultConfig() {
  const configPath = getConfigPath();
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(defaultConfig(), null, 2), "utf8");
}
