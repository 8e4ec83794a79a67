/**
 * Logging
 *
 * Architecture:
 * - stdout: Results/data only (can be piped)
 * - stderr: Everything else (status, errors, debug)
 *
 * Log levels:
 * - error: Always shown
 * - warn: Always shown
 * - info: Default level (normal status messages)
 * - debug: Only with --verbose, DEBUG=1 or LOG_LEVEL=debug
 *
 * Long-running parts of the server log through `log.scope(name)`, which
 * prefixes every line with the scope.
 */

import { ui } from "@/lib/ui";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = levelFromEnv(process.env);

/**
 * Resolves the starting level from the environment.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  if (env.DEBUG === "1" || env.DEBUG === "true") {
    return "debug";
  }
  return "info";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/**
 * Set the log level. Messages below this level are suppressed.
 */
function setLevel(level: LogLevel) {
  currentLevel = level;
}

function getLevel(): LogLevel {
  return currentLevel;
}

/**
 * Enable verbose/debug logging.
 */
function setVerbose(verbose: boolean) {
  currentLevel = verbose ? "debug" : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

// =============================================================================
// Core logging functions
// =============================================================================

/**
 * Print raw output to stdout (for results/data that can be piped)
 */
function print(message: string) {
  console.log(message);
}

function debug(message: string) {
  if (shouldLog("debug")) {
    console.error(ui.theme.dim(`[debug] ${message}`));
  }
}

function info(message: string) {
  if (shouldLog("info")) {
    console.error(message);
  }
}

function warn(message: string) {
  if (shouldLog("warn")) {
    console.error(ui.warning(message));
  }
}

function error(message: string) {
  console.error(ui.error(message));
}

function success(message: string) {
  if (shouldLog("info")) {
    console.error(ui.success(message));
  }
}

// =============================================================================
// Scoped loggers
// =============================================================================

export type ScopedLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

/**
 * Logger whose lines carry a `[name]` prefix.
 */
function scope(name: string): ScopedLogger {
  const prefix = ui.muted(`[${name}]`);
  return {
    debug: (message) => debug(`[${name}] ${message}`),
    info: (message) => info(`${prefix} ${message}`),
    warn: (message) => warn(`${prefix} ${message}`),
    error: (message) => error(`[${name}] ${message}`),
  };
}

// =============================================================================
// Spinner
// =============================================================================

export type Spinner = {
  /** Update spinner text */
  update: (message: string) => void;
  /** Stop spinner without message */
  stop: () => void;
  /** Stop with success message */
  success: (message: string) => void;
  /** Stop with error message */
  fail: (message: string) => void;
};

let oraModule: typeof import("ora") | null = null;

async function getOra() {
  if (!oraModule) {
    oraModule = await import("ora");
  }
  return oraModule.default;
}

/**
 * Create a spinner for long-running operations.
 */
async function spinner(message: string): Promise<Spinner> {
  try {
    const ora = await getOra();
    const s = ora({
      text: message,
      spinner: "dots",
      color: "cyan",
    }).start();

    return {
      update: (msg: string) => {
        s.text = msg;
      },
      stop: () => {
        s.stop();
      },
      success: (msg: string) => {
        s.succeed(msg);
      },
      fail: (msg: string) => {
        s.fail(msg);
      },
    };
  } catch (err) {
    // Fallback if ora fails to load
    debug(`Spinner unavailable: ${String(err)}`);
    info(message);
    return {
      update: (msg: string) => info(msg),
      stop: () => {
        /* no-op fallback */
      },
      success: (msg: string) => success(msg),
      fail: (msg: string) => error(msg),
    };
  }
}

// =============================================================================
// Export
// =============================================================================

export const log = {
  // Level control
  setLevel,
  getLevel,
  setVerbose,

  // Output
  print,
  debug,
  info,
  warn,
  error,
  success,

  // Scopes
  scope,

  // Spinner
  spinner,
};

export { ui } from "@/lib/ui";
