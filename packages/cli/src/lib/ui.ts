/**
 * CLI UI Design System
 *
 * - Minimal, clean design
 * - Monospace code elements
 * - Counts in brackets [n]
 * - No heavy decorations
 */

import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  brand: chalk.white.bold,

  // Text hierarchy
  title: chalk.white.bold,
  subtitle: chalk.gray,
  muted: chalk.gray,
  dim: chalk.dim,

  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  // Code/commands - monospace style
  code: chalk.cyan,
  command: chalk.cyan,
  path: chalk.white,
} as const;

// =============================================================================
// Symbols
// =============================================================================

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),

  bullet: theme.muted("•"),
  arrow: theme.muted("→"),

  prompt: theme.muted(">_"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

/** Format as code/command (cyan, monospace-style) */
export function code(text: string): string {
  return theme.code(text);
}

/** Format a CLI command */
export function command(cmd: string): string {
  return theme.command(cmd);
}

export function muted(text: string): string {
  return theme.muted(text);
}

export function bold(text: string): string {
  return chalk.bold(text);
}

// =============================================================================
// Layout Helpers
// =============================================================================

/** Indent text by level */
export function indent(level = 1): string {
  return "  ".repeat(level);
}

/** Pad string to width, ignoring ANSI codes */
export function pad(
  text: string,
  width: number,
  align: "left" | "right" = "left"
): string {
  const stripped = stripAnsi(text);
  const padding = Math.max(0, width - stripped.length);
  if (align === "right") {
    return " ".repeat(padding) + text;
  }
  return text + " ".repeat(padding);
}

// =============================================================================
// Components
// =============================================================================

/**
 * Key-value pair for labeled data
 * e.g., "Login:   octocat"
 */
export function keyValue(key: string, value: string, keyWidth = 12): string {
  return `${theme.muted(pad(key, keyWidth))} ${value}`;
}

// =============================================================================
// Status Messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

// =============================================================================
// Batch reports
// =============================================================================

/**
 * One line of a batch report
 * e.g., "✓ [2] modify.file  Appended 12 bytes to notes.txt"
 */
export function stepResult(
  ok: boolean,
  stepNumber: number,
  commandName: string,
  message: string
): string {
  const marker = ok ? symbols.success : symbols.error;
  const label = theme.muted(pad(`[${stepNumber}]`, 5));
  const text = ok ? message : theme.error(message);
  return `${marker} ${label} ${pad(code(commandName), 15)} ${text}`;
}

// =============================================================================
// Brand Elements
// =============================================================================

/**
 * Brand header: >_ GITRELAY
 */
export function brand(): string {
  return `${symbols.prompt} ${theme.brand("GITRELAY")}`;
}

/**
 * CLI banner for help screens
 */
export function banner(): string {
  return `
${brand()}
${theme.subtitle("Device-flow authenticated repository command relay")}
`;
}

// =============================================================================
// Special Formats
// =============================================================================

export function hint(text: string): string {
  return theme.dim(text);
}

export function link(url: string): string {
  return chalk.underline.cyan(url);
}

// =============================================================================
// Utility Functions
// =============================================================================

/** Strip ANSI codes for width calculations */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

/** Format relative time */
export function relativeTime(date: Date | string): string {
  const now = Date.now();
  const then =
    typeof date === "string" ? new Date(date).getTime() : date.getTime();
  const diffMs = then - now;
  const future = diffMs > 0;

  const seconds = Math.floor(Math.abs(diffMs) / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  const amount =
    days > 0
      ? `${days}d`
      : hours > 0
        ? `${hours}h`
        : minutes > 0
          ? `${minutes}m`
          : null;
  if (amount === null) return "just now";
  return future ? `in ${amount}` : `${amount} ago`;
}

// =============================================================================
// Export
// =============================================================================

export const ui = {
  theme,
  symbols,

  code,
  command,
  muted,
  bold,

  indent,
  pad,

  keyValue,

  success,
  error,
  warning,

  stepResult,

  brand,
  banner,

  hint,
  link,

  stripAnsi,
  relativeTime,
};

export default ui;
