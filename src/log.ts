/**
 * Console logging for the regression engine.
 *
 * Everything goes to stderr: stdout carries the report (CLI) or the MCP
 * transport (server mode).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = "[hdl-regress]";

let verbose = process.env.HDL_REGRESS_VERBOSE === "1";

/**
 * Enable or disable debug output.
 */
export const setVerbose = (enabled: boolean): void => {
  verbose = enabled;
};

export const isVerbose = (): boolean => verbose;

const write = (level: LogLevel, scope: string | undefined, message: string): void => {
  if (level === "debug" && !verbose) return;
  const tag = scope ? `${PREFIX}[${scope}]` : PREFIX;
  const marker = level === "info" ? "" : ` ${level}:`;
  console.error(`${tag}${marker} ${message}`);
};

/**
 * Create a logger whose lines carry an optional scope tag,
 * e.g. `[hdl-regress][scheduler] 12/40 t_foo PASSED`.
 */
export const createLogger = (scope?: string): Logger => ({
  debug: (message) => write("debug", scope, message),
  info: (message) => write("info", scope, message),
  warn: (message) => write("warn", scope, message),
  error: (message) => write("error", scope, message),
});
