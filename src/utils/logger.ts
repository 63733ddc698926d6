/**
 * Logger
 *
 * Leveled console logger. Everything goes to stderr: stdout carries CLI
 * results and, in server mode, the MCP stdio transport.
 */

export type LogLevel = "debug" | "info" | "warning" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  silent: 100,
};

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Parse a level name, accepting the common aliases ("warn", "WARNING").
 * Unknown or missing values fall back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "warn") return "warning";
  return isLogLevel(normalized) ? normalized : "info";
}

export class Logger {
  private level: LogLevel;
  private readonly useColor: boolean;

  constructor(level: LogLevel = "info", useColor = Boolean(process.stderr.isTTY)) {
    this.level = level;
    this.useColor = useColor;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) this.write(this.paint(COLORS.dim, `[debug] ${message}`));
  }

  info(message: string): void {
    if (this.isEnabled("info")) this.write(message);
  }

  success(message: string): void {
    if (this.isEnabled("info")) this.write(this.paint(COLORS.green, message));
  }

  /** Secondary detail lines (progress, per-chunk notes) */
  dim(message: string): void {
    if (this.isEnabled("info")) this.write(this.paint(COLORS.dim, message));
  }

  warning(message: string): void {
    if (this.isEnabled("warning")) this.write(this.paint(COLORS.yellow, message));
  }

  error(message: string): void {
    if (this.isEnabled("error")) this.write(this.paint(COLORS.red, message));
  }

  private paint(color: string, message: string): string {
    return this.useColor ? `${color}${message}${COLORS.reset}` : message;
  }

  private write(message: string): void {
    process.stderr.write(`${message}\n`);
  }
}

export const log = new Logger(parseLogLevel(process.env.LOG_LEVEL));
