/**
 * Accumulator Logging
 *
 * Levelled logger scoped to a subsystem (`incidents/engine`,
 * `incidents/engine/storage`, ...). Entries go to pluggable transports;
 * the console transport colourises when stdout is a TTY.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  readonly subsystem: string;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child(name: string): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

const SEVERITY: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return SEVERITY.indexOf(level) >= SEVERITY.indexOf(minLevel);
}

// =============================================================================
// Formatting
// =============================================================================

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const BLUE = "\x1b[34m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: DIM,
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

/** `<iso time> <LEVEL> [subsystem] message {metadata}` */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const colors = options?.colors ?? process.stdout.isTTY ?? false;
  const timestamps = options?.timestamps ?? true;
  const includeMetadata = options?.includeMetadata ?? true;
  const paint = (code: string, text: string): string => (colors ? `${code}${text}${RESET}` : text);

  return (entry) => {
    const parts: string[] = [];
    if (timestamps) parts.push(paint(DIM, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(BLUE, `[${entry.subsystem}]`));
    parts.push(entry.message);
    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(DIM, JSON.stringify(entry.metadata)));
    }
    return parts.join(" ");
  };
}

export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  private readonly format: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.format = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    const line = this.format(entry);
    switch (entry.level) {
      case "error":
      case "fatal":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

// =============================================================================
// Logger
// =============================================================================

class SubsystemLogger implements Logger {
  readonly debug: LogMethod = (message, meta) => this.emit("debug", message, meta);
  readonly info: LogMethod = (message, meta) => this.emit("info", message, meta);
  readonly warn: LogMethod = (message, meta) => this.emit("warn", message, meta);
  readonly error: LogMethod = (message, meta) => this.emit("error", message, meta);

  constructor(
    readonly subsystem: string,
    private readonly level: LogLevel,
    private readonly transports: readonly LogTransport[],
  ) {}

  child(name: string): Logger {
    return new SubsystemLogger(`${this.subsystem}/${name}`, this.level, this.transports);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = { timestamp: new Date(), level, subsystem: this.subsystem, message, metadata };
    for (const transport of this.transports) transport.write(entry);
  }
}

/** Logger for `incidents/<subsystem>`; level defaults to info. */
export function createLogger(
  subsystem: string,
  options?: { level?: LogLevel; transports?: LogTransport[] },
): Logger {
  return new SubsystemLogger(
    `incidents/${subsystem}`,
    options?.level ?? "info",
    options?.transports ?? [new ConsoleTransport()],
  );
}
