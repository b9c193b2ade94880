/**
 * Structured logging for reckon
 * Provides contextual logging with optional detail levels. The retry
 * controller and the adapters only see the DiagnosticSink interface.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Log level, or "silent" for no diagnostics at all */
export type Verbosity = LogLevel | "silent";

export type LogData = Record<string, unknown>;

export interface LogContext {
  request?: string;
  attempt?: number;
  phase?: string;
  component?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: LogData;
}

/**
 * Where diagnostics go. Context is passed per call so a sink can be shared
 * between concurrent requests.
 */
export interface DiagnosticSink {
  debug(message: string, data?: LogData, context?: LogContext): void;
  info(message: string, data?: LogData, context?: LogContext): void;
  warn(message: string, data?: LogData, context?: LogContext): void;
  error(message: string, data?: LogData, context?: LogContext): void;
  startTimer(name: string): void;
  endTimer(name: string, message: string, context?: LogContext): number;
}

export const noopSink: DiagnosticSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  startTimer: () => undefined,
  endTimer: () => 0,
};

const CONSOLE_WRITERS: Record<LogLevel, (message: string) => void> = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isVerbosity(value: string): value is Verbosity {
  return value === "silent" || isLogLevel(value);
}

/**
 * Console-only logger at `verbosity` that keeps no entries, or the no-op sink
 * when silent
 */
export function createSink(verbosity: Verbosity): DiagnosticSink {
  return verbosity === "silent" ? noopSink : new Logger(verbosity, true, false);
}

export class Logger implements DiagnosticSink {
  private entries: LogEntry[] = [];
  private level: LogLevel = "info";
  private context: LogContext = {};
  private timerStack: Map<string, number> = new Map();
  private shouldLog: boolean = true;
  private retain: boolean = true;

  /**
   * @param retain keep entries for getEntries() and the summary
   */
  constructor(level: LogLevel = "info", shouldLog: boolean = true, retain: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
    this.retain = retain;
  }

  /**
   * Set logging level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Set context for all subsequent logs
   */
  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Remove context keys
   */
  popContext(keys: (keyof LogContext)[]): void {
    keys.forEach((key) => {
      delete this.context[key];
    });
  }

  startTimer(name: string): void {
    this.timerStack.set(name, Date.now());
  }

  /**
   * End a timer and log its duration at debug level
   */
  endTimer(name: string, message: string, context?: LogContext): number {
    const start = this.timerStack.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`, undefined, context);
      return 0;
    }

    const duration = Date.now() - start;
    this.timerStack.delete(name);
    this.log("debug", message, { duration }, context);
    return duration;
  }

  debug(message: string, data?: LogData, context?: LogContext): void {
    this.log("debug", message, data, context);
  }

  info(message: string, data?: LogData, context?: LogContext): void {
    this.log("info", message, data, context);
  }

  warn(message: string, data?: LogData, context?: LogContext): void {
    this.log("warn", message, data, context);
  }

  error(message: string, data?: LogData, context?: LogContext): void {
    this.log("error", message, data, context);
  }

  private log(level: LogLevel, message: string, data?: LogData, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const mergedContext = { ...this.context, ...(context ?? {}) };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(mergedContext).length > 0 ? mergedContext : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    if (this.retain) {
      this.entries.push(entry);
    }

    if (this.shouldLog) {
      this.consoleLog(level, this.formatLog(entry, this.buildPrefix(entry)));
    }
  }

  /**
   * Build a context prefix, e.g. `[retry] <openai> isPrime Attempt 2: `
   */
  private buildPrefix(entry: LogEntry): string {
    if (!entry.context) return "";

    const parts: string[] = [];
    if (entry.context.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context.component) parts.push(`<${entry.context.component}>`);
    if (entry.context.request) parts.push(entry.context.request);
    if (entry.context.attempt) parts.push(`Attempt ${entry.context.attempt}`);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  private formatLog(entry: LogEntry, prefix: string): string {
    let result = prefix + entry.message;

    if (entry.data) {
      const dataStr = this.formatData(entry.data);
      if (dataStr) {
        result += "\n  " + dataStr;
      }
    }

    return result;
  }

  private formatData(data: LogData): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (key === "duration" && typeof value === "number") {
        parts.push(`${key}: ${value}ms`);
      } else if (Array.isArray(value)) {
        parts.push(`${key}: [${value.length} items]`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    CONSOLE_WRITERS[level](message);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForRequest(request: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.request === request);
  }

  /**
   * Get entries at or above a specific level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): {
    totalEntries: number;
    debugCount: number;
    infoCount: number;
    warnCount: number;
    errorCount: number;
  } {
    return {
      totalEntries: this.entries.length,
      debugCount: this.entries.filter((e) => e.level === "debug").length,
      infoCount: this.entries.filter((e) => e.level === "info").length,
      warnCount: this.entries.filter((e) => e.level === "warn").length,
      errorCount: this.entries.filter((e) => e.level === "error").length,
    };
  }
}
