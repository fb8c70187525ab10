/**
 * Logger - structured logging for the vault index.
 *
 * Console output always goes to stderr: stdout is reserved for the MCP
 * transport in the server process and for the JSONL channel in the worker.
 *
 * - Levels DEBUG..FATAL plus SILENT
 * - Human-readable or JSON lines
 * - Optional file output (non-blocking, queued)
 * - Module filtering and timers
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types and Enums
// ============================================================================

/**
 * Log severity levels. Lower number = more verbose.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.FATAL]: 'FATAL',
  [LogLevel.SILENT]: 'SILENT',
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.FATAL]: '\x1b[35m',
  [LogLevel.SILENT]: '',
};

const RESET_COLOR = '\x1b[0m';

/**
 * A single log entry. This is also the wire shape of worker log lines.
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  levelName: string;
  /** Module/component name */
  module: string;
  message: string;
  data?: Record<string, unknown>;
  durationMs?: number;
}

export interface LoggerConfig {
  /** Minimum level to log (default: INFO) */
  level: LogLevel;
  /** Enable stderr output (default: true) */
  console: boolean;
  /** File path for log output (default: undefined = no file) */
  filePath?: string;
  /** Use JSON lines (default: false = human readable) */
  json: boolean;
  /** Only log these modules (empty = all modules) */
  modules: string[];
  /** Use ANSI colors (default: false) */
  colors: boolean;
  /** Include timestamp in human-readable output (default: true) */
  timestamps: boolean;
}

/** Destination for formatted console lines. */
export type LogSink = (line: string) => void;

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  console: true,
  filePath: undefined,
  json: false,
  modules: [],
  colors: false,
  timestamps: true,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
  private config: LoggerConfig;
  private sink: LogSink;
  private timers: Map<string, number> = new Map();

  private pendingWrites: string[] = [];
  private isWriting = false;

  constructor(config: Partial<LoggerConfig> = {}, sink: LogSink = stderrSink) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.sink = sink;
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, modules: [...this.config.modules] };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /** Replace the console sink (tests capture output this way). */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  // -------------------------------------------------------------------------
  // Core Logging Methods
  // -------------------------------------------------------------------------

  debug(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, module, message, data);
  }

  info(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, module, message, data);
  }

  warn(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, module, message, data);
  }

  error(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, module, message, data);
  }

  fatal(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, module, message, data);
  }

  /**
   * Write an entry produced elsewhere (e.g. forwarded from the worker).
   * Level and module filters still apply.
   */
  write(entry: LogEntry): void {
    if (!this.accepts(entry.level, entry.module)) return;
    this.output(entry);
  }

  private log(
    level: LogLevel,
    module: string,
    message: string,
    data?: Record<string, unknown>,
    durationMs?: number,
  ): void {
    if (!this.accepts(level, module)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LOG_LEVEL_NAMES[level],
      module,
      message,
    };

    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    if (durationMs !== undefined) {
      entry.durationMs = durationMs;
    }

    this.output(entry);
  }

  private accepts(level: LogLevel, module: string): boolean {
    if (level === LogLevel.SILENT || level < this.config.level) return false;
    return (
      this.config.modules.length === 0 || this.config.modules.includes(module)
    );
  }

  private output(entry: LogEntry): void {
    if (this.config.console) {
      this.sink(
        this.config.json ? JSON.stringify(entry) : this.formatHumanReadable(entry),
      );
    }
    if (this.config.filePath) {
      this.writeFile(entry);
    }
  }

  // -------------------------------------------------------------------------
  // Timing Utilities
  // -------------------------------------------------------------------------

  startTimer(name: string): void {
    this.timers.set(name, performance.now());
  }

  /**
   * End a timer and log the duration at DEBUG.
   * @returns Duration in milliseconds, or -1 if the timer was never started
   */
  endTimer(
    name: string,
    module: string,
    message: string,
    data?: Record<string, unknown>,
  ): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn('Logger', `Timer '${name}' not found`);
      return -1;
    }
    this.timers.delete(name);

    const durationMs = Math.round((performance.now() - start) * 100) / 100;
    this.log(LogLevel.DEBUG, module, message, data, durationMs);
    return durationMs;
  }

  async measure<T>(
    name: string,
    module: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    this.startTimer(name);
    try {
      return await fn();
    } finally {
      this.endTimer(name, module, `${name} completed`);
    }
  }

  // -------------------------------------------------------------------------
  // Output Formatting
  // -------------------------------------------------------------------------

  private formatHumanReadable(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    const levelName = entry.levelName.padEnd(5);
    parts.push(
      this.config.colors
        ? `${LOG_LEVEL_COLORS[entry.level]}${levelName}${RESET_COLOR}`
        : levelName,
    );
    parts.push(`[${entry.module}]`);
    parts.push(entry.message);

    if (entry.durationMs !== undefined) {
      parts.push(`(${entry.durationMs}ms)`);
    }
    if (entry.data) {
      parts.push(JSON.stringify(entry.data));
    }

    return parts.join(' ');
  }

  /**
   * Queue a line for the log file. A single drain loop writes the queue so
   * promise chains don't pile up under heavy logging.
   */
  private writeFile(entry: LogEntry): void {
    this.pendingWrites.push(JSON.stringify(entry) + '\n');
    if (!this.isWriting) {
      void this.processWriteQueue();
    }
  }

  private async processWriteQueue(): Promise<void> {
    const filePath = this.config.filePath;
    if (this.isWriting || !filePath) return;

    this.isWriting = true;
    try {
      await mkdir(dirname(filePath), { recursive: true });
      let line = this.pendingWrites.shift();
      while (line !== undefined) {
        await appendFile(filePath, line);
        line = this.pendingWrites.shift();
      }
    } catch (err) {
      this.pendingWrites = [];
      this.sink(
        `[Logger] Failed to write to ${filePath}: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
    } finally {
      this.isWriting = false;
      if (this.pendingWrites.length > 0) {
        void this.processWriteQueue();
      }
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Flush pending file writes.
   */
  async close(): Promise<void> {
    while (this.pendingWrites.length > 0 || this.isWriting) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
  }

  child(module: string): ModuleLogger {
    return new ModuleLogger(this, module);
  }
}

// ============================================================================
// Module Logger
// ============================================================================

/**
 * A logger bound to a specific module.
 */
export class ModuleLogger {
  constructor(
    private readonly logger: Logger,
    private readonly module: string,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(this.module, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(this.module, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(this.module, message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(this.module, message, data);
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.logger.fatal(this.module, message, data);
  }

  startTimer(name: string): void {
    this.logger.startTimer(`${this.module}:${name}`);
  }

  endTimer(
    name: string,
    message: string,
    data?: Record<string, unknown>,
  ): number {
    return this.logger.endTimer(
      `${this.module}:${name}`,
      this.module,
      message,
      data,
    );
  }

  async measure<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return this.logger.measure(`${this.module}:${name}`, this.module, fn);
  }
}

// ============================================================================
// Global Logger Instance
// ============================================================================

/**
 * Process-wide logger. Configure once at startup.
 */
export const globalLogger = new Logger();

export function createModuleLogger(module: string): ModuleLogger {
  return globalLogger.child(module);
}

// ============================================================================
// Utility Functions
// ============================================================================

export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    case 'SILENT':
    case 'OFF':
    case 'NONE':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Type guard for log entries arriving as parsed JSON.
 */
export function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'module' in value &&
    typeof value.module === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'string'
  );
}
