/**
 * Logger - leveled logging for the notebook index.
 *
 * Console output is written to stderr: when the engine runs behind a stdio
 * tool server, stdout belongs to the protocol stream.
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR, SILENT
 * - Human-readable or JSON lines
 * - Optional JSON-lines file output, appended in order without blocking callers
 * - Module-based filtering
 * - Named timers
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types and Enums
// ============================================================================

/**
 * Log severity levels.
 * Lower number = more verbose.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/**
 * A single log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Level name (DEBUG, INFO, etc.) */
  levelName: string;
  /** Module/component name */
  module: string;
  message: string;
  /** Additional structured data */
  data?: Record<string, unknown>;
  /** Duration in ms (for timed operations) */
  durationMs?: number;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Minimum level to log (default: INFO) */
  level: LogLevel;
  /** Enable console (stderr) output (default: true) */
  console: boolean;
  /** File path for JSON-lines output (default: undefined = no file) */
  filePath?: string;
  /** Use JSON format on the console (default: false = human readable) */
  json: boolean;
  /** Only log these modules (empty = all modules) */
  modules: string[];
  /** Include timestamp in console output (default: true) */
  timestamps: boolean;
  /** Console sink. Default: writes the line to process.stderr */
  write?: (line: string) => void;
}

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  console: true,
  filePath: undefined,
  json: false,
  modules: [],
  timestamps: true,
};

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
  private config: LoggerConfig;
  private timers: Map<string, number> = new Map();
  private directoryReady = false;

  /** Tail of the file append chain; each line waits for the previous one */
  private fileTail: Promise<void> = Promise.resolve();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  /**
   * Update logger configuration at runtime.
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.filePath !== undefined && config.filePath !== this.config.filePath) {
      this.directoryReady = false;
    }
    this.config = { ...this.config, ...config };
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setModules(modules: string[]): void {
    this.config.modules = modules;
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

  private log(
    level: LogLevel,
    module: string,
    message: string,
    data?: Record<string, unknown>,
    durationMs?: number,
  ): void {
    if (level < this.config.level || level === LogLevel.SILENT) return;

    if (
      this.config.modules.length > 0 &&
      !this.config.modules.includes(module)
    ) {
      return;
    }

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

    if (this.config.console) {
      const line = this.config.json
        ? JSON.stringify(entry)
        : this.formatHumanReadable(entry);
      (this.config.write ?? writeStderr)(line);
    }

    if (this.config.filePath) {
      this.writeFile(this.config.filePath, entry);
    }
  }

  // -------------------------------------------------------------------------
  // Timing Utilities
  // -------------------------------------------------------------------------

  /**
   * Start a timer for measuring duration.
   */
  startTimer(name: string): void {
    this.timers.set(name, performance.now());
  }

  /**
   * End a timer and log the duration at DEBUG.
   * @returns Duration in milliseconds, or -1 if timer not found
   */
  endTimer(
    name: string,
    module: string,
    message: string,
    data?: Record<string, unknown>,
  ): number {
    const startTime = this.timers.get(name);
    if (startTime === undefined) {
      this.warn('Logger', `Timer '${name}' not found`);
      return -1;
    }

    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    this.timers.delete(name);

    this.log(LogLevel.DEBUG, module, message, { ...data, durationMs }, durationMs);
    return durationMs;
  }

  // -------------------------------------------------------------------------
  // Output Formatting
  // -------------------------------------------------------------------------

  private formatHumanReadable(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(entry.levelName.padEnd(5), `[${entry.module}]`);
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
   * Append a JSON line to the log file, after every line queued before it.
   */
  private writeFile(filePath: string, entry: LogEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    this.fileTail = this.fileTail.then(() => this.append(filePath, line));
  }

  private async append(filePath: string, line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(filePath), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(filePath, line);
    } catch (err) {
      (this.config.write ?? writeStderr)(
        `[Logger] Failed to write to ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Wait for pending file writes.
   */
  async flush(): Promise<void> {
    let tail: Promise<void>;
    do {
      tail = this.fileTail;
      await tail;
    } while (tail !== this.fileTail);
  }

  /**
   * Create a child logger with a fixed module name.
   */
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
}

// ============================================================================
// Global Logger Instance
// ============================================================================

/**
 * Global logger instance.
 * Configured once at startup by the system facade.
 */
export const globalLogger = new Logger();

/**
 * Create a module logger from the global instance.
 */
export function createModuleLogger(module: string): ModuleLogger {
  return globalLogger.child(module);
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Parse log level from string.
 */
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
    case 'SILENT':
    case 'OFF':
    case 'NONE':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}
