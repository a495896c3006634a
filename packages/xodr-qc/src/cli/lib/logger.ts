/**
 * CLI logging
 *
 * One entry per line on stderr: JSON in `--json` mode, coloured text
 * otherwise. Reports written to stdout stay parseable.
 *
 * @module cli/lib/logger
 */

import {
  LOG_LEVEL_PRIORITY,
  type LogLevel,
  type LogMetadata,
  type StructuredLogger,
} from '../../core/utils/logger.js';

export interface CLILoggerConfig {
  readonly level: LogLevel;
  readonly json: boolean;
  /** Metadata added to every entry */
  readonly context?: LogMetadata;
  /** Line sink, stderr by default */
  readonly write?: (line: string) => void;
}

const SERVICE = 'xodr-qc';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const KEY = '\x1b[36m';

/** Colour and padded label per level */
const LEVEL_STYLE: Record<LogLevel, string> = {
  debug: '\x1b[90mDEBUG',
  info: '\x1b[34mINFO ',
  warn: '\x1b[33mWARN ',
  error: '\x1b[31mERROR',
};

const writeStderr = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

export class CLILogger implements StructuredLogger {
  private readonly config: CLILoggerConfig;
  private command: string | null = null;
  private startedAt = Date.now();

  constructor(config: CLILoggerConfig) {
    this.config = config;
  }

  formatJson(level: LogLevel, message: string, metadata?: LogMetadata, timestamp = new Date().toISOString()): string {
    return JSON.stringify({
      timestamp,
      level,
      message,
      service: SERVICE,
      ...(this.command !== null ? { command: this.command } : {}),
      ...this.config.context,
      ...metadata,
    });
  }

  formatHuman(level: LogLevel, message: string, metadata?: LogMetadata, timestamp = new Date().toISOString()): string {
    const line = `${DIM}${timestamp}${RESET} ${LEVEL_STYLE[level]}${RESET} ${message}`;
    const pairs = Object.entries({ ...this.config.context, ...metadata }).map(
      ([key, value]) => `${KEY}${key}${RESET}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`
    );
    return pairs.length === 0 ? line : `${line} ${DIM}(${pairs.join(' ')})${RESET}`;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) return;
    const line = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
    (this.config.write ?? writeStderr)(line);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Tag later entries with the command and restart the duration clock
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startedAt = Date.now();
    this.info(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const elapsed = Date.now() - this.startedAt;
    const entry = { duration_ms: elapsed, ...metadata };
    if (success) {
      this.info(`Command completed in ${formatDuration(elapsed)}`, entry);
    } else {
      this.error(`Command failed after ${formatDuration(elapsed)}`, entry);
    }
  }

  /**
   * Render rows as an aligned text table (JSON array in JSON mode)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): string {
    if (this.config.json) return JSON.stringify(data);

    const first = data[0];
    if (first === undefined) return 'No data to display';

    const cols = columns ?? Object.keys(first);
    const cell = (row: Record<string, unknown>, col: string): string => String(row[col] ?? '');
    const widths = cols.map((col) => Math.max(col.length, ...data.map((row) => cell(row, col).length)));

    return [
      cols.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '),
      widths.map((width) => '-'.repeat(width)).join('-+-'),
      ...data.map((row) => cols.map((col, i) => cell(row, col).padEnd(widths[i] ?? 0)).join(' | ')),
    ].join('\n');
  }

  /**
   * Logger whose entries carry additional context and the current command
   */
  child(context: LogMetadata): CLILogger {
    const child = new CLILogger({ ...this.config, context: { ...this.config.context, ...context } });
    child.command = this.command;
    child.startedAt = this.startedAt;
    return child;
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    context: config.context,
    write: config.write,
  });
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${Math.floor(ms / 60000)}m ${((ms % 60000) / 1000).toFixed(1)}s`;
}
