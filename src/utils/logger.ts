/**
 * @fileOverview: Structured logger with console and rotating file output
 * @module: Logger
 * @keyFunctions:
 *   - info(): Log informational messages with context
 *   - warn(): Log warning messages with context
 *   - error(): Log error messages with context
 *   - debug(): Log debug messages with environment-based filtering
 * @dependencies:
 *   - fs: File system operations for log file management
 *   - path: Path manipulation for log file location
 * @context: The scheduler usually runs unattended, so every line also lands in a JSON-lines file under ~/.regdoc/logs next to the stderr output
 */
import * as fs from 'fs';
import * as path from 'path';

export type LogContext = Record<string, unknown>;

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private prefix: string;
  private logFilePath: string | null;
  private readonly maxSizeBytes = 10 * 1024 * 1024; // 10 MB
  private readonly maxArchives = 3;

  constructor(prefix: string = 'RegDoc') {
    this.prefix = prefix;
    this.logFilePath = this.initializeFileLogging();
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.DEBUG || this.shouldLog('debug')) {
      this.log('DEBUG', message, context);
    }
  }

  private shouldLog(level: string): boolean {
    const logLevel = process.env.LOG_LEVEL?.toLowerCase() || 'info';

    const currentLevelIndex = LEVEL_ORDER.indexOf(logLevel);
    const messageLevelIndex = LEVEL_ORDER.indexOf(level.toLowerCase());

    // Unknown LOG_LEVEL values fall back to info
    return messageLevelIndex >= (currentLevelIndex === -1 ? 1 : currentLevelIndex);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      prefix: this.prefix,
      message,
      ...(context && { context }),
    };

    const formattedMessage = `[${timestamp}] ${level} [${this.prefix}] ${message}`;
    const contextStr = context ? safeStringify(context) : '';

    // stdout is reserved for CLI results, diagnostics go to stderr
    switch (level) {
      case 'ERROR':
        console.error(formattedMessage, contextStr);
        break;
      case 'WARN':
        console.warn(formattedMessage, contextStr);
        break;
      case 'DEBUG':
        if (process.env.NODE_ENV === 'test') {
          console.debug(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
        break;
      default:
        if (process.env.NODE_ENV === 'test') {
          console.info(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
    }

    if (this.logFilePath) {
      try {
        this.rotateLogsIfNeeded();
        fs.appendFileSync(this.logFilePath, safeStringify(logEntry) + '\n', { encoding: 'utf8' });
      } catch (fileError) {
        // Stop writing to a file we cannot append to; console output continues
        this.logFilePath = null;
        console.error(
          `[${timestamp}] WARN [${this.prefix}] File logging disabled`,
          fileError instanceof Error ? fileError.message : String(fileError)
        );
      }
    }
  }

  private initializeFileLogging(): string | null {
    if (process.env.REGDOC_LOG_FILE === 'false' || process.env.NODE_ENV === 'test') {
      return null;
    }

    try {
      const home = process.env.USERPROFILE || process.env.HOME || process.cwd();
      const dir = process.env.REGDOC_LOG_DIR || path.join(home, '.regdoc', 'logs');
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      const logPath = path.join(dir, 'regdoc.log');
      if (!fs.existsSync(logPath)) {
        fs.writeFileSync(logPath, '', { encoding: 'utf8' });
      }
      return logPath;
    } catch (error) {
      console.error(
        `WARN [${this.prefix}] Could not initialize file logging`,
        error instanceof Error ? error.message : String(error)
      );
      return null;
    }
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFilePath) return;

    const base = this.logFilePath;
    const stats = fs.existsSync(base) ? fs.statSync(base) : null;
    if (!stats || stats.size < this.maxSizeBytes) return;

    const oldest = `${base}.${this.maxArchives}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }

    for (let i = this.maxArchives - 1; i >= 1; i--) {
      const src = `${base}.${i}`;
      if (fs.existsSync(src)) {
        fs.renameSync(src, `${base}.${i + 1}`);
      }
    }

    fs.renameSync(base, `${base}.1`);
    fs.writeFileSync(base, '', { encoding: 'utf8' });
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '<unserializable>';
  }
}

// Default logger instance
export const logger = new Logger('RegDoc');
