import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { ILogger } from '../interfaces/ILogger.js';
import type { LogLevelType } from '../types/index.js';

export const LOG_LEVELS: readonly LogLevelType[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function isLogLevel(value: string): value is LogLevelType {
  return LOG_LEVELS.some(level => level === value);
}

export interface LoggerConfig {
  logToFile?: boolean;
  logFilePath?: string;
  logLevel?: LogLevelType;
  maxFileSize?: number; // in bytes
  enableConsole?: boolean;
}

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LEVEL_COLORS: Record<LogLevelType, (text: string) => string> = {
  ERROR: chalk.red,
  WARN: chalk.yellow,
  INFO: chalk.cyan,
  DEBUG: chalk.gray,
};

export class HarnessLogger implements ILogger {
  private config: Required<LoggerConfig>;
  private logStream?: fs.WriteStream;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      logToFile: config.logToFile ?? false,
      logFilePath: config.logFilePath ?? path.join(process.cwd(), 'harness.log'),
      logLevel: config.logLevel ?? 'INFO',
      maxFileSize: config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
      enableConsole: config.enableConsole ?? false
    };

    this.initializeFileLogging();
  }

  get level(): LogLevelType {
    return this.config.logLevel;
  }

  private initializeFileLogging() {
    if (!this.config.logToFile) {
      return;
    }

    fs.mkdirSync(path.dirname(this.config.logFilePath), { recursive: true });
    this.rotateIfOversized();
    this.logStream = fs.createWriteStream(this.config.logFilePath, { flags: 'a' });
    this.logStream.write(`\n=== Harness session started at ${new Date().toISOString()} ===\n`);
  }

  /** Keeps one previous generation, as `<file>.old`. */
  private rotateIfOversized() {
    const file = this.config.logFilePath;
    if (!fs.existsSync(file) || fs.statSync(file).size <= this.config.maxFileSize) {
      return;
    }
    fs.rmSync(`${file}.old`, { force: true });
    fs.renameSync(file, `${file}.old`);
  }

  shouldLog(level: LogLevelType): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.config.logLevel);
  }

  private formatMessage(level: LogLevelType, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ') : '';
    return `[${timestamp}] ${level}: ${message}${formattedArgs}`;
  }

  private writeLog(level: LogLevelType, message: string, args: unknown[]) {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, args);

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }

    if (this.config.enableConsole) {
      const colored = LEVEL_COLORS[level](formattedMessage);
      if (level === 'ERROR') {
        console.error(colored);
      } else {
        console.log(colored);
      }
    }
  }

  error(message: string, ...args: unknown[]) {
    this.writeLog('ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.writeLog('WARN', message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.writeLog('INFO', message, args);
  }

  debug(message: string, ...args: unknown[]) {
    this.writeLog('DEBUG', message, args);
  }

  /** Resolves once buffered file output has been flushed. */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }
}

let globalLogger: HarnessLogger | null = null;

export async function initializeLogger(config: LoggerConfig = {}): Promise<HarnessLogger> {
  if (globalLogger) {
    await globalLogger.close();
  }
  globalLogger = new HarnessLogger(config);
  return globalLogger;
}

export function getLogger(): HarnessLogger {
  if (!globalLogger) {
    globalLogger = new HarnessLogger();
  }
  return globalLogger;
}

export async function closeLogger(): Promise<void> {
  if (globalLogger) {
    await globalLogger.close();
    globalLogger = null;
  }
}
