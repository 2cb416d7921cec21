import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export interface FileLoggerOptions {
  logFilePath?: string;
  levels?: LogLevel[];
  mirrorToConsole?: boolean;
}

/** Appends `[ts] [LEVEL] message` lines to a file, optionally echoing to the console. */
export class FileLogger extends ConsoleLogger {
  private readonly stream: WriteStream;
  private readonly mirrorToConsole: boolean;

  constructor(context?: string, options: FileLoggerOptions = {}) {
    super(context ?? 'FileLogger', { logLevels: options.levels });

    const targetPath = resolve(process.cwd(), options.logFilePath ?? 'logs/timekeeper.log');
    const dir = dirname(targetPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.stream = createWriteStream(targetPath, { flags: 'a' });
    this.mirrorToConsole = options.mirrorToConsole !== false;
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    if (!this.isLevelEnabled('log')) return;
    this.write('LOG', message, optionalParams);
    if (this.mirrorToConsole) super.log(message, ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    if (!this.isLevelEnabled('error')) return;
    this.write('ERROR', message, optionalParams);
    if (this.mirrorToConsole) super.error(message, ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    if (!this.isLevelEnabled('warn')) return;
    this.write('WARN', message, optionalParams);
    if (this.mirrorToConsole) super.warn(message, ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    if (!this.isLevelEnabled('debug')) return;
    this.write('DEBUG', message, optionalParams);
    if (this.mirrorToConsole) super.debug(message, ...optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    if (!this.isLevelEnabled('verbose')) return;
    this.write('VERBOSE', message, optionalParams);
    if (this.mirrorToConsole) super.verbose(message, ...optionalParams);
  }

  close(): void {
    this.stream.end();
  }

  private write(level: string, message: unknown, optionalParams: unknown[]) {
    const ts = new Date().toISOString();
    const serialized = [message, ...optionalParams].map(serialize).join(' ');
    this.stream.write(`[${ts}] [${level}] ${serialized}\n`);
  }
}

export function serialize(entry: unknown): string {
  if (entry instanceof Error) return entry.stack ?? entry.message;
  if (typeof entry === 'object' && entry !== null) {
    try {
      return JSON.stringify(entry);
    } catch {
      return String(entry);
    }
  }
  return String(entry);
}
