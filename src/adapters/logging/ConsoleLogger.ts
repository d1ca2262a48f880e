import { Logger, LogLevel } from '../../core/services/Logger';
import fs from 'fs';
import path from 'path';

type RotationMode = 'none' | 'size';

export interface ConsoleLoggerOptions {
  rotate?: RotationMode;
  maxSizeBytes?: number;
  maxFiles?: number;
  // Mirror lines to the console. The interactive CLI turns this off so logs don't interleave with output.
  console?: boolean;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class ConsoleLogger implements Logger {
  private timers: Map<string, number> = new Map();
  private filePath?: string;
  private rotation: RotationMode;
  private maxSizeBytes: number = 5 * 1024 * 1024;
  private maxFiles: number = 3;
  private toConsole: boolean;
  private currentSize: number = 0;

  constructor(
    private logLevel: LogLevel = 'info',
    filePath?: string,
    options: ConsoleLoggerOptions = {}
  ) {
    this.rotation = options.rotate ?? 'none';
    this.toConsole = options.console ?? true;
    if (options.maxSizeBytes) this.maxSizeBytes = options.maxSizeBytes;
    if (options.maxFiles) this.maxFiles = options.maxFiles;
    if (filePath) this.openFile(filePath);
  }

  private openFile(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
    this.currentSize = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
  }

  // app.log -> app.log.1 -> ... -> app.log.<maxFiles>; the oldest falls off.
  private rotate(filePath: string): void {
    const oldest = `${filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const src = `${filePath}.${i}`;
      if (fs.existsSync(src)) fs.renameSync(src, `${filePath}.${i + 1}`);
    }
    if (fs.existsSync(filePath)) fs.renameSync(filePath, `${filePath}.1`);
    this.currentSize = 0;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  }

  private toSerializable(arg: unknown): unknown {
    if (arg instanceof Error) {
      return { name: arg.name, message: arg.message, stack: arg.stack };
    }
    return arg;
  }

  private buildEntry(level: LogLevel, message: string, args: unknown[]): string {
    const data = args.length === 0 ? null : args.length === 1 ? this.toSerializable(args[0]) : args.map((a) => this.toSerializable(a));
    const entry = { date: new Date().toISOString(), level: level.toUpperCase(), msg: message, data };
    try {
      return JSON.stringify(entry);
    } catch {
      // circular structures and bigints
      return JSON.stringify({ ...entry, data: String(data) });
    }
  }

  private writeToFile(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.filePath) return;
    const line = this.buildEntry(level, message, args) + '\n';
    const bytes = Buffer.byteLength(line, 'utf8');
    try {
      if (this.rotation === 'size' && this.currentSize > 0 && this.currentSize + bytes > this.maxSizeBytes) {
        this.rotate(this.filePath);
      }
      fs.appendFileSync(this.filePath, line, 'utf8');
      this.currentSize += bytes;
    } catch (error) {
      const failedPath = this.filePath;
      this.filePath = undefined;
      console.error(`Log file ${failedPath} disabled after write failure:`, error);
    }
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    if (this.toConsole) {
      const line = this.formatMessage(level, message);
      console[level](line, ...args);
    }
    this.writeToFile(level, message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }

    const duration = Date.now() - startTime;
    this.timers.delete(label);
    this.info(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }

    const duration = Date.now() - startTime;
    const logMessage = message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`;
    this.info(logMessage, ...args);
  }
}
