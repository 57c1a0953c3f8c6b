// src/logger.ts

import { COMMAND_NAMES } from './constants/constants.js';
import {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/nibe-types.js';

type Formatter = (value: unknown) => string;

const HEADER_KEYS: ReadonlySet<string> = new Set(['logger', 'address', 'command', 'register', 'host', 'port']);

export class Logger {
  private static readonly LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
  private static readonly ALL_FIELDS: readonly LogField[] = [
    'timestamp',
    'level',
    'logger',
    'address',
    'command',
    'register',
    'host',
  ];

  static isLevel(value: string): value is LogLevel {
    return Logger.LEVELS.some(level => level === value);
  }

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private readonly COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [...Logger.ALL_FIELDS];
  private customFormatters: Partial<Record<LogField, Formatter>> = {};
  private mutedCommands: Set<number> = new Set();
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatField(field: LogField, value: unknown, fallback: Formatter): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log record into console arguments.
   * @param level - Log level
   * @param args - Arguments to be logged
   * @param context - Context object, merged over the global context
   * @returns Arguments for console output
   */
  private format(level: LogLevel, args: unknown[], context: LogContext): unknown[] {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';
    const ctx: LogContext = { ...this.globalContext, ...context };

    const header: string[] = [];
    if (this.logFormat.includes('timestamp')) header.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) header.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && ctx.logger) {
      header.push(this.formatField('logger', ctx.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('address') && typeof ctx.address === 'number') {
      header.push(
        this.formatField('address', ctx.address, v => `[A:0x${Number(v).toString(16).padStart(2, '0')}]`)
      );
    }
    if (this.logFormat.includes('command') && typeof ctx.command === 'number') {
      const name = COMMAND_NAMES[ctx.command] ?? 'UNKNOWN';
      header.push(
        this.formatField(
          'command',
          ctx.command,
          v => `[C:0x${Number(v).toString(16).padStart(2, '0')}/${name}]`
        )
      );
    }
    if (this.logFormat.includes('register') && typeof ctx.register === 'number') {
      header.push(this.formatField('register', ctx.register, v => `[R:${String(v)}]`));
    }
    if (this.logFormat.includes('host') && ctx.host) {
      const endpoint = typeof ctx.port === 'number' ? `${ctx.host}:${ctx.port}` : ctx.host;
      header.push(this.formatField('host', endpoint, v => `[H:${String(v)}]`));
    }

    const formattedArgs: unknown[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return arg;
    });

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(ctx)) {
      if (!HEADER_KEYS.has(key) && value !== undefined) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${header.join('')}${reset}`, ...formattedArgs];
  }

  /**
   * Decides whether a record passes the enabled flag, mute filters and level thresholds.
   */
  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    if (typeof context.command === 'number' && this.mutedCommands.has(context.command)) {
      return false;
    }
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none' || categoryLevel === undefined) return false;
      return Logger.LEVELS.indexOf(level) >= Logger.LEVELS.indexOf(categoryLevel);
    }
    return Logger.LEVELS.indexOf(level) >= Logger.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    this.watchCallback?.({ level, args, context: { ...this.globalContext, ...context } });

    const formatted = this.format(level, args, context);
    // console.trace печатает стек, поэтому trace уходит в debug
    const method = level === 'trace' ? 'debug' : level;
    console[method](...formatted);
  }

  /**
   * Splits off a trailing plain object as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isPlainObject(lastArg)) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (!Logger.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !Logger.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enableColors(): void {
    this.useColors = true;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => Logger.ALL_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${Logger.ALL_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: Formatter): void {
    this.customFormatters[field] = formatter;
  }

  /** Drops every record whose context names this command code */
  mute(command: number): void {
    this.mutedCommands.add(command);
  }

  unmute(command: number): void {
    this.mutedCommands.delete(command);
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  resetCounts(): void {
    this.logCounts = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  }

  /**
   * Creates a logger bound to a category.
   * @param name - category name, shown in the header and used for per-category levels
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isPlainObject(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/** Shared instance every module derives its category logger from */
export const rootLogger = new Logger();
