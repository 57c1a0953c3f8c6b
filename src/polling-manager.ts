// src/polling-manager.ts
import { Mutex } from 'async-mutex';
import { DEFAULT_POLL_INTERVAL, DEFAULT_READ_TIMEOUT } from './constants/constants.js';
import { validateRegister } from './commands/validation.js';
import { NibeConfigError, NibeTimeoutError } from './errors.js';
import { rootLogger } from './logger.js';
import { PollingManagerOptions, PollingStats, RegisterReader } from './types/nibe-types.js';

/**
 * PollingManager периодически опрашивает список регистров.
 * Каждый проход читает регистры по порядку, без повторов.
 */
export class PollingManager {
  private readonly reader: RegisterReader;
  private readonly registers: number[];
  private readonly interval: number;
  private readonly timeout: number;
  private readonly onValue?: (register: number, value: number) => void;
  private readonly onTimeout?: (register: number) => void;
  private readonly onError?: (register: number, error: Error) => void;

  private readonly logger = rootLogger.createLogger('PollingManager');
  private readonly _passMutex: Mutex = new Mutex();
  private timerId: NodeJS.Timeout | null = null;
  private stopped: boolean = true;
  private stats: PollingStats = {
    passes: 0,
    values: 0,
    timeouts: 0,
    errors: 0,
    lastPassTime: null,
  };

  constructor(reader: RegisterReader, options: PollingManagerOptions) {
    const {
      registers,
      interval = DEFAULT_POLL_INTERVAL,
      timeout = DEFAULT_READ_TIMEOUT,
      onValue,
      onTimeout,
      onError,
    } = options;

    if (!Array.isArray(registers) || registers.length === 0) {
      throw new NibeConfigError('At least one register is required');
    }
    registers.forEach(validateRegister);
    if (!Number.isFinite(interval) || interval < 0) {
      throw new NibeConfigError(`Interval must be a non-negative number, got ${interval}`);
    }
    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new NibeConfigError(`Timeout must be a non-negative number, got ${timeout}`);
    }

    this.reader = reader;
    this.registers = [...registers];
    this.interval = interval;
    this.timeout = timeout;
    this.onValue = onValue;
    this.onTimeout = onTimeout;
    this.onError = onError;
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Polling already running');
      return;
    }
    this.stopped = false;
    this.logger.info(`Polling ${this.registers.length} registers every ${this.interval}ms`);
    this._scheduleNextRun(true);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.info('Polling stopped');
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  getStats(): PollingStats {
    return { ...this.stats };
  }

  /**
   * Runs one pass over all registers.
   * @returns register -> value, or null when the read timed out or failed
   */
  async pollOnce(): Promise<Map<number, number | null>> {
    return this._passMutex.runExclusive(async () => {
      const results = new Map<number, number | null>();
      for (const register of this.registers) {
        results.set(register, await this._readOne(register));
      }
      this.stats.passes++;
      this.stats.lastPassTime = Date.now();
      return results;
    });
  }

  private async _readOne(register: number): Promise<number | null> {
    let value: number;
    try {
      value = await this.reader.read(register, { timeout: this.timeout });
    } catch (err: unknown) {
      if (err instanceof NibeTimeoutError) {
        this.stats.timeouts++;
        this.logger.warn(`Register ${register} timed out`, { register });
        this.onTimeout?.(register);
        return null;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      this.stats.errors++;
      this.logger.error(`Register ${register} failed:`, error, { register });
      this.onError?.(register, error);
      return null;
    }
    this.stats.values++;
    this.onValue?.(register, value);
    return value;
  }

  private _scheduleNextRun(immediate: boolean = false): void {
    if (this.stopped) return;

    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }

    const delay = immediate ? 0 : this.interval;
    this.timerId = setTimeout(() => {
      this.timerId = null;
      if (this.stopped) return;
      void this._runPass().finally(() => this._scheduleNextRun());
    }, delay);
  }

  private async _runPass(): Promise<void> {
    try {
      await this.pollOnce();
    } catch (err: unknown) {
      this.logger.error('Polling pass failed:', err);
    }
  }
}
