/**
 * Structured logging for the host and the modules it supervises.
 */

import type { Config } from '../config.js';

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: 'json' | 'text';
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export class ContextLogger {
  private _name: string;
  private _format: 'json' | 'text';
  private _level: LogLevel;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _moduleId: string | null = null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'modhost';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  static fromConfig(config: Config, name: string = 'modhost', output?: WritableOutput): ContextLogger {
    const format = config.getString('logging.format', 'text') === 'json' ? 'json' : 'text';
    const rawLevel = config.getString('logging.level', 'info');
    const level: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info';
    return new ContextLogger({ name, format, level, output });
  }

  get name(): string {
    return this._name;
  }

  get moduleId(): string | null {
    return this._moduleId;
  }

  /**
   * Derive a logger that shares this logger's sink and level.
   */
  child(name: string, moduleId?: string | null): ContextLogger {
    const logger = new ContextLogger({
      name: `${this._name}.${name}`,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
    logger._moduleId = moduleId === undefined ? this._moduleId : moduleId;
    return logger;
  }

  /**
   * Logger handed to a module's context; every line carries the module id.
   */
  forModule(moduleId: string): ContextLogger {
    return this.child(moduleId, moduleId);
  }

  isEnabled(level: LogLevel): boolean {
    return (LEVELS[level] ?? 20) >= this._levelValue;
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isEnabled(levelName)) return;

    let redactedExtra = extra ?? null;
    if (extra != null && this._redactSensitive) {
      const copy: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(extra)) {
        copy[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
      redactedExtra = copy;
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        module_id: this._moduleId,
        logger: this._name,
        extra: redactedExtra === null ? null : Object.fromEntries(
          Object.entries(redactedExtra).map(([k, v]) => [k, v instanceof Error ? formatValue(v) : v]),
        ),
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const lvl = levelName.toUpperCase();
    let extrasStr = '';
    if (redactedExtra) {
      extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
    }
    this._output.write(`${ts} [${lvl}] ${this._name}: ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

/**
 * A logger that writes nowhere. Used when a component is built without one.
 */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ output: { write: () => undefined } });
}
