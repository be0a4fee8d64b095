/**
 * Structured logging for registry runs.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: string;
  level?: string;
  redactSensitive?: boolean;
  output?: WritableOutput;
  runId?: string | null;
  component?: string | null;
}

export class ContextLogger {
  private _name: string;
  private _format: string;
  private _level: string;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _runId: string | null;
  private _component: string | null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'mesh-registry';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    // stderr keeps stdout free for anything the caller pipes
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
    this._runId = options?.runId ?? null;
    this._component = options?.component ?? null;
  }

  get runId(): string | null {
    return this._runId;
  }

  get level(): string {
    return this._level;
  }

  /** Same sink and settings, tagged with the pipeline stage that logs. */
  child(component: string): ContextLogger {
    return new ContextLogger({
      name: this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
      runId: this._runId,
      component,
    });
  }

  private _emit(levelName: string, message: string, extra?: Record<string, unknown> | null): void {
    const levelValue = LEVELS[levelName] ?? 20;
    if (levelValue < this._levelValue) return;

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
        run_id: this._runId,
        component: this._component,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      const comp = this._component ?? 'none';
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
      }
      this._output.write(`${ts} | ${lvl} | [${comp}] ${message}${extrasStr}\n`);
    }
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

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

/** Logger that drops everything; the default for library calls made without one. */
export const silentLogger = new ContextLogger({ output: { write: () => undefined }, level: 'fatal' });
