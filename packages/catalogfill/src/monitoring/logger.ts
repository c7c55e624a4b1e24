import { createWriteStream, type WriteStream } from 'node:fs';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  workerId?: string;
  [key: string]: unknown;
}

/** Destination for formatted log entries. */
export interface LogSink {
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  workerId?: string;
  sinks?: LogSink[];
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret redaction ---

const SENSITIVE_KEYS = new Set([
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apiKey',
  'api-key',
  'apikey',
  'authorization',
  'cookie',
  'credential',
  'service_key',
  'serviceKey',
  'access_token',
  'accessToken',
]);

const SENSITIVE_PATTERNS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /\/bot\d+:[A-Za-z0-9_-]+/g, // Telegram bot tokens embedded in URLs
];

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    const lowerKey = key.toLowerCase();
    for (const sensitive of SENSITIVE_KEYS) {
      if (lowerKey.includes(sensitive.toLowerCase())) {
        return '[REDACTED]';
      }
    }
    let redacted = value;
    for (const pattern of SENSITIVE_PATTERNS) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) =>
        isPlainRecord(item) ? redactObject(item) : redactValue(key, item)
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

// --- Formatting ---

const pad = (n: number): string => String(n).padStart(2, '0');

/** `dd/mm/yyyy HH:MM:SS` in local time. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const ENVELOPE_KEYS = new Set(['level', 'msg', 'timestamp', 'service', 'workerId']);

/**
 * Plain-text rendering used for per-worker log files:
 * `dd/mm/yyyy HH:MM:SS [LEVEL] [Worker <id>]: <msg> {extra}`
 */
export function formatTextLine(entry: LogEntry): string {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!ENVELOPE_KEYS.has(key)) extra[key] = value;
  }
  const worker = entry.workerId ? ` [Worker ${entry.workerId}]` : '';
  const tail = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : '';
  return `${formatLocalTimestamp(new Date(entry.timestamp))} [${entry.level.toUpperCase()}]${worker}: ${entry.msg}${tail}`;
}

// --- Sinks ---

/**
 * JSON-lines sink on the console. With `stderr: true` every level goes to
 * stderr, keeping stdout free for machine-readable output.
 */
export function consoleSink(opts: { stderr?: boolean } = {}): LogSink {
  return {
    write(entry) {
      const line = JSON.stringify(entry);
      if (opts.stderr) {
        console.error(line);
        return;
      }
      switch (entry.level) {
        case 'error':
          console.error(line);
          break;
        case 'warn':
          console.warn(line);
          break;
        case 'debug':
          console.debug(line);
          break;
        default:
          console.log(line);
      }
    },
  };
}

/** Plain-text sink; the file is truncated when the sink is created. */
export function fileSink(path: string): LogSink {
  const stream: WriteStream = createWriteStream(path, { flags: 'w', encoding: 'utf-8' });
  let failure: Error | null = null;
  stream.on('error', (err) => {
    failure = err;
    console.error(JSON.stringify({ level: 'error', msg: 'Log file unavailable', path, error: err.message }));
  });
  return {
    write(entry) {
      if (failure) return;
      stream.write(`${formatTextLine(entry)}\n`);
    },
    close() {
      if (failure) return Promise.resolve();
      return new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}

export interface MemorySink extends LogSink {
  entries: LogEntry[];
  messages(level?: LogLevel): string[];
}

export function memorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    write(entry) {
      entries.push(entry);
    },
    messages(level) {
      return entries.filter((e) => !level || e.level === level).map((e) => e.msg);
    },
  };
}

// --- Logger class ---

export class Logger {
  private level: LogLevel;
  private service: string;
  private sinks: LogSink[];
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? 'info';
    this.service = opts.service ?? 'catalogfill';
    this.sinks = opts.sinks ?? [consoleSink()];
    this.context = {};

    if (opts.workerId) this.context.workerId = opts.workerId;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
      sinks: this.sinks,
    });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  /** Flushes and closes sinks that hold resources. Children share the parent's sinks. */
  async close(): Promise<void> {
    for (const sink of this.sinks) {
      await sink.close?.();
    }
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...(data ? redactObject(data) : {}),
    };

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

/** Error message for logging, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
