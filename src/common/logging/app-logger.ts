import { LoggerService } from '@nestjs/common';
import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type AppLoggerOptions = {
  /** When set, every line is mirrored to this file as JSON. */
  logFile?: string;
  production?: boolean;
};

export function formatConsole(
  level: string,
  context: string | undefined,
  message: string,
  now: Date = new Date(),
): string {
  const prefix = context ? `[${context}] ` : '';
  return `${now.toISOString()} ${level.toUpperCase()}: ${prefix}${message}`;
}

class AppLogger implements LoggerService {
  private mirrorReady = false;

  constructor(private readonly options: AppLoggerOptions) {}

  log(message: unknown, context?: string) {
    const text = stringify(message);
    this.mirror('log', { context, message: text });
    console.log(formatConsole('log', context, text));
  }

  error(message: unknown, trace?: string, context?: string) {
    const text = stringify(message);
    if (!trace && message instanceof Error) {
      trace = message.stack;
    }
    this.mirror('error', { context, message: text, trace });
    console.error(formatConsole('error', context, text), trace || '');
  }

  warn(message: unknown, context?: string) {
    const text = stringify(message);
    this.mirror('warn', { context, message: text });
    console.warn(formatConsole('warn', context, text));
  }

  debug(message: unknown, context?: string) {
    const text = stringify(message);
    this.mirror('debug', { context, message: text });
    if (!this.options.production) {
      console.debug(formatConsole('debug', context, text));
    }
  }

  verbose(message: unknown, context?: string) {
    const text = stringify(message);
    this.mirror('verbose', { context, message: text });
    if (!this.options.production) {
      console.info(formatConsole('verbose', context, text));
    }
  }

  private mirror(level: string, payload: Record<string, string | undefined>) {
    const file = this.options.logFile;
    if (!file) return;
    try {
      if (!this.mirrorReady) {
        const dir = dirname(file);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        this.mirrorReady = true;
      }
      const entry = { level, timestamp: new Date().toISOString(), ...payload };
      appendFileSync(file, JSON.stringify(entry) + '\n', { encoding: 'utf8' });
    } catch (err) {
      // the console line is still written
      console.warn('[app-logger] failed to mirror log entry', err);
    }
  }
}

export function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return describeError(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** `Name: message`, followed by the direct cause when there is one. */
export function describeError(error: Error): string {
  const text = error.message ? `${error.name}: ${error.message}` : error.name;
  const { cause } = error;
  if (cause instanceof Error) {
    return `${text} | cause: ${cause.name}: ${cause.message}`;
  }
  return cause === undefined ? text : `${text} | cause: ${stringify(cause)}`;
}

export function createAppLogger(
  options: AppLoggerOptions = {
    logFile: process.env.LOG_FILE,
    production: process.env.NODE_ENV === 'production',
  },
): LoggerService {
  return new AppLogger(options);
}
