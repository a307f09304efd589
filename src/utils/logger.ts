import { config } from '../config/env.config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type LogMethod = (message: string, ...args: unknown[]) => void;

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let minLevel: LogLevel = config.logLevel;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function normalizeLogArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return {
      name: arg.name,
      message: arg.message,
      stack: arg.stack,
    };
  }

  return arg;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function emit(level: Exclude<LogLevel, 'silent'>, scope: string | undefined, message: string, args: unknown[]) {
  if (LEVEL_VALUES[level] < LEVEL_VALUES[minLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const scopePrefix = scope ? `[${scope}] ` : '';
  const line = `[${timestamp}] [${level.toUpperCase()}] ${scopePrefix}${message}`;

  const normalizedArgs = args.map(normalizeLogArg);
  const printableArgs =
    level === 'warn' || level === 'error'
      ? normalizedArgs.map((a) => (typeof a === 'object' ? safeStringify(a) : a))
      : normalizedArgs;

  if (level === 'warn') {
    console.warn(line, ...printableArgs);
    return;
  }

  if (level === 'error') {
    console.error(line, ...printableArgs);
    return;
  }

  console.log(line, ...printableArgs);
}

export function createScopedLogger(scope?: string) {
  const log = (level: Exclude<LogLevel, 'silent'>): LogMethod => (message, ...args) => {
    emit(level, scope, message, args);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

export type ScopedLogger = ReturnType<typeof createScopedLogger>;

export const logger = {
  ...createScopedLogger(),
  scope: (scope: string): ScopedLogger => createScopedLogger(scope),
};
