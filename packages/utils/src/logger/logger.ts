import pino from 'pino';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'stream:dispatcher') */
  name: string;
  /** Service binding (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger used across the workspace
 */
export interface Logger {
  readonly level: LogLevel;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  flush: () => Promise<void>;
}

// Singleton runtime config
let runtimeConfig: LogConfig | null = null;

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

/**
 * Wrap a pino instance in the workspace Logger shape.
 * String-only calls and object+message calls both go straight to pino.
 */
function wrap(instance: pino.Logger, level: LogLevel): Logger {
  function method(fn: pino.LogFn): LogMethod {
    return (obj, msg) => {
      if (typeof obj === 'string') {
        fn(obj);
      } else {
        fn(obj, msg);
      }
    };
  }

  return {
    level,
    trace: method(instance.trace.bind(instance)),
    debug: method(instance.debug.bind(instance)),
    info: method(instance.info.bind(instance)),
    warn: method(instance.warn.bind(instance)),
    error: method(instance.error.bind(instance)),
    fatal: method(instance.fatal.bind(instance)),
    child: (bindings) => wrap(instance.child(bindings), level),
    flush: () =>
      new Promise<void>((resolve, reject) => {
        instance.flush((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Create a structured logger instance
 *
 * Console output is JSON, or pino-pretty when NODE_ENV=development.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? getRuntimeConfig();
  const service = opts.service ?? getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);

  const isDevelopment = process.env.NODE_ENV === 'development';

  const instance = pino({
    name: opts.name,
    level,
    base: { service },
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return wrap(instance, level);
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('tickcast');
