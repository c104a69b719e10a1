/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'stream:dispatcher', 'stream:stats'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
}

/**
 * Default log configuration
 *
 * Per-tick services stay quiet unless asked for:
 * LOG_LEVEL_STREAM_DISPATCHER=debug shows every data push.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    // Connection lifecycle and protocol
    stream: 'info',
    'stream:connection': 'info',
    'stream:protocol': 'info',

    // Per-tick loops
    'stream:dispatcher': 'warn',
    'stream:stats': 'warn',

    // Generators
    signals: 'warn',

    // Process
    server: 'info',
    config: 'info',
  },
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_STREAM_STATS=debug)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'stream' for 'stream:stats')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = getServiceFromName(serviceName);
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

/**
 * Build runtime config by merging defaults with environment.
 * Under test everything is silent unless LOG_LEVEL says otherwise.
 */
export function buildRuntimeConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  if (env.NODE_ENV === 'test') {
    return { defaultLevel: 'silent', services: {} };
  }
  return DEFAULT_LOG_CONFIG;
}
