import { EnvConfigSchema, type EnvConfig } from '@tickcast/schemas';
import { ZodError } from 'zod';
import { createLogger } from '../logger/logger';

const logger = createLogger({ name: 'config', service: 'config' });

/**
 * Parse streaming server configuration from an environment map.
 *
 * @throws ZodError when a variable is present but invalid
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvConfigSchema.parse(env);
}

/**
 * Flatten zod issues into `VAR: message` lines for startup logging
 */
export function formatEnvIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate environment variables on application startup.
 *
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    const config = parseEnv(env);
    logger.info({ nodeEnv: config.NODE_ENV }, 'Environment variables validated');
    return config;
  } catch (error) {
    logger.error('Invalid environment variables:');
    if (error instanceof ZodError) {
      for (const line of formatEnvIssues(error)) {
        logger.error(line);
      }
    } else {
      logger.error({ err: error instanceof Error ? error.message : String(error) });
    }
    logger.error('Check the STREAM_* variables in your environment or .env file.');
    process.exit(1);
  }
}
