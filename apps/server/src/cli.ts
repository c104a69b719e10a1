import { Command, InvalidArgumentError } from 'commander';
import type { EnvConfig } from '@tickcast/schemas';
import { SERVER_VERSION } from '@tickcast/stream-api';

export interface CliOptions {
  host?: string;
  port?: number;
}

export interface ListenOptions {
  host: string;
  port: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function buildProgram(): Command {
  return new Command()
    .name('tickcast')
    .description('Synthetic data streaming WebSocket server')
    .version(SERVER_VERSION)
    .option('--host <host>', 'host to bind (overrides STREAM_HOST)')
    .option('--port <port>', 'port to bind (overrides STREAM_PORT)', parsePort);
}

/**
 * Parse launch flags from a node-style argv (`[node, script, ...flags]`).
 */
export function parseCliOptions(argv: readonly string[], program: Command = buildProgram()): CliOptions {
  program.parse([...argv]);
  const { host, port } = program.opts<CliOptions>();
  return { host, port };
}

/** Flags win over environment values */
export function resolveListenOptions(config: EnvConfig, cli: CliOptions): ListenOptions {
  return {
    host: cli.host ?? config.STREAM_HOST,
    port: cli.port ?? config.STREAM_PORT,
  };
}
