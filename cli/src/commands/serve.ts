import process from 'node:process';
import { describeError, resolveServingRoot, type Logger } from '@rangeserve/core';
import { startRangeServer, type RangeServer } from '@rangeserve/server';
import { resolveServeConfig, type ServeFlags } from '../lib/serve-config.js';

export interface ServeOptions extends ServeFlags {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Interface to bind; all interfaces when omitted. */
  host?: string;
  logger?: Partial<Logger>;
  print?: (line: string) => void;
}

/**
 * Validates the configuration, binds the server and prints where it is
 * serving. Rejects with a config error (C001-C004) when it cannot start.
 */
export async function runServe(options: ServeOptions = {}): Promise<RangeServer> {
  const print = options.print ?? ((line: string) => globalThis.console.log(line));
  const config = resolveServeConfig(options, options.env);
  const root = await resolveServingRoot(config.directory, options.cwd);

  const server = await startRangeServer({
    root,
    port: config.port,
    host: options.host,
    logger: options.logger,
  });

  print(`Serving at ${server.url}`);
  print(`Directory: ${root}`);
  print('Press Ctrl+C to stop');
  return server;
}

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownOptions {
  signals?: SignalSource;
  print?: (line: string) => void;
  exit?: (code: number) => void;
}

/**
 * Stops the server and exits 0 on the first SIGINT or SIGTERM.
 */
export function stopOnSignals(server: RangeServer, options: ShutdownOptions = {}): void {
  const signals = options.signals ?? process;
  const print = options.print ?? ((line: string) => globalThis.console.log(line));
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let stopping = false;

  const shutdown = () => {
    if (stopping) {
      return;
    }
    stopping = true;
    print('Shutting down...');
    void server
      .stop()
      .catch((error: unknown) => print(`Error while stopping: ${describeError(error)}`))
      .finally(() => exit(0));
  };

  signals.once('SIGINT', shutdown);
  signals.once('SIGTERM', shutdown);
}
