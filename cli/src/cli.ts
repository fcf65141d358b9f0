#!/usr/bin/env node
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import { formatError, isRangeServeError, loadEnv, type Logger } from '@rangeserve/core';
import { runServe, stopOnSignals } from './commands/serve.js';
import { runFixture } from './commands/fixture.js';
import { runProbe } from './commands/probe.js';
import { formatHexPreview, runFetch } from './commands/fetch.js';
import { createCliLogger } from './lib/logger.js';
import { LOG_LEVEL_ENV, resolveLogLevel } from './lib/serve-config.js';

const cli = meow(
  `
Usage
  $ rangeserve <command> [options]

Commands
  serve               Serve a directory with byte-range support (default)
  fixture             Write a deterministic test file (byte i = i % 251)
  probe <url>         Show size, content type and range support of a served file
  fetch <url>         Read a slice of a served file

Options
  --port, -p          Port to listen on (default 8080, or RANGESERVE_PORT)
  --directory, -d     Directory to serve (default current directory, or RANGESERVE_DIRECTORY)
  --out               Output file for fixture and fetch
  --size              Fixture size in bytes
  --offset            First byte to fetch
  --length            Number of bytes to fetch
  --timeout           Per-request timeout in milliseconds for probe and fetch (default 30000)

Environment
  RANGESERVE_LOG_LEVEL  debug, info, warn or error (default info)

Examples
  $ rangeserve serve --port 8000 --directory ./data
  $ rangeserve fixture --out=./data/pbmc.h5ad --size=1048576
  $ rangeserve probe http://localhost:8000/pbmc.h5ad
  $ rangeserve fetch http://localhost:8000/pbmc.h5ad --offset=1024 --length=64
`,
  {
    importMeta: import.meta,
    flags: {
      port: { type: 'number', shortFlag: 'p' },
      directory: { type: 'string', shortFlag: 'd' },
      out: { type: 'string' },
      size: { type: 'number' },
      offset: { type: 'number' },
      length: { type: 'number' },
      timeout: { type: 'number' },
    },
  },
);

async function main(): Promise<void> {
  const [command = 'serve', target] = cli.input;
  const { flags } = cli;
  const print = (line: string) => globalThis.console.log(line);

  let logger: Logger;
  try {
    loadEnv();
    logger = createCliLogger({ level: resolveLogLevel(process.env[LOG_LEVEL_ENV]) });
  } catch (error) {
    reportError(error);
    return;
  }

  try {
    switch (command) {
      case 'serve': {
        const server = await runServe({ port: flags.port, directory: flags.directory, logger, print });
        stopOnSignals(server, { print });
        return;
      }
      case 'fixture': {
        if (!flags.out || flags.size === undefined) {
          logger.error('Error: fixture needs --out and --size.');
          process.exitCode = 1;
          return;
        }
        const result = await runFixture({ out: flags.out, size: flags.size });
        print(`Wrote ${result.size} bytes to ${chalk.bold(result.path)}`);
        return;
      }
      case 'probe': {
        if (!target) {
          logger.error('Error: probe needs a URL.');
          process.exitCode = 1;
          return;
        }
        const result = await runProbe({ url: target, timeoutMs: flags.timeout });
        print(`${chalk.bold('URL')}            ${result.url}`);
        print(`${chalk.bold('Size')}           ${result.size}`);
        print(`${chalk.bold('Content-Type')}   ${result.contentType ?? chalk.dim('(none)')}`);
        print(`${chalk.bold('Accept-Ranges')}  ${result.acceptsRanges ? chalk.green('bytes') : chalk.yellow('no')}`);
        return;
      }
      case 'fetch': {
        if (!target || flags.offset === undefined || flags.length === undefined) {
          logger.error('Error: fetch needs a URL, --offset and --length.');
          process.exitCode = 1;
          return;
        }
        const result = await runFetch({
          url: target,
          offset: flags.offset,
          length: flags.length,
          out: flags.out,
          timeoutMs: flags.timeout,
          logger,
        });
        if (result.outPath) {
          print(`Wrote ${result.bytes.length} bytes to ${chalk.bold(result.outPath)}`);
        } else {
          for (const line of formatHexPreview(result.bytes, flags.offset)) {
            print(line);
          }
        }
        return;
      }
      default: {
        cli.showHelp();
      }
    }
  } catch (error) {
    reportError(error);
  }
}

function reportError(error: unknown): void {
  const message = isRangeServeError(error)
    ? formatError(error)
    : `Error: ${error instanceof Error ? error.message : String(error)}`;
  globalThis.console.error(chalk.red(message));
  process.exitCode = 1;
}

void main();
