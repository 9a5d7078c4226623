#!/usr/bin/env node
import process from 'node:process';
import { pipeline } from 'node:stream/promises';

import { type CliValues, parseCliArgs, renderCliUsage } from './cli.js';
import { config } from './config.js';
import { getErrorMessage, RedirectError } from './errors.js';
import { logError } from './observability.js';
import {
  createTransferSession,
  type TransferSession,
} from './services/transfer-session.js';

function registerSignalHandlers(session: TransferSession): void {
  const shutdown = async (signal: string): Promise<void> => {
    process.stderr.write(`\n${signal} received, shutting down...\n`);
    await session.shutdown();
    process.exit(130);
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

async function runTransfer(values: CliValues, url: string): Promise<number> {
  const session = createTransferSession({
    config: {
      ...(values.trace ? { traceHttp: true } : {}),
      ...(values.debugHttp ? { debugHttp: true } : {}),
      ...(values.stats ? { logStats: true } : {}),
    },
  });
  registerSignalHandlers(session);

  try {
    const response = await session.clientFor(url).execute({
      url,
      method: values.method,
      headers: values.headers,
      ...(values.data === undefined ? {} : { body: values.data }),
    });

    await pipeline(response.body, process.stdout, { end: false });
    session.logTransfer(values.bucket, response);
    return 0;
  } catch (error: unknown) {
    const kind =
      error instanceof RedirectError ? 'Redirect refused' : 'Request failed';
    logError(
      kind,
      error instanceof Error ? error : { error: getErrorMessage(error) }
    );
    process.stderr.write(`${kind}: ${getErrorMessage(error)}\n`);
    return 1;
  } finally {
    await session.shutdown();
  }
}

async function main(args: readonly string[]): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
    return 1;
  }

  const { values } = parsed;
  if (values.help) {
    process.stdout.write(renderCliUsage());
    return 0;
  }
  if (values.version) {
    process.stdout.write(`${config.client.version}\n`);
    return 0;
  }
  if (!values.url || !URL.canParse(values.url)) {
    process.stderr.write(`A valid URL is required\n\n${renderCliUsage()}`);
    return 1;
  }

  return runTransfer(values, values.url);
}

process.exitCode = await main(process.argv.slice(2));
