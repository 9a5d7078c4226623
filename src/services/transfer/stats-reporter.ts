import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { logError, logInfo, logWarn } from '../../observability.js';

import type { TransferRegistry } from './registry.js';
import type { TransferRecord } from './types.js';

export interface StatsReporterOptions {
  readonly registry: TransferRegistry;
  readonly logDir: string;
  readonly concurrentTransfers: number;
  readonly batchTransfers: boolean;
  readonly version: string;
  readonly now?: () => Date;
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function responseDuration(record: TransferRecord): bigint {
  const { start, stop } = record.response;
  if (stop === 0n || stop < start) return 0n;
  return stop - start;
}

export function formatTransferLine(
  key: string,
  record: TransferRecord
): string {
  return [
    `key=${key}`,
    `reqheader=${record.request.headerSize}`,
    `reqbody=${record.request.bodySize}`,
    `resheader=${record.response.headerSize}`,
    `resbody=${record.response.bodySize}`,
    `restime=${responseDuration(record)}`,
    `status=${record.statusCode}`,
    `url=${record.url}`,
  ].join(' ');
}

/**
 * Writes the session's transfer statistics to
 * `<logDir>/http/http-<unix-seconds>.log`: one settings line, then one line
 * per bucketed transfer in bucket order.
 */
export class StatsReporter {
  private readonly options: StatsReporterOptions;
  private readonly now: () => Date;

  constructor(options: StatsReporterOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /** Resolves to the written file, or `undefined` when it could not be written. */
  async report(): Promise<string | undefined> {
    const timestamp = unixSeconds(this.now());
    const logBase = path.join(this.options.logDir, 'http');
    const file = path.join(logBase, `http-${timestamp}.log`);

    try {
      await mkdir(logBase, { recursive: true });
      await writeFile(file, this.render(timestamp), 'utf8');
    } catch (error: unknown) {
      logError(
        'Error logging http stats',
        error instanceof Error ? error : { error: String(error) }
      );
      return undefined;
    }

    logInfo(`HTTP Stats logged to file ${file}`);
    return file;
  }

  render(timestamp: number): string {
    const { registry, concurrentTransfers, batchTransfers, version } =
      this.options;
    const lines = [
      `concurrent=${concurrentTransfers} batch=${batchTransfers} time=${timestamp} version=${version}`,
    ];

    for (const { key, transferIds } of registry.buckets()) {
      for (const transferId of transferIds) {
        const record = registry.get(transferId);
        if (!record) {
          logWarn('Bucketed transfer has no statistics record', {
            key,
            transferId,
          });
          continue;
        }
        lines.push(formatTransferLine(key, record));
      }
    }

    return `${lines.join('\n')}\n`;
  }
}
