import {
  config,
  resolveTransferConfig,
  type TransferConfig,
} from '../config.js';
import { logDebug } from '../observability.js';

import {
  InstrumentedClient,
  type TransferResponse,
} from './transfer/client.js';
import { RedirectPolicy } from './transfer/redirect-policy.js';
import { TransferRegistry } from './transfer/registry.js';
import { StatsReporter } from './transfer/stats-reporter.js';
import {
  createConfigTlsPolicy,
  type TlsPolicy,
} from './transfer/tls-policy.js';
import {
  stderrTraceSink,
  TraceEmitter,
  type TraceSink,
} from './transfer/trace.js';
import {
  TransportCache,
  type DispatcherFactory,
} from './transfer/transport-cache.js';

export interface TransferSessionOptions {
  /** Overrides merged over the environment configuration and validated. */
  readonly config?: Partial<TransferConfig>;
  readonly tlsPolicy?: TlsPolicy;
  readonly traceSink?: TraceSink;
  readonly createDispatcher?: DispatcherFactory;
  readonly now?: () => Date;
}

/**
 * Owns everything that lives for one process run: configuration, the
 * statistics registry, the trace emitter, the per-host transports and the
 * reporter that flushes statistics at the end.
 */
export class TransferSession {
  readonly config: TransferConfig;
  readonly registry = new TransferRegistry();
  readonly tracer: TraceEmitter;

  private readonly transports: TransportCache;
  private readonly reporter: StatsReporter;
  private readonly redirectPolicy: RedirectPolicy;
  private shutdownResult: Promise<string | undefined> | undefined;

  constructor(options: TransferSessionOptions = {}) {
    this.config = resolveTransferConfig(options.config ?? {});
    this.tracer = new TraceEmitter(options.traceSink ?? stderrTraceSink, {
      verbose: this.config.traceHttp,
      unsafeDebug: this.config.debugHttp,
    });
    this.redirectPolicy = new RedirectPolicy({ tracer: this.tracer });

    this.transports = new TransportCache({
      settings: this.config,
      tlsPolicy: options.tlsPolicy ?? createConfigTlsPolicy(this.config),
      createClient: (dispatcher) =>
        new InstrumentedClient({
          dispatcher,
          registry: this.registry,
          tracer: this.tracer,
          redirectPolicy: this.redirectPolicy,
          logStats: this.config.logStats,
        }),
      ...(options.createDispatcher
        ? { createDispatcher: options.createDispatcher }
        : {}),
    });

    this.reporter = new StatsReporter({
      registry: this.registry,
      logDir: this.config.logDir,
      concurrentTransfers: this.config.concurrentTransfers,
      batchTransfers: this.config.batchTransfers,
      version: config.client.version,
      ...(options.now ? { now: options.now } : {}),
    });
  }

  /** Cached client for `host` (which may include a port). */
  client(host: string): InstrumentedClient {
    return this.transports.client(host);
  }

  /** Client for the host of `url`. */
  clientFor(url: string | URL): InstrumentedClient {
    return this.client(new URL(url).host);
  }

  /** Files a transfer under `key` for the statistics report. */
  logTransfer(
    key: string,
    response: Pick<TransferResponse, 'transferId'>
  ): void {
    if (!this.config.logStats) return;
    this.registry.addToBucket(key, response.transferId);
  }

  /** Persists collected statistics; a no-op when statistics are disabled. */
  async reportStats(): Promise<string | undefined> {
    if (!this.config.logStats) return undefined;
    return this.reporter.report();
  }

  async close(): Promise<void> {
    await this.transports.close();
  }

  /** Reports, closes and clears once; later calls share the first result. */
  shutdown(): Promise<string | undefined> {
    this.shutdownResult ??= this.runShutdown();
    return this.shutdownResult;
  }

  private async runShutdown(): Promise<string | undefined> {
    const file = await this.reportStats();
    await this.close();
    this.registry.clear();
    logDebug('Transfer session closed', { statsFile: file });
    return file;
  }
}

export function createTransferSession(
  options: TransferSessionOptions = {}
): TransferSession {
  return new TransferSession(options);
}
