import { type Agent, type Dispatcher, EnvHttpProxyAgent } from 'undici';

import type { TransferConfig } from '../../config.js';
import { getErrorMessage } from '../../errors.js';
import { logDebug, logWarn } from '../../observability.js';

import type { InstrumentedClient } from './client.js';
import type { TlsPolicy } from './tls-policy.js';

export type AgentOptions = NonNullable<ConstructorParameters<typeof Agent>[0]>;

export type DispatcherFactory = (
  host: string,
  options: AgentOptions
) => Dispatcher;

export type ClientFactory = (dispatcher: Dispatcher) => InstrumentedClient;

export type TransportSettings = Pick<
  TransferConfig,
  'dialTimeoutSeconds' | 'keepAliveSeconds' | 'tlsTimeoutSeconds'
>;

export interface TransportCacheOptions {
  readonly settings: TransportSettings;
  readonly tlsPolicy: TlsPolicy;
  readonly createClient: ClientFactory;
  readonly createDispatcher?: DispatcherFactory;
}

interface CachedTransport {
  readonly dispatcher: Dispatcher;
  readonly client: InstrumentedClient;
}

const SECOND_MS = 1000;

/**
 * Agent options for one host. The connect timer covers the TCP dial and the
 * TLS handshake together, so it is given both budgets. `connections` stays
 * unset: it caps active sockets, and a caller may hold several unread bodies
 * on one host.
 */
export function buildAgentOptions(
  host: string,
  settings: TransportSettings,
  tlsPolicy: TlsPolicy
): AgentOptions {
  const tls = tlsPolicy(host);
  const keepAliveMs = settings.keepAliveSeconds * SECOND_MS;

  return {
    keepAliveTimeout: keepAliveMs,
    pipelining: 1,
    connect: {
      timeout:
        (settings.dialTimeoutSeconds + settings.tlsTimeoutSeconds) * SECOND_MS,
      keepAlive: true,
      keepAliveInitialDelay: keepAliveMs,
      ...(tls.skipVerify
        ? { rejectUnauthorized: false }
        : tls.ca === undefined
          ? {}
          : { ca: tls.ca }),
    },
  };
}

// Honours HTTP_PROXY, HTTPS_PROXY and NO_PROXY.
const createAgent: DispatcherFactory = (_host, options) =>
  new EnvHttpProxyAgent(options);

/** Lazily builds and memoizes one configured client per host string. */
export class TransportCache {
  private readonly transports = new Map<string, CachedTransport>();
  private readonly settings: TransportSettings;
  private readonly tlsPolicy: TlsPolicy;
  private readonly createClient: ClientFactory;
  private readonly createDispatcher: DispatcherFactory;

  constructor(options: TransportCacheOptions) {
    this.settings = options.settings;
    this.tlsPolicy = options.tlsPolicy;
    this.createClient = options.createClient;
    this.createDispatcher = options.createDispatcher ?? createAgent;
  }

  /** `host` may carry a port; `example.com` and `example.com:443` are cached apart. */
  client(host: string): InstrumentedClient {
    const cached = this.transports.get(host);
    if (cached) return cached.client;

    const dispatcher = this.createDispatcher(
      host,
      buildAgentOptions(host, this.settings, this.tlsPolicy)
    );
    const client = this.createClient(dispatcher);
    this.transports.set(host, { dispatcher, client });
    logDebug('Created HTTP transport', { host });
    return client;
  }

  get size(): number {
    return this.transports.size;
  }

  async close(): Promise<void> {
    const entries = [...this.transports];
    this.transports.clear();

    await Promise.all(
      entries.map(async ([host, { dispatcher }]) => {
        try {
          await dispatcher.close();
        } catch (error: unknown) {
          logWarn('Failed to close HTTP transport', {
            host,
            error: getErrorMessage(error),
          });
        }
      })
    );
  }
}
