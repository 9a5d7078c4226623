import { randomUUID } from 'node:crypto';
import { STATUS_CODES } from 'node:http';
import { Readable } from 'node:stream';

import type { Dispatcher } from 'undici';

import { getErrorMessage, isSystemError, RedirectError } from '../../errors.js';
import { logDebug, stripQuery } from '../../observability.js';

import { ByteCountingStream } from './counting-stream.js';
import { dumpRequestHead, dumpResponseHead } from './header-dump.js';
import type { RedirectPolicy } from './redirect-policy.js';
import type { TransferRegistry } from './registry.js';
import { isTraceableContent, type TraceEmitter } from './trace.js';
import {
  headerValue,
  type HeaderRecord,
  type HopRequest,
  type RequestBody,
  type ResponseHead,
  type TransferId,
  type TransferRequest,
} from './types.js';

export interface InstrumentedClientOptions {
  readonly dispatcher: Dispatcher;
  readonly registry: TransferRegistry;
  readonly tracer: TraceEmitter;
  readonly redirectPolicy: RedirectPolicy;
  /** Open and finalize registry records; when false the registry is never written. */
  readonly logStats: boolean;
  readonly clock?: () => bigint;
}

export interface TransferResponse extends ResponseHead {
  readonly transferId: TransferId;
  /** URL of the request that produced this response, after redirects. */
  readonly url: string;
  readonly request: HopRequest;
  readonly body: ByteCountingStream;
}

interface SentHop {
  readonly hop: HopRequest;
  readonly counter: ByteCountingStream | undefined;
  readonly response: Dispatcher.ResponseData;
}

const HTTP_METHODS: readonly Dispatcher.HttpMethod[] = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
];

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const BODY_PRESERVING_STATUSES = new Set([307, 308]);
const BODY_FRAMING_HEADERS = new Set(['content-length', 'transfer-encoding']);

function toHttpMethod(method: string): Dispatcher.HttpMethod {
  const normalized = method.toUpperCase();
  const known = HTTP_METHODS.find((candidate) => candidate === normalized);
  if (!known) throw new TypeError(`Unsupported HTTP method: ${method}`);
  return known;
}

function toReadable(body: RequestBody): Readable {
  if (body instanceof Readable) return body;
  const buffer =
    typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body);
  return Readable.from([buffer]);
}

function isReplayableBody(body: RequestBody | undefined): boolean {
  return !(body instanceof Readable);
}

function withoutBodyFraming(headers: HeaderRecord): HeaderRecord {
  return Object.fromEntries(
    Object.entries(headers).filter(
      ([name]) => !BODY_FRAMING_HEADERS.has(name.toLowerCase())
    )
  );
}

function measureHead(dump: () => string): number {
  try {
    return Buffer.byteLength(dump());
  } catch (error: unknown) {
    logDebug('Unable to measure HTTP head; recording 0 bytes', {
      error: getErrorMessage(error),
    });
    return 0;
  }
}

function resolveRedirectUrl(current: HopRequest, location: string): URL {
  if (!URL.canParse(location, current.url.href)) {
    throw new RedirectError(
      'Invalid redirect target',
      'EBADREDIRECT',
      stripQuery(current.url.href)
    );
  }

  const resolved = new URL(location, current.url);
  if (resolved.username || resolved.password) {
    throw new RedirectError(
      'Redirect target includes credentials',
      'EBADREDIRECT',
      stripQuery(current.url.href)
    );
  }
  return resolved;
}

/**
 * Builds the hop a redirect asks for, before policy is applied. 307 and 308
 * keep method and body; the other redirect statuses turn anything but GET and
 * HEAD into a body-less GET.
 */
function buildRedirectHop(
  current: HopRequest,
  statusCode: number,
  location: string
): HopRequest {
  const url = resolveRedirectUrl(current, location);

  if (BODY_PRESERVING_STATUSES.has(statusCode)) {
    return {
      method: current.method,
      url,
      headers: {},
      ...(current.body === undefined ? {} : { body: current.body }),
    };
  }

  const method =
    current.method === 'GET' || current.method === 'HEAD'
      ? current.method
      : 'GET';
  return { method, url, headers: {} };
}

/**
 * Executes requests through an undici dispatcher and instruments them: request
 * and response heads are traced, request and response bodies are byte-counted,
 * and, when statistics are enabled, every successful exchange gets a registry
 * record that the response body finalizes at end-of-stream.
 */
export class InstrumentedClient {
  private readonly dispatcher: Dispatcher;
  private readonly registry: TransferRegistry;
  private readonly tracer: TraceEmitter;
  private readonly redirectPolicy: RedirectPolicy;
  private readonly logStats: boolean;
  private readonly clock: () => bigint;

  constructor(options: InstrumentedClientOptions) {
    this.dispatcher = options.dispatcher;
    this.registry = options.registry;
    this.tracer = options.tracer;
    this.redirectPolicy = options.redirectPolicy;
    this.logStats = options.logStats;
    this.clock = options.clock ?? (() => process.hrtime.bigint());
  }

  async execute(request: TransferRequest): Promise<TransferResponse> {
    const transferId = request.transferId ?? randomUUID();
    const original: HopRequest = {
      method: toHttpMethod(request.method ?? 'GET'),
      url: new URL(request.url),
      headers: { ...request.headers },
      ...(request.body === undefined ? {} : { body: request.body }),
    };

    this.tracer.traceRequest(original);

    const start = this.clock();
    const sent = await this.sendWithRedirects(transferId, original);
    const received = this.clock();

    const { statusCode, headers } = sent.response;
    const head: ResponseHead = {
      statusCode,
      statusText: STATUS_CODES[statusCode] ?? '',
      headers,
    };
    this.tracer.traceResponse(head);

    if (this.logStats) {
      this.registry.open(transferId, {
        transferId,
        request: {
          headerSize: measureHead(() => dumpRequestHead(sent.hop)),
          bodySize: sent.counter?.count ?? 0,
          start,
          stop: received,
        },
        response: {
          headerSize: measureHead(() => dumpResponseHead(head)),
          bodySize: 0,
          start,
          stop: 0n,
        },
        statusCode,
        url: sent.hop.url.href,
      });
    }

    const body = new ByteCountingStream({
      source: sent.response.body,
      transferId,
      mode: 'response',
      traceable: isTraceableContent(headerValue(headers, 'content-type')),
      tracer: this.tracer,
      clock: this.clock,
      ...(this.logStats ? { registry: this.registry } : {}),
    });

    return {
      ...head,
      transferId,
      url: sent.hop.url.href,
      request: sent.hop,
      body,
    };
  }

  private async sendWithRedirects(
    transferId: TransferId,
    original: HopRequest
  ): Promise<SentHop> {
    const via: HopRequest[] = [];
    let hop = original;

    for (;;) {
      const sent = await this.send(transferId, hop);
      via.push(hop);

      const location = this.redirectLocation(sent);
      if (location === undefined) return sent;

      await sent.response.body.dump();

      const next = this.redirectPolicy.apply(
        buildRedirectHop(hop, sent.response.statusCode, location),
        via
      );
      hop =
        next.body === undefined
          ? { ...next, headers: withoutBodyFraming(next.headers) }
          : next;
    }
  }

  private redirectLocation(sent: SentHop): string | undefined {
    const { statusCode, headers } = sent.response;
    if (!REDIRECT_STATUSES.has(statusCode)) return undefined;

    const location = headerValue(headers, 'location');
    if (!location) return undefined;

    if (
      BODY_PRESERVING_STATUSES.has(statusCode) &&
      !isReplayableBody(sent.hop.body)
    ) {
      logDebug('Not following redirect: request body cannot be replayed', {
        status: statusCode,
        url: stripQuery(sent.hop.url.href),
      });
      return undefined;
    }
    return location;
  }

  private async send(
    transferId: TransferId,
    hop: HopRequest
  ): Promise<SentHop> {
    const counter =
      hop.body === undefined
        ? undefined
        : new ByteCountingStream({
            source: toReadable(hop.body),
            transferId,
            mode: 'request',
            traceable: isTraceableContent(
              headerValue(hop.headers, 'content-type')
            ),
            tracer: this.tracer,
            clock: this.clock,
          });

    try {
      const response = await this.dispatcher.request({
        origin: hop.url.origin,
        path: `${hop.url.pathname}${hop.url.search}`,
        method: toHttpMethod(hop.method),
        headers: hop.headers,
        body: counter ?? null,
      });
      return { hop, counter, response };
    } catch (error: unknown) {
      logDebug('HTTP transfer failed', {
        transferId,
        method: hop.method,
        url: stripQuery(hop.url.href),
        code: isSystemError(error) ? error.code : undefined,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }
}
