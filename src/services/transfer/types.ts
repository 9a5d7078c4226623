import type { Readable } from 'node:stream';

export type TransferId = string;

export type RequestBody = string | Uint8Array | Readable;

export type HeaderRecord = Record<string, string>;

export type ResponseHeaders = Readonly<
  Record<string, string | string[] | undefined>
>;

export interface TransferRequest {
  readonly url: string | URL;
  readonly method?: string;
  readonly headers?: HeaderRecord;
  readonly body?: RequestBody;
  /** Supplied by callers that already track the transfer under their own id. */
  readonly transferId?: TransferId;
}

/** One request actually sent on the wire; a redirect produces a new hop. */
export interface HopRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: HeaderRecord;
  readonly body?: RequestBody;
}

export interface ResponseHead {
  readonly statusCode: number;
  readonly statusText: string;
  readonly headers: ResponseHeaders;
}

/** Sizes in bytes; `start`/`stop` are monotonic nanoseconds, `0n` when unset. */
export interface TransferStats {
  headerSize: number;
  bodySize: number;
  start: bigint;
  stop: bigint;
}

export interface TransferRecord {
  readonly transferId: TransferId;
  readonly request: TransferStats;
  readonly response: TransferStats;
  readonly statusCode: number;
  readonly url: string;
}

export type StreamMode = 'request' | 'response';

export function headerValue(
  headers: ResponseHeaders,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    if (Array.isArray(value)) return value[0];
    return value;
  }
  return undefined;
}
