import { RedirectError } from '../../errors.js';
import { stripQuery } from '../../observability.js';

import type { TraceEmitter } from './trace.js';
import type { HeaderRecord, HopRequest } from './types.js';

export const MAX_REDIRECTS = 3;

export interface RedirectPolicyOptions {
  readonly tracer: TraceEmitter;
  readonly maxRedirects?: number;
}

function isSameOrigin(a: URL, b: URL): boolean {
  return a.protocol === b.protocol && a.host === b.host;
}

function isAuthorizationHeader(name: string): boolean {
  return name.toLowerCase() === 'authorization';
}

// The connection layer derives Host from the hop's URL.
function isHostHeader(name: string): boolean {
  return name.toLowerCase() === 'host';
}

function setHeader(headers: HeaderRecord, name: string, value: string): void {
  const lowered = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lowered) delete headers[existing];
  }
  headers[name] = value;
}

/**
 * Decides whether a redirect hop may be sent and which headers it carries.
 *
 * `via` holds every request already sent for the transfer, oldest first.
 * Headers always come from that first request; `Authorization` only follows
 * the hop when scheme and host (port included) are unchanged.
 */
export class RedirectPolicy {
  private readonly tracer: TraceEmitter;
  private readonly maxRedirects: number;

  constructor(options: RedirectPolicyOptions) {
    this.tracer = options.tracer;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  }

  apply(next: HopRequest, via: readonly HopRequest[]): HopRequest {
    const original = via[0];
    if (!original) {
      throw new RedirectError(
        'Redirect without an originating request',
        'EBADREDIRECT',
        stripQuery(next.url.href)
      );
    }

    if (via.length >= this.maxRedirects) {
      throw new RedirectError(
        `stopped after ${this.maxRedirects} redirects`,
        'ETOOMANYREDIRECTS',
        stripQuery(next.url.href),
        { redirects: via.length }
      );
    }

    const headers: HeaderRecord = { ...next.headers };
    const sameOrigin = isSameOrigin(next.url, original.url);
    for (const [name, value] of Object.entries(original.headers)) {
      if (isHostHeader(name)) continue;
      if (isAuthorizationHeader(name) && !sameOrigin) continue;
      setHeader(headers, name, value);
    }

    const hop: HopRequest = { ...next, headers };
    this.tracer.traceRedirect(original, hop);
    return hop;
  }
}
