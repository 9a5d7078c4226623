import type { HopRequest, ResponseHead, ResponseHeaders } from './types.js';

const CRLF = '\r\n';
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const HEADER_VALUE_INVALID = /[\r\n\0]/;

export class HeaderDumpError extends Error {
  override name = 'HeaderDumpError';
}

function formatHeaderLine(name: string, value: string): string {
  if (!HEADER_NAME_PATTERN.test(name)) {
    throw new HeaderDumpError(`Invalid header name: ${JSON.stringify(name)}`);
  }
  if (HEADER_VALUE_INVALID.test(value)) {
    throw new HeaderDumpError(`Invalid value for header ${name}`);
  }
  return `${name}: ${value}${CRLF}`;
}

function formatHeaderLines(headers: ResponseHeaders): string {
  let lines = '';
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const entry of values) {
      lines += formatHeaderLine(name, entry);
    }
  }
  return lines;
}

function hasHostHeader(headers: Readonly<Record<string, string>>): boolean {
  return Object.keys(headers).some((name) => name.toLowerCase() === 'host');
}

/**
 * Wire form of a request head: request line, `Host`, the hop's headers and the
 * terminating blank line. Throws {@link HeaderDumpError} for headers that could
 * not be sent as written.
 */
export function dumpRequestHead(hop: HopRequest): string {
  const target = `${hop.url.pathname || '/'}${hop.url.search}`;
  const host = hasHostHeader(hop.headers)
    ? ''
    : formatHeaderLine('Host', hop.url.host);
  return `${hop.method} ${target} HTTP/1.1${CRLF}${host}${formatHeaderLines(hop.headers)}${CRLF}`;
}

export function dumpResponseHead(head: ResponseHead): string {
  const reason = head.statusText ? ` ${head.statusText}` : '';
  return `HTTP/1.1 ${head.statusCode}${reason}${CRLF}${formatHeaderLines(head.headers)}${CRLF}`;
}

/** Splits a dump into lines the way a line scanner would: no trailing empty token. */
export function dumpLines(dump: string): string[] {
  const lines = dump.split(CRLF);
  if (lines.at(-1) === '') lines.pop();
  return lines;
}
