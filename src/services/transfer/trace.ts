import { logDebug, safeWriteStderr, stripQuery } from '../../observability.js';

import {
  dumpLines,
  dumpRequestHead,
  dumpResponseHead,
} from './header-dump.js';
import {
  headerValue,
  type HopRequest,
  type ResponseHead,
  type StreamMode,
} from './types.js';

/**
 * Diagnostic stream. `trace` receives one-line summaries, `write` receives
 * verbose head and body dumps exactly as they should appear.
 */
export interface TraceSink {
  trace(message: string): void;
  write(text: string): void;
}

export const stderrTraceSink: TraceSink = {
  trace(message) {
    logDebug(message);
  },
  write(text) {
    safeWriteStderr(text);
  },
};

export interface TraceOptions {
  /** Dump heads and traceable bodies to the sink's verbose stream. */
  readonly verbose: boolean;
  /** Leave `Authorization: Basic` values intact in verbose dumps. */
  readonly unsafeDebug: boolean;
}

type Direction = '>' | '<';

const TRACEABLE_TYPES = ['json', 'text', 'xml', 'html'] as const;
const REDACTED_BASIC_AUTH = 'Authorization: Basic * * * * *';

export function isTraceableContent(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const primary = (contentType.split(';', 1)[0] ?? '').toLowerCase();
  return TRACEABLE_TYPES.some((type) => primary.includes(type));
}

export class TraceEmitter {
  constructor(
    private readonly sink: TraceSink,
    private readonly options: TraceOptions
  ) {}

  traceRequest(hop: HopRequest): void {
    this.sink.trace(`HTTP: ${hop.method} ${stripQuery(hop.url.href)}`);
    if (!this.options.verbose) return;

    const dump = this.tryDump(() => dumpRequestHead(hop));
    if (dump === undefined) return;

    this.writeDump('>', dump);
  }

  traceResponse(head: ResponseHead): void {
    this.sink.trace(`HTTP: ${head.statusCode}`);
    if (!this.options.verbose) return;

    const dump = this.tryDump(() => dumpResponseHead(head));
    if (dump === undefined) return;

    const traceable = isTraceableContent(
      headerValue(head.headers, 'content-type')
    );
    this.sink.write(traceable ? '\n\n' : '\n');
    this.writeDump('<', dump);
  }

  traceRedirect(original: HopRequest, next: HopRequest): void {
    this.sink.trace(
      `api: redirect ${original.method} ${stripQuery(original.url.href)} to ${stripQuery(next.url.href)}`
    );
  }

  /** Mirrors a body chunk of a traceable transfer. */
  traceBody(chunk: Buffer, mode: StreamMode): void {
    const text = chunk.toString('utf8');
    if (mode === 'response') {
      this.sink.trace(`HTTP: ${text}`);
    }
    if (this.options.verbose) {
      this.sink.write(text);
    }
  }

  private writeDump(direction: Direction, dump: string): void {
    for (const line of dumpLines(dump)) {
      this.sink.write(`${this.redactLine(direction, line)}\n`);
    }
  }

  private redactLine(direction: Direction, line: string): string {
    if (
      !this.options.unsafeDebug &&
      line.toLowerCase().startsWith('authorization: basic')
    ) {
      return `${direction} ${REDACTED_BASIC_AUTH}`;
    }
    return `${direction} ${line}`;
  }

  private tryDump(dump: () => string): string | undefined {
    try {
      return dump();
    } catch (error: unknown) {
      logDebug('Skipping HTTP head dump', {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
