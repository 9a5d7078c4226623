import {
  pipeline,
  Transform,
  type Readable,
  type TransformCallback,
} from 'node:stream';

import { isSystemError } from '../../errors.js';
import { logDebug } from '../../observability.js';

import type { TransferRegistry } from './registry.js';
import type { TraceEmitter } from './trace.js';
import type { StreamMode, TransferId } from './types.js';

export interface ByteCountingStreamOptions {
  readonly source: Readable;
  readonly transferId: TransferId;
  readonly mode: StreamMode;
  readonly traceable: boolean;
  readonly tracer: TraceEmitter;
  /** Attached only while statistics collection is enabled. */
  readonly registry?: TransferRegistry;
  readonly clock?: () => bigint;
}

function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  return typeof chunk === 'string'
    ? Buffer.from(chunk, 'utf8')
    : Buffer.from(chunk);
}

/**
 * Pass-through body stream that counts the bytes its reader receives.
 *
 * The source is piped in at construction. In response mode, reaching
 * end-of-stream finalizes the transfer's record once; a source error is
 * forwarded unchanged and leaves the record open, as does destroying the
 * stream before the end.
 */
export class ByteCountingStream extends Transform {
  readonly transferId: TransferId;
  readonly mode: StreamMode;

  private bytes = 0;
  private completed = false;
  private readonly traceable: boolean;
  private readonly tracer: TraceEmitter;
  private readonly registry: TransferRegistry | undefined;
  private readonly clock: () => bigint;

  constructor(options: ByteCountingStreamOptions) {
    super();
    this.transferId = options.transferId;
    this.mode = options.mode;
    this.traceable = options.traceable;
    this.tracer = options.tracer;
    this.registry = options.registry;
    this.clock = options.clock ?? (() => process.hrtime.bigint());

    this.once('end', () => {
      this.complete();
    });

    pipeline(options.source, this, (error) => {
      if (!error) return;
      logDebug('Transfer body stream closed before completion', {
        transferId: this.transferId,
        mode: this.mode,
        code: isSystemError(error) ? error.code : undefined,
        error: error.message,
      });
    });
  }

  /** Bytes handed to the reader so far. */
  get count(): number {
    return this.bytes;
  }

  get finalized(): boolean {
    return this.completed;
  }

  override _transform(
    chunk: Buffer | Uint8Array | string,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const buffer = toBuffer(chunk);
    this.bytes += buffer.length;
    if (this.traceable) {
      this.tracer.traceBody(buffer, this.mode);
    }
    callback(null, buffer);
  }

  private complete(): void {
    if (this.completed) return;
    this.completed = true;

    if (this.mode !== 'response' || !this.registry) return;
    this.registry.finalize(this.transferId, this.bytes, this.clock());
  }
}
