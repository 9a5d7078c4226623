import type { TransferId, TransferRecord } from './types.js';

export interface BucketEntry {
  readonly key: string;
  readonly transferIds: readonly TransferId[];
}

/**
 * Session-owned store of transfer statistics plus the buckets used to group
 * them in reports.
 *
 * Records and buckets are kept in separate maps: records are written when a
 * response arrives and when its body ends, bucket entries whenever a caller
 * files a finished transfer. Every method is a single synchronous map access,
 * so concurrent transfers on the event loop cannot interleave inside one.
 */
export class TransferRegistry {
  private readonly records = new Map<TransferId, TransferRecord>();
  private readonly bucketMap = new Map<string, TransferId[]>();

  open(transferId: TransferId, record: TransferRecord): void {
    this.records.set(transferId, record);
  }

  /**
   * Records the final response body size and stop time. Unknown ids and
   * records that already have a stop time are left untouched.
   */
  finalize(transferId: TransferId, bodySize: number, stop: bigint): boolean {
    const record = this.records.get(transferId);
    if (!record || record.response.stop !== 0n) return false;

    record.response.bodySize = bodySize;
    record.response.stop = stop;
    return true;
  }

  addToBucket(key: string, transferId: TransferId): void {
    const ids = this.bucketMap.get(key);
    if (ids) {
      ids.push(transferId);
      return;
    }
    this.bucketMap.set(key, [transferId]);
  }

  get(transferId: TransferId): TransferRecord | undefined {
    return this.records.get(transferId);
  }

  get size(): number {
    return this.records.size;
  }

  /** Buckets in first-insertion order, each with ids in append order. */
  buckets(): BucketEntry[] {
    return Array.from(this.bucketMap, ([key, ids]) => ({
      key,
      transferIds: [...ids],
    }));
  }

  clear(): void {
    this.records.clear();
    this.bucketMap.clear();
  }
}
