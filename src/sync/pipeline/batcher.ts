import { maxWatermark, watermarkOf } from "@/sync/ledger/watermark";
import type { Batch, StagedRecord, Watermark } from "@/sync/types";

export interface BatcherOptions {
  maxRecords: number;
  /** Upper bound on the serialised `{"data":[...]}` body. */
  maxBytes?: number;
}

const ENVELOPE_BYTES = Buffer.byteLength('{"data":[]}');

/**
 * Groups staged records into ordered batches. `push` returns the batches it
 * completed (usually none); `flush` emits whatever is left at end of stream.
 */
export class Batcher {
  private pending: StagedRecord[] = [];
  private pendingBytes = ENVELOPE_BYTES;
  private sequence = 0;

  constructor(private readonly options: BatcherOptions) {
    if (!Number.isInteger(options.maxRecords) || options.maxRecords < 1) {
      throw new RangeError(`maxRecords must be a positive integer, got ${options.maxRecords}`);
    }
  }

  push(item: StagedRecord): Batch[] {
    const emitted: Batch[] = [];
    const size = Buffer.byteLength(JSON.stringify(item.record));
    const separator = this.pending.length > 0 ? 1 : 0;

    // A record that alone exceeds maxBytes still travels, in a batch of its own.
    if (this.options.maxBytes !== undefined && this.pending.length > 0 && this.pendingBytes + separator + size > this.options.maxBytes) {
      const full = this.flush();
      if (full) emitted.push(full);
    }

    this.pendingBytes += (this.pending.length > 0 ? 1 : 0) + size;
    this.pending.push(item);

    if (this.pending.length >= this.options.maxRecords) {
      const full = this.flush();
      if (full) emitted.push(full);
    }
    return emitted;
  }

  flush(): Batch | null {
    if (this.pending.length === 0) return null;
    const items = this.pending;
    const bytes = this.pendingBytes;
    this.pending = [];
    this.pendingBytes = ENVELOPE_BYTES;
    this.sequence += 1;

    let maxSeen: Watermark | null = null;
    for (const item of items) {
      maxSeen = maxWatermark(maxSeen, watermarkOf(item.position));
    }

    return {
      sequence: this.sequence,
      records: items.map((i) => i.record),
      first: items[0].position,
      last: items[items.length - 1].position,
      maxSeen: maxSeen ?? watermarkOf(items[0].position),
      bytes,
    };
  }
}

/** Batch an ordered stream of staged records, flushing the remainder at the end. */
export async function* batchRecords(
  items: AsyncIterable<StagedRecord>,
  options: BatcherOptions,
): AsyncGenerator<Batch> {
  const batcher = new Batcher(options);
  for await (const item of items) {
    yield* batcher.push(item);
  }
  const tail = batcher.flush();
  if (tail) yield tail;
}
