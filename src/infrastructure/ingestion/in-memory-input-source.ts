import type { IngestedRecord, IngestionSource } from '../../application/ingestion.js';

/**
 * FIFO ingestion source held in memory.
 *
 * Handed-over records stay "in flight" until acknowledged, mirroring the
 * pending-entries behaviour of the stream source. Used by tests and by
 * embedders that push inputs programmatically.
 */
export class InMemoryInputSource implements IngestionSource {
  readonly name = 'in-memory';

  private readonly queue: IngestedRecord[] = [];
  private readonly inFlight: Map<string, IngestedRecord> = new Map();
  private nextReceipt = 1;
  private failure: Error | null = null;

  /** Queues a raw input body. Returns its receipt. */
  push(body: unknown): string {
    const receipt = `mem-${this.nextReceipt++}`;
    this.queue.push({ receipt, body });
    return receipt;
  }

  pushAll(bodies: readonly unknown[]): string[] {
    return bodies.map((body) => this.push(body));
  }

  /** Makes every following poll reject with `err` until cleared with `null`. */
  failWith(err: Error | null): void {
    this.failure = err;
  }

  async poll(max: number): Promise<IngestedRecord[]> {
    if (this.failure) throw this.failure;

    const batch = this.queue.splice(0, Math.max(0, max));
    for (const record of batch) {
      if (record.receipt !== null) this.inFlight.set(record.receipt, record);
    }
    return batch;
  }

  async acknowledge(records: readonly IngestedRecord[]): Promise<void> {
    for (const record of records) {
      if (record.receipt !== null) this.inFlight.delete(record.receipt);
    }
  }

  get queued(): number {
    return this.queue.length;
  }

  get unacknowledged(): number {
    return this.inFlight.size;
  }
}
