import type { Priority } from '../domain/index.js';
import { PRIORITIES, PRIORITY_RANK } from '../domain/index.js';

/**
 * Per-subscriber queue with one FIFO band per priority.
 *
 * `shift()` always takes from the highest non-empty band, so a message
 * published later at a higher priority overtakes queued lower-priority
 * work, while order inside one band is preserved.
 */
export class DeliveryQueue<T> {
  private readonly bands: Map<Priority, T[]> = new Map(
    PRIORITIES.map((p): [Priority, T[]] => [p, []]),
  );
  private count = 0;

  push(priority: Priority, item: T): void {
    this.band(priority).push(item);
    this.count++;
  }

  /** Removes and returns the next item, highest priority first. */
  shift(): T | undefined {
    for (const priority of PRIORITIES) {
      const band = this.band(priority);
      if (band.length > 0) {
        this.count--;
        return band.shift();
      }
    }
    return undefined;
  }

  /**
   * Drops the oldest item of the lowest non-empty band whose priority is
   * not above `ceiling`. Returns `undefined` when every queued item
   * outranks `ceiling`.
   */
  dropLowest(ceiling: Priority): { priority: Priority; item: T } | undefined {
    for (let i = PRIORITIES.length - 1; i >= 0; i--) {
      const priority = PRIORITIES[i];
      if (priority === undefined || PRIORITY_RANK[priority] > PRIORITY_RANK[ceiling]) continue;

      const band = this.band(priority);
      const item = band.shift();
      if (item !== undefined) {
        this.count--;
        return { priority, item };
      }
    }
    return undefined;
  }

  get size(): number {
    return this.count;
  }

  private band(priority: Priority): T[] {
    let band = this.bands.get(priority);
    if (!band) {
      band = [];
      this.bands.set(priority, band);
    }
    return band;
  }
}
