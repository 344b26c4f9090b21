import type { HistoryEntry } from '@agri-telemetry/domain';

interface Slot {
  readonly ts: number;
  readonly value: number;
}

/**
 * Fixed-capacity ring buffer of samples for one channel.
 * Appends overwrite the oldest slot once full.
 */
export class HistoryBuffer {
  private readonly slots: (Slot | null)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`history capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Slot | null>(capacity).fill(null);
  }

  get length(): number {
    return this.count;
  }

  append(timestamp: Date, value: number): void {
    this.slots[this.head] = { ts: timestamp.getTime(), value };
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Most recent `maxCount` entries, oldest first. Each call returns fresh objects. */
  recent(maxCount: number = this.capacity): HistoryEntry[] {
    const fetchCount = Math.min(this.count, Math.max(0, Math.floor(maxCount)));
    const start = this.count < this.capacity ? 0 : this.head;
    const skip = this.count - fetchCount;

    const out: HistoryEntry[] = [];
    for (let i = 0; i < fetchCount; i++) {
      const slot = this.slots[(start + skip + i) % this.capacity];
      if (slot) out.push({ timestamp: new Date(slot.ts), value: slot.value });
    }
    return out;
  }

  clear(): void {
    this.slots.fill(null);
    this.head = 0;
    this.count = 0;
  }
}
