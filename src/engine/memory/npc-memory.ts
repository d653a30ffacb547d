import type { DialogueTurn, NpcMemorySnapshot } from '../../db/types/index.js';

/**
 * Fixed-capacity FIFO ring of dialogue turns. When full, pushing evicts the
 * oldest turn regardless of how often it was referenced.
 */
export class NpcMemory {
  private readonly slots: Array<DialogueTurn | undefined>;
  private head = 0; // index of the oldest turn
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`NPC memory capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<DialogueTurn | undefined>(capacity).fill(undefined);
  }

  static fromSnapshot(snapshot: NpcMemorySnapshot): NpcMemory {
    const memory = new NpcMemory(snapshot.capacity);
    for (const turn of snapshot.turns) memory.push(turn);
    return memory;
  }

  static empty(capacity: number): NpcMemorySnapshot {
    return { capacity, turns: [] };
  }

  get size(): number {
    return this.count;
  }

  /** Appends a turn; returns the evicted turn when the ring was full. */
  push(turn: DialogueTurn): DialogueTurn | undefined {
    const entry = { ...turn };
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = entry;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Oldest first. */
  toArray(): DialogueTurn[] {
    const out: DialogueTurn[] = [];
    for (let i = 0; i < this.count; i++) {
      const turn = this.slots[(this.head + i) % this.capacity];
      if (turn) out.push({ ...turn });
    }
    return out;
  }

  /** The `k` most recent turns, oldest first. */
  recent(k: number): DialogueTurn[] {
    if (k <= 0) return [];
    const all = this.toArray();
    return all.slice(Math.max(0, all.length - k));
  }

  toSnapshot(): NpcMemorySnapshot {
    return { capacity: this.capacity, turns: this.toArray() };
  }
}
