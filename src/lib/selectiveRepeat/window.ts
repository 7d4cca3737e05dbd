export function seqOffset(base: number, seqnum: number, seqSpace: number): number {
  return (((seqnum - base) % seqSpace) + seqSpace) % seqSpace;
}

export function seqAdd(seqnum: number, count: number, seqSpace: number): number {
  return (((seqnum + count) % seqSpace) + seqSpace) % seqSpace;
}

/**
 * True when `seqnum` lies in `[base, base + windowSize)` modulo `seqSpace`.
 * Values outside the sequence space are never in a window.
 */
export function inWindow(
  base: number,
  seqnum: number,
  windowSize: number,
  seqSpace: number
): boolean {
  if (!Number.isInteger(seqnum) || seqnum < 0 || seqnum >= seqSpace) {
    return false;
  }
  return seqOffset(base, seqnum, seqSpace) < windowSize;
}

/**
 * Fixed-capacity ring addressed by logical offset from the window base.
 * Sliding retires slots from the front and empties them for reuse.
 */
export class SlidingWindow<T> {
  readonly capacity: number;
  private slots: (T | undefined)[];
  private head = 0;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  private physical(offset: number): number {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.capacity) {
      throw new RangeError(
        `Window offset ${offset} out of range [0, ${this.capacity})`
      );
    }
    return (this.head + offset) % this.capacity;
  }

  get(offset: number): T | undefined {
    return this.slots[this.physical(offset)];
  }

  set(offset: number, value: T): void {
    this.slots[this.physical(offset)] = value;
  }

  has(offset: number): boolean {
    return this.get(offset) !== undefined;
  }

  /**
   * Length of the run of slots starting at offset 0 that satisfy `predicate`.
   */
  prefixLength(predicate: (value: T) => boolean): number {
    let length = 0;
    while (length < this.capacity) {
      const value = this.get(length);
      if (value === undefined || !predicate(value)) {
        break;
      }
      length++;
    }
    return length;
  }

  /**
   * Retire `count` slots from the front, returning them oldest first.
   */
  slide(count: number): T[] {
    if (count < 0 || count > this.capacity) {
      throw new RangeError(`Cannot slide window by ${count}`);
    }
    const retired: T[] = [];
    for (let i = 0; i < count; i++) {
      const value = this.slots[this.head];
      if (value !== undefined) {
        retired.push(value);
      }
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
    }
    return retired;
  }

  occupied(): number {
    return this.slots.reduce((sum, slot) => (slot === undefined ? sum : sum + 1), 0);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
  }
}
