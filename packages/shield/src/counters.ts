/**
 * @warden/shield - Runtime counters
 *
 * Monotonic counters backed by a SharedArrayBuffer. The buffer can be
 * posted to worker threads; every view over it sees the same values and
 * increments go through Atomics so none are lost.
 */

export const COUNTER_NAMES = ['piiDetections', 'secretsBlocked', 'threatsCaught'] as const;
export type CounterName = (typeof COUNTER_NAMES)[number];

export type CounterSnapshot = Record<CounterName, number>;

export class ShieldCounters {
  readonly buffer: SharedArrayBuffer;
  private readonly cells: BigUint64Array;

  /**
   * @param buffer - An existing counter buffer to share, e.g. one received
   *   from another thread. A fresh zeroed buffer is allocated when omitted.
   */
  constructor(buffer?: SharedArrayBuffer) {
    const size = COUNTER_NAMES.length * BigUint64Array.BYTES_PER_ELEMENT;
    if (buffer && buffer.byteLength < size) {
      throw new RangeError(`Counter buffer needs ${size} bytes, got ${buffer.byteLength}`);
    }
    this.buffer = buffer ?? new SharedArrayBuffer(size);
    this.cells = new BigUint64Array(this.buffer, 0, COUNTER_NAMES.length);
  }

  add(name: CounterName, amount: number): void {
    if (amount <= 0) return;
    Atomics.add(this.cells, COUNTER_NAMES.indexOf(name), BigInt(amount));
  }

  get(name: CounterName): number {
    return Number(Atomics.load(this.cells, COUNTER_NAMES.indexOf(name)));
  }

  snapshot(): CounterSnapshot {
    return {
      piiDetections: this.get('piiDetections'),
      secretsBlocked: this.get('secretsBlocked'),
      threatsCaught: this.get('threatsCaught'),
    };
  }
}
