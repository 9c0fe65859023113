/**
 * Seeded pseudo-random stream (mulberry32).
 *
 * Every random choice in the harness (node names, identities, message ids,
 * generated data) is drawn from one of these so a run replays from its seed.
 */
export class SeededRng {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    if (!Number.isInteger(seed)) throw new RangeError(`seed must be an integer, got ${seed}`);
    this.state = seed >>> 0;
    this.seed = this.state;
  }

  nextU32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Uniform in [0, 1). */
  random(): number {
    return this.nextU32() / 4294967296;
  }

  /** Uniform integer in [low, high). */
  range(low: number, high: number): number {
    if (!Number.isInteger(low) || !Number.isInteger(high) || low >= high) {
      throw new RangeError(`empty range [${low}, ${high})`);
    }
    return low + Math.floor(this.random() * (high - low));
  }

  bool(): boolean {
    return (this.nextU32() & 1) === 1;
  }

  bytes(size: number): Uint8Array {
    const out = new Uint8Array(size);
    for (let i = 0; i < size; i += 4) {
      let word = this.nextU32();
      for (let j = i; j < Math.min(i + 4, size); j++) {
        out[j] = word & 0xff;
        word >>>= 8;
      }
    }
    return out;
  }

  /** `amount` distinct items, without replacement (partial Fisher-Yates). */
  sample<T>(items: Iterable<T>, amount: number): T[] {
    const pool = [...items];
    if (amount > pool.length) {
      throw new RangeError(`cannot sample ${amount} of ${pool.length} items`);
    }
    for (let i = 0; i < amount; i++) {
      const j = this.range(i, pool.length);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, amount);
  }

  /** Independent stream seeded from this one. */
  fork(): SeededRng {
    return new SeededRng(this.nextU32());
  }
}
