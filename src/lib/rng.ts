import { logger } from './logger';

// Seeded generator for the opt-in probabilistic rules (hit chance, detection rolls).
// Algorithm: Mulberry32
export class RNG {
  private state: number;

  constructor(seed: number) {
    this.state = this.normalizeState(seed);
  }

  public getState(): number {
    return this.state;
  }

  public setState(state: number): void {
    this.state = this.normalizeState(state);
  }

  // Handles NaN, Infinity, negatives and non-integers
  private normalizeState(value: number): number {
    if (!Number.isFinite(value)) {
      logger.warn('[RNG] Invalid state value, defaulting to 1');
      return 1;
    }
    return (Math.floor(Math.abs(value)) >>> 0) || 1;
  }

  public nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  // [0, 1)
  public next(): number {
    return this.nextUint32() / 4294967296;
  }

  /**
   * Bernoulli trial. Certain outcomes (p <= 0 or p >= 1) do not consume a draw,
   * so deterministic configurations leave the sequence untouched.
   */
  public chance(probability: number): boolean {
    if (probability >= 1) return true;
    if (probability <= 0) return false;
    return this.next() < probability;
  }
}
