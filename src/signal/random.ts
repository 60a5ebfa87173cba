/**
 * Seeded pseudo-random generator
 *
 * mulberry32 core with the distributions the synthesizers draw from. Every
 * synthesizer holds one instance; the shared default makes unseeded runs
 * behave like a single process-wide stream.
 *
 * @module signal/random
 */

export class Random {
  private state: number;
  private spareNormal: number | null = null;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  /**
   * Restart the stream from a seed
   */
  seed(seed: number): void {
    this.state = seed >>> 0;
    this.spareNormal = null;
  }

  /**
   * Uniform float in [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  uniform(min: number = 0, max: number = 1): number {
    return min + (max - min) * this.next();
  }

  /**
   * Gaussian draw (Box-Muller, second value cached)
   */
  normal(mean: number = 0, std: number = 1): number {
    if (std === 0) return mean;

    if (this.spareNormal !== null) {
      const z = this.spareNormal;
      this.spareNormal = null;
      return mean + std * z;
    }

    let u = 0;
    while (u === 0) u = this.next();
    const v = this.next();
    const radius = Math.sqrt(-2 * Math.log(u));
    this.spareNormal = radius * Math.sin(2 * Math.PI * v);
    return mean + std * radius * Math.cos(2 * Math.PI * v);
  }

  /**
   * Integer in [min, maxExclusive)
   */
  integer(min: number, maxExclusive: number): number {
    return min + Math.floor(this.next() * (maxExclusive - min));
  }

  /**
   * Exponential draw with the given rate (events per unit)
   */
  exponential(rate: number): number {
    return -Math.log(1 - this.next()) / rate;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  /**
   * +1 or -1 with equal probability
   */
  sign(): 1 | -1 {
    return this.next() < 0.5 ? -1 : 1;
  }
}

/**
 * Process-wide default stream
 */
export const sharedRandom = new Random();
