export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextFloat(): number {
    this.state = (this.state * 1664525 + 1013904223) >>> 0;
    return this.state / 0xffffffff;
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.nextFloat();
  }

  nextInt(maxExclusive: number): number {
    if (maxExclusive <= 0) {
      return 0;
    }

    return Math.min(maxExclusive - 1, Math.floor(this.nextFloat() * maxExclusive));
  }

  sign(): 1 | -1 {
    return this.nextFloat() < 0.5 ? -1 : 1;
  }
}
