/** Seeded mulberry32 generator, so rolls can be replayed from a seed. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in 1..sides. */
  roll(sides: number): number {
    if (!Number.isInteger(sides) || sides < 1) {
      throw new RangeError(`Die must have at least one side, got ${sides}`);
    }
    return Math.floor(this.next() * sides) + 1;
  }
}

export function rollDice(count: number, rng: Rng, sides = 6): number[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Dice count must be a non-negative integer, got ${count}`);
  }
  const dice: number[] = [];
  for (let i = 0; i < count; i += 1) {
    dice.push(rng.roll(sides));
  }
  return dice;
}
