export const MAX_LEVEL = 9;

// Three consecutive primes per level, starting at 3.
const PRIME_TABLE: readonly (readonly number[])[] = [
  [3, 5, 7],
  [11, 13, 17],
  [19, 23, 29],
  [31, 37, 41],
  [43, 47, 53],
  [59, 61, 67],
  [71, 73, 79],
  [83, 89, 97],
  [101, 103, 107],
];

export function getPrimeConstants(level: number): number[] {
  if (!Number.isInteger(level) || level < 1 || level > MAX_LEVEL) {
    throw new RangeError(`Level must be an integer from 1 to ${MAX_LEVEL}, got ${level}`);
  }
  return [...PRIME_TABLE[level - 1]];
}
