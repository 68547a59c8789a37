import { OPERATORS, type Operator } from "./types";

export const MAX_DICE = 30;

/**
 * Yields every non-empty subset of `values` in increasing bitmask order
 * (bit j set means index j is included). Values keep their original order.
 */
export function* subsets(values: readonly number[]): Generator<number[]> {
  const n = values.length;
  if (n > MAX_DICE) {
    throw new RangeError(`At most ${MAX_DICE} dice are supported, got ${n}`);
  }
  const limit = 2 ** n;
  for (let mask = 1; mask < limit; mask += 1) {
    const subset: number[] = [];
    for (let j = 0; j < n; j += 1) {
      if ((mask & (1 << j)) !== 0) {
        subset.push(values[j]);
      }
    }
    yield subset;
  }
}

function* heap(arr: number[], n: number): Generator<number[]> {
  if (n <= 1) {
    yield [...arr];
    return;
  }
  for (let i = 0; i < n; i += 1) {
    yield* heap(arr, n - 1);
    const swapWith = n % 2 === 1 ? 0 : i;
    const tmp = arr[swapWith];
    arr[swapWith] = arr[n - 1];
    arr[n - 1] = tmp;
  }
}

// Heap's algorithm. Equal values still produce separate orderings.
export function* permutations(values: readonly number[]): Generator<number[]> {
  if (values.length === 0) {
    return;
  }
  yield* heap([...values], values.length);
}

/** Yields all 4^length operator sequences, lexicographic over `+ - * /`. */
export function* operatorSequences(length: number): Generator<Operator[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Operator sequence length must be a non-negative integer, got ${length}`);
  }
  if (length === 0) {
    yield [];
    return;
  }
  for (const op of OPERATORS) {
    for (const rest of operatorSequences(length - 1)) {
      yield [op, ...rest];
    }
  }
}
