import test from "node:test";
import assert from "node:assert/strict";
import {
  MAX_DICE,
  operatorSequences,
  permutations,
  subsets,
} from "../../engine/enumerate";

function factorial(n: number): number {
  return n <= 1 ? 1 : n * factorial(n - 1);
}

test("subsets follow increasing bitmask order and keep index order", () => {
  assert.deepEqual(
    [...subsets([4, 5, 6])],
    [[4], [5], [4, 5], [6], [4, 6], [5, 6], [4, 5, 6]]
  );
});

test("subsets yields 2^N - 1 entries", () => {
  for (let n = 0; n <= 8; n += 1) {
    const dice = Array.from({ length: n }, (_, i) => i + 1);
    assert.equal([...subsets(dice)].length, 2 ** n - 1);
  }
});

test("subsets treats equal values as distinct dice", () => {
  assert.deepEqual([...subsets([2, 2])], [[2], [2], [2, 2]]);
});

test("subsets rejects more dice than a mask can address", () => {
  const dice = new Array<number>(MAX_DICE + 1).fill(1);
  assert.throws(() => [...subsets(dice)], RangeError);
});

test("permutations uses Heap's ordering", () => {
  assert.deepEqual(
    [...permutations([1, 2, 3])],
    [
      [1, 2, 3],
      [2, 1, 3],
      [3, 1, 2],
      [1, 3, 2],
      [2, 3, 1],
      [3, 2, 1],
    ]
  );
});

test("permutations yields M! distinct orderings", () => {
  for (let m = 1; m <= 8; m += 1) {
    const values = Array.from({ length: m }, (_, i) => i);
    const all = [...permutations(values)];
    assert.equal(all.length, factorial(m));
    assert.equal(new Set(all.map((p) => p.join(","))).size, factorial(m));
  }
});

test("permutations keeps repeated values as separate orderings", () => {
  assert.deepEqual([...permutations([2, 2])], [
    [2, 2],
    [2, 2],
  ]);
});

test("permutations is restartable and leaves its input alone", () => {
  const input = [3, 1, 2];
  const first = [...permutations(input)];
  const second = [...permutations(input)];
  assert.deepEqual(first, second);
  assert.deepEqual(input, [3, 1, 2]);
});

test("permutations of nothing yields nothing", () => {
  assert.deepEqual([...permutations([])], []);
});

test("operatorSequences of length zero is a single empty sequence", () => {
  assert.deepEqual([...operatorSequences(0)], [[]]);
});

test("operatorSequences is lexicographic over + - * /", () => {
  assert.deepEqual([...operatorSequences(1)], [["+"], ["-"], ["*"], ["/"]]);
  const pairs = [...operatorSequences(2)];
  assert.deepEqual(pairs.slice(0, 5), [
    ["+", "+"],
    ["+", "-"],
    ["+", "*"],
    ["+", "/"],
    ["-", "+"],
  ]);
  assert.deepEqual(pairs[pairs.length - 1], ["/", "/"]);
});

test("operatorSequences yields 4^k entries", () => {
  for (let k = 0; k <= 5; k += 1) {
    assert.equal([...operatorSequences(k)].length, 4 ** k);
  }
});

test("operatorSequences rejects negative lengths", () => {
  assert.throws(() => [...operatorSequences(-1)], RangeError);
});
