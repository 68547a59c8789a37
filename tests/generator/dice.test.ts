import test from "node:test";
import assert from "node:assert/strict";
import { rollDice, Rng } from "../../generator/dice";

test("rollDice produces the requested number of d6 values", () => {
  const dice = rollDice(50, new Rng(7));
  assert.equal(dice.length, 50);
  for (const value of dice) {
    assert.ok(Number.isInteger(value) && value >= 1 && value <= 6, `bad roll ${value}`);
  }
});

test("rollDice replays the same values for the same seed", () => {
  assert.deepEqual(rollDice(8, new Rng(1234)), rollDice(8, new Rng(1234)));
});

test("rollDice honours custom die sizes", () => {
  const dice = rollDice(20, new Rng(3), 2);
  assert.ok(dice.every((value) => value === 1 || value === 2));
});

test("rollDice of zero dice is empty", () => {
  assert.deepEqual(rollDice(0, new Rng(1)), []);
});

test("rollDice rejects invalid counts and die sizes", () => {
  assert.throws(() => rollDice(-1, new Rng(1)), RangeError);
  assert.throws(() => rollDice(1.5, new Rng(1)), RangeError);
  assert.throws(() => new Rng(1).roll(0), /at least one side/);
});
