import test from "node:test";
import assert from "node:assert/strict";
import * as fc from "fast-check";
import { evaluateExpression } from "../../engine/evaluator";
import { evaluateStandard } from "../../engine/precedence";
import { OPERATORS } from "../../engine/types";

test("a single operand evaluates to itself", () => {
  fc.assert(
    fc.property(fc.integer({ min: -1000, max: 1000 }), (x) => {
      const evaluation = evaluateExpression([x], []);
      assert.equal(evaluation.status, "ok");
      assert.ok(evaluation.value === x);
      assert.equal(evaluation.expression, `${x}`);
    })
  );
});

test("multiplying after the implicit leading + wraps the first operand", () => {
  assert.deepEqual(evaluateExpression([5, 2], ["*"]), {
    status: "ok",
    value: 10,
    expression: "(5) * 2",
  });
});

test("operators apply strictly left to right", () => {
  assert.deepEqual(evaluateExpression([1, 2, 3], ["+", "*"]), {
    status: "ok",
    value: 9,
    expression: "(1 + 2) * 3",
  });
  assert.deepEqual(evaluateExpression([2, 3, 1], ["*", "+"]), {
    status: "ok",
    value: 7,
    expression: "(2) * 3 + 1",
  });
  assert.deepEqual(evaluateExpression([8, 3, 2], ["-", "-"]), {
    status: "ok",
    value: 3,
    expression: "8 - 3 - 2",
  });
  assert.deepEqual(evaluateExpression([2, 3, 1, 4], ["*", "-", "*"]), {
    status: "ok",
    value: 20,
    expression: "((2) * 3 - 1) * 4",
  });
});

test("division truncates toward zero", () => {
  assert.deepEqual(evaluateExpression([7, 2], ["/"]), {
    status: "ok",
    value: 3,
    expression: "(7) / 2",
  });
  assert.deepEqual(evaluateExpression([1, 3, 2], ["-", "/"]), {
    status: "ok",
    value: -1,
    expression: "(1 - 3) / 2",
  });
  const zero = evaluateExpression([1, 2, 3], ["-", "/"]);
  assert.equal(zero.value, 0);
  assert.equal(zero.expression, "(1 - 2) / 3");
});

test("a zero divisor rejects the candidate", () => {
  assert.deepEqual(evaluateExpression([4, 0], ["/"]), {
    status: "division_by_zero",
    value: 0,
    expression: "",
  });
  assert.deepEqual(evaluateExpression([4, 0, 2], ["/", "+"]), {
    status: "division_by_zero",
    value: 0,
    expression: "",
  });
});

test("empty operands return an empty evaluation", () => {
  assert.deepEqual(evaluateExpression([], []), {
    status: "empty",
    value: 0,
    expression: "",
  });
});

test("operator count must be one less than operand count", () => {
  assert.throws(
    () => evaluateExpression([1, 2], []),
    /Expected 1 operator\(s\) for 2 operand\(s\), got 0/
  );
  assert.throws(() => evaluateExpression([1], ["+"]), /got 1/);
});

test("rendered expressions re-evaluate to the same value under standard precedence", () => {
  const candidate = fc.integer({ min: 1, max: 6 }).chain((n) =>
    fc.tuple(
      fc.array(fc.integer({ min: -20, max: 20 }), { minLength: n, maxLength: n }),
      fc.array(fc.constantFrom(...OPERATORS), { minLength: n - 1, maxLength: n - 1 })
    )
  );
  fc.assert(
    fc.property(candidate, ([operands, operators]) => {
      const evaluation = evaluateExpression(operands, operators);
      if (evaluation.status !== "ok") {
        return;
      }
      assert.ok(evaluateStandard(evaluation.expression) === evaluation.value);
    }),
    { numRuns: 500 }
  );
});
