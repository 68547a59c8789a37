import type { Evaluation, Operator } from "./types";

function isAdditive(op: Operator): boolean {
  return op === "+" || op === "-";
}

function isMultiplicative(op: Operator): boolean {
  return op === "*" || op === "/";
}

function failed(status: Evaluation["status"]): Evaluation {
  return { status, value: 0, expression: "" };
}

/**
 * Evaluates `operands` strictly left to right, ignoring operator precedence.
 *
 * The rendering wraps everything built so far in parentheses whenever a
 * multiplicative operator follows an additive one, so the text reads the same
 * under conventional precedence. Division truncates toward zero; a zero
 * divisor rejects the whole candidate.
 */
export function evaluateExpression(
  operands: readonly number[],
  operators: readonly Operator[]
): Evaluation {
  if (operands.length === 0) {
    return failed("empty");
  }
  if (operators.length !== operands.length - 1) {
    throw new Error(
      `Expected ${operands.length - 1} operator(s) for ${operands.length} operand(s), got ${operators.length}`
    );
  }

  let value = operands[0];
  let expression = `${operands[0]}`;
  let previous: Operator = "+";

  for (let i = 1; i < operands.length; i += 1) {
    const next = operands[i];
    const op = operators[i - 1];

    if (isAdditive(previous) && isMultiplicative(op)) {
      expression = `(${expression}) ${op} ${next}`;
    } else {
      expression = `${expression} ${op} ${next}`;
    }

    switch (op) {
      case "+":
        value += next;
        break;
      case "-":
        value -= next;
        break;
      case "*":
        value *= next;
        break;
      case "/": {
        if (next === 0) {
          return failed("division_by_zero");
        }
        const quotient = Math.trunc(value / next);
        value = quotient === 0 ? 0 : quotient;
        break;
      }
    }
    previous = op;
  }

  return { status: "ok", value, expression };
}
