import { operatorSequences, permutations, subsets } from "../engine/enumerate";
import { evaluateExpression } from "../engine/evaluator";
import type { SearchBudget, SearchResult, SearchStatus } from "../engine/types";

const DEADLINE_CHECK_EVERY = 1024;

export interface SearchProgress {
  prime: number;
  status: SearchStatus | "searching";
  evaluations: number;
  subsets: number;
}

export interface SearchOptions extends SearchBudget {
  progressEvery?: number;
  onProgress?: (progress: SearchProgress) => void;
  now?: () => number;
}

function normalizeLimit(raw: number | undefined): number {
  if (raw === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  if (!Number.isFinite(raw) || raw <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return raw;
}

/**
 * Brute-force search for the first subset/permutation/operator combination of
 * `dice` that evaluates to `prime`. Enumeration order is fixed, so the
 * reported expression is reproducible for a given dice order.
 */
export function searchPrime(
  dice: readonly number[],
  prime: number,
  options?: SearchOptions
): SearchResult {
  const maxEvaluations = normalizeLimit(options?.maxEvaluations);
  const timeLimit = normalizeLimit(options?.timeLimitMs);
  const now = options?.now ?? Date.now;
  const deadline = now() + timeLimit;
  const progressEvery = Math.max(0, Math.floor(options?.progressEvery ?? 0));
  const onProgress = options?.onProgress;
  let evaluations = 0;
  let visitedSubsets = 0;

  function finish(status: SearchStatus, expression = ""): SearchResult {
    onProgress?.({ prime, status, evaluations, subsets: visitedSubsets });
    return {
      prime,
      expression,
      found: status === "found",
      status,
      evaluations,
    };
  }

  for (const subset of subsets(dice)) {
    visitedSubsets += 1;
    for (const operands of permutations(subset)) {
      for (const operators of operatorSequences(operands.length - 1)) {
        if (evaluations >= maxEvaluations) {
          return finish("budget");
        }
        if (
          evaluations % DEADLINE_CHECK_EVERY === 0 &&
          evaluations > 0 &&
          now() >= deadline
        ) {
          return finish("budget");
        }

        const evaluation = evaluateExpression(operands, operators);
        evaluations += 1;

        if (evaluation.status === "ok" && evaluation.value === prime) {
          return finish("found", evaluation.expression);
        }
        if (onProgress && progressEvery > 0 && evaluations % progressEvery === 0) {
          onProgress({
            prime,
            status: "searching",
            evaluations,
            subsets: visitedSubsets,
          });
        }
      }
    }
  }

  return finish("exhausted");
}
