import type { SearchBudget } from "../engine/types";
import { rollDice, type Rng } from "../generator/dice";
import { getPrimeConstants } from "../generator/levels";
import { dispatchPrimes, type DispatchMode } from "./dispatcher";

export interface SuccessRateOptions extends SearchBudget {
  level: number;
  diceCount: number;
  trials: number;
  rng: Rng;
  mode?: DispatchMode;
  onTrial?: (trial: { index: number; dice: number[]; success: boolean }) => void;
}

export interface SuccessRate {
  trials: number;
  successes: number;
  rate: number;
}

/** Estimates how often a fresh roll of `diceCount` d6 reaches every prime of `level`. */
export async function estimateSuccessRate(
  options: SuccessRateOptions
): Promise<SuccessRate> {
  const primes = getPrimeConstants(options.level);
  const trials = Math.max(0, Math.floor(options.trials));
  let successes = 0;

  for (let index = 0; index < trials; index += 1) {
    const dice = rollDice(options.diceCount, options.rng);
    const outcome = await dispatchPrimes(dice, primes, {
      mode: options.mode,
      maxEvaluations: options.maxEvaluations,
      timeLimitMs: options.timeLimitMs,
    });
    if (outcome.success) {
      successes += 1;
    }
    options.onTrial?.({ index, dice, success: outcome.success });
  }

  return {
    trials,
    successes,
    rate: trials === 0 ? 0 : successes / trials,
  };
}
