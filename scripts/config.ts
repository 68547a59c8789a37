import { MAX_DICE } from "../engine/enumerate";
import type { SearchBudget } from "../engine/types";
import { getPrimeConstants, MAX_LEVEL } from "../generator/levels";
import type { DispatchMode } from "../solver/dispatcher";
import {
  assertKnownFlags,
  parseIntegerList,
  parseIntegerValue,
  type FlagValue,
} from "./cli";

export const CAST_DEFAULTS = {
  level: 1,
  count: 6,
  maxEvaluations: 0,
  timeLimitMs: 0,
} as const;

export const CAST_FLAGS = [
  "level",
  "primes",
  "dice",
  "count",
  "seed",
  "max-evaluations",
  "time-limit",
  "inline",
  "verify",
  "no-color",
  "help",
  "h",
] as const;

export interface CastConfig {
  level: number;
  primes: number[];
  /** Fixed dice from --dice; null means roll `count` d6 with `seed`. */
  dice: number[] | null;
  count: number;
  seed: number;
  budget: SearchBudget;
  mode: DispatchMode;
  verify: boolean;
  color: boolean;
}

export interface CastEnvironment {
  now: number;
  isTTY: boolean;
}

export function resolveCastConfig(
  flags: Record<string, FlagValue>,
  env: CastEnvironment
): CastConfig {
  assertKnownFlags(flags, CAST_FLAGS);

  const level = parseIntegerValue(flags.level, CAST_DEFAULTS.level, "level", {
    min: 1,
    max: MAX_LEVEL,
  });
  const primes =
    parseIntegerList(flags.primes, "primes", { min: 1 }) ?? getPrimeConstants(level);
  const dice = parseIntegerList(flags.dice, "dice", { min: 1 }) ?? null;
  if (dice && dice.length > MAX_DICE) {
    throw new Error(`Invalid value for --dice: at most ${MAX_DICE} dice`);
  }
  const count = dice
    ? dice.length
    : parseIntegerValue(flags.count, CAST_DEFAULTS.count, "count", {
        min: 1,
        max: MAX_DICE,
      });

  return {
    level,
    primes,
    dice,
    count,
    seed: parseIntegerValue(flags.seed, env.now, "seed"),
    budget: {
      maxEvaluations: parseIntegerValue(
        flags["max-evaluations"],
        CAST_DEFAULTS.maxEvaluations,
        "max-evaluations",
        { min: 0 }
      ),
      timeLimitMs: parseIntegerValue(
        flags["time-limit"],
        CAST_DEFAULTS.timeLimitMs,
        "time-limit",
        { min: 0 }
      ),
    },
    mode: flags.inline ? "inline" : "worker",
    verify: Boolean(flags.verify),
    color: env.isTTY && !flags["no-color"],
  };
}
