import { Rng } from "../generator/dice";
import { MAX_LEVEL } from "../generator/levels";
import { estimateSuccessRate } from "../solver/odds";
import { assertKnownFlags, parseArgs, parseIntegerValue } from "./cli";
import { formatRate } from "./report";

const DEFAULTS = {
  level: 1,
  count: 6,
  trials: 100,
  maxEvaluations: 0,
  timeLimitMs: 0,
} as const;

const USAGE = `
Usage:
  node dist/scripts/success_rate.js [--options]

Options:
  --level <n>               Level 1-${MAX_LEVEL} (default: ${DEFAULTS.level})
  --count <n>               Number of d6 per roll (default: ${DEFAULTS.count})
  --trials <n>              Rolls to sample (default: ${DEFAULTS.trials})
  --seed <n>                RNG seed (default: now)
  --max-evaluations <n>     Evaluations per prime (0 = unlimited; default: ${DEFAULTS.maxEvaluations})
  --time-limit <ms>         Milliseconds per prime (0 = unlimited; default: ${DEFAULTS.timeLimitMs})
  --inline                  Search on the main thread instead of worker threads
  --no-progress             Disable inline progress output
  --help, -h                Show this help message
`.trim();

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  if (seconds >= 10) {
    return `${seconds.toFixed(0)}s`;
  }
  return `${seconds.toFixed(1)}s`;
}

async function main(): Promise<void> {
  const { flags } = parseArgs(process.argv.slice(2), {
    shortBooleanFlags: ["h"],
  });
  if (flags.help || flags.h) {
    console.log(USAGE);
    return;
  }
  assertKnownFlags(flags, [
    "level",
    "count",
    "trials",
    "seed",
    "max-evaluations",
    "time-limit",
    "inline",
    "no-progress",
    "help",
    "h",
  ]);

  const level = parseIntegerValue(flags.level, DEFAULTS.level, "level", {
    min: 1,
    max: MAX_LEVEL,
  });
  const count = parseIntegerValue(flags.count, DEFAULTS.count, "count", { min: 1, max: 12 });
  const trials = parseIntegerValue(flags.trials, DEFAULTS.trials, "trials", { min: 1 });
  const seed = parseIntegerValue(flags.seed, Date.now(), "seed");
  const stdout = process.stdout;
  const showProgress = !flags["no-progress"] && Boolean(stdout.isTTY);
  const startedAt = Date.now();
  let successes = 0;

  const rate = await estimateSuccessRate({
    level,
    diceCount: count,
    trials,
    rng: new Rng(seed),
    mode: flags.inline ? "inline" : "worker",
    maxEvaluations: parseIntegerValue(
      flags["max-evaluations"],
      DEFAULTS.maxEvaluations,
      "max-evaluations",
      { min: 0 }
    ),
    timeLimitMs: parseIntegerValue(flags["time-limit"], DEFAULTS.timeLimitMs, "time-limit", {
      min: 0,
    }),
    onTrial(trial) {
      if (trial.success) {
        successes += 1;
      }
      if (!showProgress) {
        return;
      }
      const elapsed = formatSeconds(Date.now() - startedAt);
      stdout.write(
        `\r\u001b[2K[odds] trial ${trial.index + 1}/${trials} · successes ${successes} · ${elapsed}`
      );
    },
  });

  if (showProgress) {
    stdout.write("\r\u001b[2K");
  }
  console.log(`Level ${level}, ${count} d6, seed ${seed}`);
  console.log(formatRate(rate.successes, rate.trials));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 2;
});
