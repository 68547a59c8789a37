import { evaluateStandard } from "../engine/precedence";
import { rollDice, Rng } from "../generator/dice";
import { dispatchPrimes } from "../solver/dispatcher";
import { parseArgs } from "./cli";
import { CAST_DEFAULTS, resolveCastConfig } from "./config";
import { formatDice, formatOutcome, formatPrimeLine, paint } from "./report";

const USAGE = `
Usage:
  node dist/scripts/cast.js [--options]

Options:
  --level <n>               Level 1-9 selecting the target primes (default: ${CAST_DEFAULTS.level})
  --primes <list>           Comma-separated target primes (overrides --level)
  --dice <list>             Comma-separated dice values (default: roll)
  --count <n>               Number of d6 to roll (default: ${CAST_DEFAULTS.count})
  --seed <n>                RNG seed (default: now)
  --max-evaluations <n>     Evaluations per prime (0 = unlimited; default: ${CAST_DEFAULTS.maxEvaluations})
  --time-limit <ms>         Milliseconds per prime (0 = unlimited; default: ${CAST_DEFAULTS.timeLimitMs})
  --inline                  Search on the main thread instead of worker threads
  --verify                  Re-check each expression with standard precedence
  --no-color                Disable colored output
  --help, -h                Show this help message
`.trim();

async function main(): Promise<void> {
  const { flags } = parseArgs(process.argv.slice(2), {
    shortBooleanFlags: ["h"],
  });
  if (flags.help || flags.h) {
    console.log(USAGE);
    return;
  }

  const config = resolveCastConfig(flags, {
    now: Date.now(),
    isTTY: Boolean(process.stdout.isTTY),
  });
  const dice = config.dice ?? rollDice(config.count, new Rng(config.seed));

  if (config.dice) {
    console.log(`Dice: [${dice.join(" ")}]`);
  } else {
    console.log(`${formatDice(dice)} (seed ${config.seed})`);
  }
  console.log(`Primes: ${config.primes.join(", ")}`);

  const outcome = await dispatchPrimes(dice, config.primes, {
    mode: config.mode,
    ...config.budget,
  });

  for (const result of outcome.results) {
    console.log(`  ${formatPrimeLine(result, config.color)}`);
    if (config.verify && result.found) {
      const checked = evaluateStandard(result.expression);
      if (checked !== result.prime) {
        console.log(
          `    ${paint(`standard precedence gives ${checked}`, "yellow", config.color)}`
        );
      }
    }
  }
  console.log(formatOutcome(outcome.success, config.color));
  process.exitCode = outcome.success ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 2;
});
