import type { SearchResult } from "../engine/types";

const COLORS = {
  red: "\u001b[91m",
  green: "\u001b[92m",
  yellow: "\u001b[93m",
  reset: "\u001b[0m",
} as const;

export type Tone = "red" | "green" | "yellow";

export function paint(text: string, tone: Tone, color: boolean): string {
  return color ? `${COLORS[tone]}${text}${COLORS.reset}` : text;
}

export function formatDice(dice: readonly number[]): string {
  return `Rolling ${dice.length} d6: [${dice.join(" ")}]`;
}

export function formatPrimeLine(result: SearchResult, color = false): string {
  if (result.found) {
    return paint(`Prime ${result.prime}: ${result.expression}`, "green", color);
  }
  if (result.status === "budget") {
    return paint(
      `Prime ${result.prime}: Budget exhausted after ${result.evaluations} evaluations`,
      "yellow",
      color
    );
  }
  return paint(`Prime ${result.prime}: Not found`, "red", color);
}

export function formatOutcome(success: boolean, color = false): string {
  return success
    ? paint("Success! You can cast the spell at its original level.", "green", color)
    : paint("Failed to find all required prime numbers.", "red", color);
}

export function formatRate(successes: number, trials: number): string {
  const percent = trials === 0 ? 0 : (successes / trials) * 100;
  return `Success rate: ${successes}/${trials} (${percent.toFixed(1)}%)`;
}
