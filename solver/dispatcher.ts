import path from "path";
import { Worker } from "worker_threads";
import type { DispatchResult, SearchBudget, SearchResult } from "../engine/types";
import { searchPrime } from "./search";

export type DispatchMode = "worker" | "inline";

export interface DispatchOptions extends SearchBudget {
  mode?: DispatchMode;
  onSettled?: (result: SearchResult) => void;
}

export interface SearchTask {
  dice: number[];
  prime: number;
  budget: SearchBudget;
}

export type WorkerMessage =
  | { type: "result"; result: SearchResult }
  | { type: "error"; message: string };

export class SearchDispatchError extends Error {
  readonly prime: number;

  constructor(message: string, prime: number) {
    super(message);
    this.name = "SearchDispatchError";
    this.prime = prime;
  }
}

export const MAX_CONCURRENT_UNITS = 3;

// Resolves to worker.ts under tsx and worker.js once compiled.
const WORKER_ENTRY = path.join(__dirname, `worker${path.extname(__filename)}`);

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

export function isSearchTask(value: unknown): value is SearchTask {
  if (!value || typeof value !== "object") {
    return false;
  }
  const task = value as Partial<SearchTask>;
  return (
    isNumberArray(task.dice) &&
    typeof task.prime === "number" &&
    Boolean(task.budget) &&
    typeof task.budget === "object"
  );
}

function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (!value || typeof value !== "object") {
    return false;
  }
  const message = value as { type?: unknown };
  return message.type === "result" || message.type === "error";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function runInline(task: SearchTask): Promise<SearchResult> {
  return new Promise((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(searchPrime(task.dice, task.prime, task.budget));
      } catch (error) {
        reject(
          new SearchDispatchError(
            `Search for prime ${task.prime} failed: ${describe(error)}`,
            task.prime
          )
        );
      }
    });
  });
}

// Unbuilt sources need tsx's CommonJS hook registered inside the worker itself.
function workerSource(entry: string): string {
  const load = `require(${JSON.stringify(entry)});`;
  return entry.endsWith(".ts") ? `require("tsx/cjs");\n${load}` : load;
}

function runInWorker(task: SearchTask, active: Set<Worker>): Promise<SearchResult> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(workerSource(WORKER_ENTRY), {
      eval: true,
      workerData: task,
    });
    active.add(worker);
    let settled = false;

    worker.once("message", (message: unknown) => {
      settled = true;
      if (!isWorkerMessage(message)) {
        reject(new SearchDispatchError("Unexpected worker message", task.prime));
        return;
      }
      if (message.type === "error") {
        reject(new SearchDispatchError(message.message, task.prime));
        return;
      }
      resolve(message.result);
    });
    worker.once("error", (error: Error) => {
      settled = true;
      reject(
        new SearchDispatchError(
          `Search worker for prime ${task.prime} failed: ${error.message}`,
          task.prime
        )
      );
    });
    worker.once("exit", (code: number) => {
      active.delete(worker);
      if (!settled) {
        reject(
          new SearchDispatchError(
            `Search worker for prime ${task.prime} exited with code ${code}`,
            task.prime
          )
        );
      }
    });
  });
}

/**
 * Runs `run` over `items` with at most `limit` calls in flight, keeping input
 * order in the output. After the first rejection no further items start.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  run: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  async function lane(): Promise<void> {
    while (!failed && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await run(items[index]);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const width = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: width }, () => lane()));
  return results;
}

/**
 * Runs one search per prime, at most three at a time, and waits for all of
 * them. Results come back sorted by prime; `success` requires every prime
 * found. If any unit fails, workers still running are terminated.
 */
export async function dispatchPrimes(
  dice: readonly number[],
  primes: readonly number[],
  options?: DispatchOptions
): Promise<DispatchResult> {
  const mode = options?.mode ?? "worker";
  const shared = Object.freeze([...dice]);
  const budget: SearchBudget = {
    maxEvaluations: options?.maxEvaluations,
    timeLimitMs: options?.timeLimitMs,
  };
  const active = new Set<Worker>();
  const run =
    mode === "worker"
      ? (task: SearchTask) => runInWorker(task, active)
      : runInline;

  let results: SearchResult[];
  try {
    results = await runBounded(primes, MAX_CONCURRENT_UNITS, async (prime) => {
      const result = await run({ dice: [...shared], prime, budget });
      options?.onSettled?.(result);
      return result;
    });
  } catch (error) {
    await Promise.all([...active].map((worker) => worker.terminate()));
    throw error;
  }

  results.sort((a, b) => a.prime - b.prime);
  return {
    results,
    success: results.every((result) => result.found),
  };
}
