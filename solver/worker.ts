import { parentPort, workerData } from "worker_threads";
import { isSearchTask, type WorkerMessage } from "./dispatcher";
import { searchPrime } from "./search";

function run(): void {
  const port = parentPort;
  if (!port) {
    throw new Error("solver/worker must be started as a worker thread");
  }
  const task: unknown = workerData;
  if (!isSearchTask(task)) {
    const message: WorkerMessage = { type: "error", message: "Malformed search task" };
    port.postMessage(message);
    return;
  }
  const result = searchPrime(task.dice, task.prime, task.budget);
  const message: WorkerMessage = { type: "result", result };
  port.postMessage(message);
}

run();
