import { setTimeout as sleep } from "node:timers/promises";
import { TaskError } from "../errors/snapshotErrors.js";
import type { Logger } from "../telemetry/logger.js";
import type { NodeApi } from "../types/interfaces.js";

export interface TaskWaiterOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  logger: Logger;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Polls a node task until it stops. A stopped task with exit status `OK` resolves; any other
 * exit status, or a deadline passing first, rejects with a TaskError. A stuck task is left
 * running on the node.
 */
export class TaskWaiter {
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: TaskWaiterOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger.child({ component: "task" });
  }

  async wait(api: NodeApi, upid: string, signal?: AbortSignal): Promise<void> {
    const { pollIntervalMs, timeoutMs } = this.options;
    this.logger.info(`Waiting for task ${upid}...`);
    const deadline = this.now() + timeoutMs;

    for (;;) {
      signal?.throwIfAborted();
      if (this.now() > deadline) {
        throw new TaskError(upid, "timeout", `Task timed out after ${Math.round(timeoutMs / 1000)} seconds`);
      }

      const task = await api.getTaskStatus(upid);
      if (task.status === "stopped") {
        const exitStatus = task.exitStatus ?? "";
        if (exitStatus === "OK") {
          this.logger.info("Task completed successfully");
          return;
        }
        throw new TaskError(upid, "failed", `Task failed with status: ${exitStatus || "(none)"}`, exitStatus);
      }

      this.logger.debug({ upid, status: task.status }, "Task still running");
      await this.sleep(pollIntervalMs, signal);
    }
  }
}
