import type { Logger } from "./logger.js";

/**
 * Bounded queue for fire-and-forget background work.
 *
 * Tasks sharing a key run one at a time in enqueue order; tasks with
 * different keys run concurrently up to `concurrency`. A task whose key and
 * name match one still waiting replaces that task in place, so the backlog
 * holds at most one of each per key. When `maxPending` tasks are already
 * waiting, other new tasks are dropped and logged. Failures are
 * logged and never retried. `drain()` resolves once nothing is waiting or
 * running.
 */
export type TaskQueue = {
  enqueue(key: string, name: string, task: () => Promise<void>): boolean;
  drain(): Promise<void>;
  size(): { waiting: number; running: number };
};

type Job = {
  key: string;
  name: string;
  task: () => Promise<void>;
};

export function createTaskQueue({
  concurrency,
  maxPending,
  logger,
}: {
  concurrency: number;
  maxPending: number;
  logger: Logger;
}): TaskQueue {
  const waiting: Job[] = [];
  const busyKeys = new Set<string>();
  let running = 0;
  let idleWaiters: Array<() => void> = [];

  function pump() {
    let index = 0;
    while (index < waiting.length && running < concurrency) {
      const job = waiting[index];
      if (busyKeys.has(job.key)) {
        index++;
        continue;
      }
      waiting.splice(index, 1);
      start(job);
    }
    if (running === 0 && waiting.length === 0) {
      const resolvers = idleWaiters;
      idleWaiters = [];
      for (const resolve of resolvers) resolve();
    }
  }

  function start(job: Job) {
    running++;
    busyKeys.add(job.key);
    void Promise.resolve()
      .then(job.task)
      .catch((error: unknown) => {
        logger.error(
          { error, key: job.key, task: job.name },
          "task-queue.task.failed",
        );
      })
      .finally(() => {
        running--;
        busyKeys.delete(job.key);
        pump();
      });
  }

  return {
    enqueue(key, name, task) {
      const queued = waiting.find(
        (job) => job.key === key && job.name === name,
      );
      if (queued) {
        queued.task = task;
        logger.debug({ key, task: name }, "task-queue.task.coalesced");
        return true;
      }
      if (waiting.length >= maxPending) {
        logger.warn(
          { key, task: name, waiting: waiting.length },
          "task-queue.task.dropped",
        );
        return false;
      }
      waiting.push({ key, name, task });
      pump();
      return true;
    },
    drain() {
      if (running === 0 && waiting.length === 0) return Promise.resolve();
      return new Promise<void>((resolve) => idleWaiters.push(resolve));
    },
    size() {
      return { waiting: waiting.length, running };
    },
  };
}
