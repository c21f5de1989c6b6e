import { describe, it, expect, vi } from "vitest";
import { newJobId, type JobId } from "../src/core/ids.js";
import { JobQueue } from "../src/scheduler/jobQueue.js";
import { Scheduler } from "../src/scheduler/scheduler.js";
import { capturingLogger } from "./helpers.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function harness(maxConcurrentJobs: number) {
  const started: JobId[] = [];
  const gates = new Map<JobId, { promise: Promise<void>; resolve: () => void }>();
  const queue = new JobQueue({ maxQueuedJobs: 10 });
  const { logger, entries } = capturingLogger();
  const scheduler = new Scheduler({
    queue,
    maxConcurrentJobs,
    logger,
    runJob: async (jobId) => {
      started.push(jobId);
      const gate = deferred();
      gates.set(jobId, gate);
      await gate.promise;
    }
  });
  const release = (jobId: JobId): void => {
    const gate = gates.get(jobId);
    if (!gate) throw new Error(`job ${jobId} has not started`);
    gate.resolve();
  };
  return { scheduler, queue, started, release, entries };
}

describe("Scheduler", () => {
  it("holds work until started", async () => {
    const { scheduler, started, queue } = harness(1);
    const a = newJobId();
    scheduler.submit(a, 5);
    await new Promise((r) => setTimeout(r, 20));
    expect(started).toEqual([]);
    expect(queue.size).toBe(1);

    scheduler.start();
    await vi.waitFor(() => expect(started).toEqual([a]));
    expect(queue.size).toBe(0);
  });

  it("never runs more than the slot count and fills a slot when one frees up", async () => {
    const { scheduler, started, release } = harness(2);
    scheduler.start();
    const [a, b, c] = [newJobId(), newJobId(), newJobId()];
    scheduler.submit(a, 5);
    scheduler.submit(b, 5);
    scheduler.submit(c, 5);

    await vi.waitFor(() => expect(started).toEqual([a, b]));
    expect(scheduler.activeCount).toBe(2);

    release(a);
    await vi.waitFor(() => expect(started).toEqual([a, b, c]));
    expect(scheduler.isRunning(a)).toBe(false);

    release(b);
    release(c);
    await scheduler.waitForIdle();
    expect(scheduler.activeCount).toBe(0);
  });

  it("picks the highest priority job at the next free slot", async () => {
    const { scheduler, started, release } = harness(1);
    scheduler.start();
    const [first, low, high] = [newJobId(), newJobId(), newJobId()];
    scheduler.submit(first, 1);
    await vi.waitFor(() => expect(started).toEqual([first]));

    scheduler.submit(low, 2);
    scheduler.submit(high, 9);
    release(first);
    await vi.waitFor(() => expect(started).toEqual([first, high]));
    release(high);
    await vi.waitFor(() => expect(started).toEqual([first, high, low]));
    release(low);
    await scheduler.waitForIdle();
  });

  it("frees the slot of a runner that throws", async () => {
    const queue = new JobQueue({ maxQueuedJobs: 10 });
    const { logger, entries } = capturingLogger();
    const ran: JobId[] = [];
    const [bad, good] = [newJobId(), newJobId()];
    const scheduler = new Scheduler({
      queue,
      maxConcurrentJobs: 1,
      logger,
      runJob: async (jobId) => {
        ran.push(jobId);
        if (jobId === bad) throw new Error("boom");
      }
    });
    scheduler.start();
    scheduler.submit(bad, 5);
    scheduler.submit(good, 5);

    await vi.waitFor(() => expect(ran).toEqual([bad, good]));
    await scheduler.waitForIdle();
    const crash = entries.find((e) => e.kind === "scheduler.job_crashed");
    expect(crash?.message).toBe(`runner for ${bad} threw: boom`);
  });

  it("withdraws queued jobs and stops dispatching when paused", async () => {
    const { scheduler, started, release, queue } = harness(1);
    scheduler.start();
    const [a, b, c] = [newJobId(), newJobId(), newJobId()];
    scheduler.submit(a, 5);
    scheduler.submit(b, 5);
    scheduler.submit(c, 5);
    await vi.waitFor(() => expect(started).toEqual([a]));

    expect(scheduler.withdraw(b)).toBe(true);
    scheduler.pause();
    release(a);
    await scheduler.waitForIdle();
    expect(started).toEqual([a]);
    expect(queue.position(c)).toBe(1);
  });
});
