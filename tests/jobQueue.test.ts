import { describe, it, expect } from "vitest";
import { JobServiceError } from "../src/core/errors.js";
import { newJobId } from "../src/core/ids.js";
import { JobQueue } from "../src/scheduler/jobQueue.js";
import { catchError } from "./helpers.js";

describe("JobQueue", () => {
  it("dequeues by priority, first-in-first-out among equals", () => {
    const q = new JobQueue({ maxQueuedJobs: 10 });
    const a = newJobId();
    const b = newJobId();
    const c = newJobId();
    q.enqueue(a, 3);
    q.enqueue(b, 8);
    q.enqueue(c, 8);

    expect(q.position(b)).toBe(1);
    expect(q.position(c)).toBe(2);
    expect(q.position(a)).toBe(3);
    expect([q.dequeue()?.jobId, q.dequeue()?.jobId, q.dequeue()?.jobId]).toEqual([b, c, a]);
    expect(q.dequeue()).toBeUndefined();
  });

  it("rejects with QueueFull at capacity unless forced", () => {
    const q = new JobQueue({ maxQueuedJobs: 2 });
    q.enqueue(newJobId(), 5);
    q.enqueue(newJobId(), 5);

    const err = catchError(() => q.enqueue(newJobId(), 5));
    expect(err).toBeInstanceOf(JobServiceError);
    expect(err).toMatchObject({ kind: "QueueFull", message: "queue is full (2 pending jobs)" });
    expect(q.size).toBe(2);

    q.enqueue(newJobId(), 5, { force: true });
    expect(q.size).toBe(3);
  });

  it("removes queued jobs and reports unknown ones", () => {
    const q = new JobQueue({ maxQueuedJobs: 5 });
    const a = newJobId();
    q.enqueue(a, 5);
    expect(q.remove(a)).toBe(true);
    expect(q.remove(a)).toBe(false);
    expect(q.position(a)).toBeNull();
    expect(q.has(a)).toBe(false);
  });

  it("rejects a job that is already queued", () => {
    const q = new JobQueue({ maxQueuedJobs: 5 });
    const a = newJobId();
    q.enqueue(a, 5);
    expect(() => q.enqueue(a, 6)).toThrow(`job already queued: ${a}`);
  });

  it("keeps strict priority when aging is off", () => {
    let now = 0;
    const q = new JobQueue({ maxQueuedJobs: 5, nowMs: () => now });
    const low = newJobId();
    const high = newJobId();
    q.enqueue(low, 2);
    now = 600_000;
    q.enqueue(high, 7);
    expect(q.dequeue()?.jobId).toBe(high);
  });

  it("ages waiting jobs upward, capped at the maximum priority", () => {
    let now = 0;
    const q = new JobQueue({ maxQueuedJobs: 5, agingIntervalSeconds: 10, nowMs: () => now });
    const low = newJobId();
    q.enqueue(low, 2);
    now = 60_000;
    const high = newJobId();
    q.enqueue(high, 7);

    const [lowEntry, highEntry] = [q.ordered()[0], q.ordered()[1]];
    // low: 2 + floor(60 / 10) = 8; high has not waited.
    expect(lowEntry?.jobId).toBe(low);
    expect(lowEntry && q.effectivePriority(lowEntry)).toBe(8);
    expect(highEntry && q.effectivePriority(highEntry)).toBe(7);

    now = 1_000_000;
    expect(lowEntry && q.effectivePriority(lowEntry)).toBe(10);
  });
});
