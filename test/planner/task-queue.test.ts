import { describe, expect, it } from "vitest";
import { TaskQueue } from "../../src/planner/task-queue.js";
import { analysisTask, codeTask, researchTask } from "../helpers/fakes.js";

function holdsInvariant(queue: TaskQueue): boolean {
  return queue.current !== undefined || queue.remaining.length === 0;
}

describe("TaskQueue", () => {
  it("starts exhausted", () => {
    const queue = new TaskQueue();
    expect(queue.current).toBeUndefined();
    expect(queue.remaining).toEqual([]);
    expect(queue.isExhausted()).toBe(true);
    expect(queue.size()).toBe(0);
  });

  it("load puts the first task in current and the rest in remaining", () => {
    const queue = new TaskQueue();
    const tasks = [researchTask(), analysisTask(), codeTask()];
    queue.load(tasks);

    expect(queue.current).toBe(tasks[0]);
    expect(queue.remaining).toEqual([tasks[1], tasks[2]]);
    expect(queue.size()).toBe(3);
  });

  it("advance walks the backlog in order and then clears", () => {
    const queue = new TaskQueue();
    const tasks = [researchTask(), analysisTask()];
    queue.load(tasks);

    expect(queue.advance()).toBe(tasks[1]);
    expect(queue.remaining).toEqual([]);
    expect(queue.advance()).toBeUndefined();
    expect(queue.isExhausted()).toBe(true);
    expect(queue.advance()).toBeUndefined();
  });

  it("inject replaces current without touching the backlog", () => {
    const queue = new TaskQueue();
    const tasks = [analysisTask(), codeTask("planned chart")];
    queue.load(tasks);
    const injected = codeTask("synthesized chart");

    queue.inject(injected);
    expect(queue.current).toBe(injected);
    expect(queue.remaining).toEqual([tasks[1]]);

    queue.advance();
    expect(queue.current).toBe(tasks[1]);
  });

  it("inject on an exhausted queue leaves one task that advance retires", () => {
    const queue = new TaskQueue();
    queue.inject(codeTask());
    expect(queue.isExhausted()).toBe(false);
    queue.advance();
    expect(queue.isExhausted()).toBe(true);
  });

  it("keeps current set whenever the backlog is non-empty", () => {
    const ops: Array<(q: TaskQueue) => void> = [
      (q) => q.load([researchTask(), analysisTask(), codeTask()]),
      (q) => q.advance(),
      (q) => q.inject(codeTask("extra")),
      (q) => q.advance(),
      (q) => q.advance(),
      (q) => q.load([researchTask()]),
      (q) => q.advance(),
    ];
    const queue = new TaskQueue();
    for (const op of ops) {
      op(queue);
      expect(holdsInvariant(queue)).toBe(true);
    }
  });

  it("snapshot is a copy", () => {
    const queue = new TaskQueue();
    const tasks = [researchTask(), analysisTask()];
    queue.load(tasks);
    const snap = queue.snapshot();
    queue.advance();

    expect(snap.current).toBe(tasks[0]);
    expect(snap.remaining).toEqual([tasks[1]]);
  });
});
