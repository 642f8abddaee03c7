import type { Task, TaskQueueSnapshot } from "./types.js";

/**
 * Ordered backlog plus the task being worked. Invariant: whenever `current` is
 * empty, `remaining` is empty too. An injected task may sit in `current` over
 * an empty backlog until the next `advance()`.
 */
export class TaskQueue {
  private _current: Task | undefined;
  private _remaining: Task[] = [];

  get current(): Task | undefined {
    return this._current;
  }

  get remaining(): readonly Task[] {
    return this._remaining;
  }

  /** Replace the queue with a fresh plan. Only the planning step calls this. */
  load(tasks: readonly Task[]): void {
    this._current = tasks[0];
    this._remaining = tasks.slice(1);
  }

  /** Retire the current task: pull the next one in, or clear. */
  advance(): Task | undefined {
    this._current = this._remaining.shift();
    return this._current;
  }

  /** Put a synthesized task in front without consuming a queue slot. */
  inject(task: Task): void {
    this._current = task;
  }

  isExhausted(): boolean {
    return this._current === undefined && this._remaining.length === 0;
  }

  size(): number {
    return (this._current ? 1 : 0) + this._remaining.length;
  }

  snapshot(): TaskQueueSnapshot {
    return { current: this._current, remaining: [...this._remaining] };
  }
}
