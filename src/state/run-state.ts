import { randomUUID } from "node:crypto";
import type { ErrorCode } from "../errors.js";
import type { HistoryEntry, HistoryResult } from "../persistence/types.js";
import { TaskQueue } from "../planner/task-queue.js";
import type { Task } from "../planner/types.js";
import type { ValidationDecision } from "../supervisor/types.js";
import type { Analysis, CodeExecutionEntry, Report, ResearchEntry } from "../workers/types.js";

export type RunStatus = "planning" | "running" | "complete" | "rejected" | "exhausted" | "error";

export type RunState = {
  runId: string;
  query: string;
  /** Every task the run has known: planned, replanned and synthesized. */
  tasks: Task[];
  queue: TaskQueue;
  research: ResearchEntry[];
  codeExecutions: CodeExecutionEntry[];
  analysis?: Analysis;
  report?: Report;
  feedback?: string;
  validation?: ValidationDecision;
  revisions: number;
  cycles: number;
  status: RunStatus;
  error?: string;
  errorCode?: ErrorCode;
  startedAt: number;
  finishedAt?: number;
};

export function createRunState(query: string): RunState {
  return {
    runId: randomUUID(),
    query,
    tasks: [],
    queue: new TaskQueue(),
    research: [],
    codeExecutions: [],
    revisions: 0,
    cycles: 0,
    status: "planning",
    startedAt: Date.now(),
  };
}

export function isTerminal(status: RunStatus): boolean {
  return status === "complete" || status === "rejected" || status === "exhausted" || status === "error";
}

/** Flatten everything the run produced into one result log, in production order. */
export function collectResults(state: RunState): HistoryResult[] {
  const results: HistoryResult[] = [];
  for (const entry of state.research) {
    const ok = entry.results.some((r) => r.status === "success");
    results.push({ kind: "web_research", status: ok ? "success" : "error", task: entry.task, output: entry.results });
  }
  if (state.analysis) {
    results.push({ kind: "analysis", status: "success", output: state.analysis });
  }
  for (const entry of state.codeExecutions) {
    results.push({ kind: "code_execution", status: entry.result.status, task: entry.task, output: entry.result });
  }
  if (state.report) {
    results.push({ kind: "report", status: "success", output: state.report });
  }
  return results;
}

export function toHistoryEntry(state: RunState, success: boolean, feedback?: string): HistoryEntry {
  return {
    query: state.query,
    tasks: [...state.tasks],
    results: collectResults(state),
    success,
    feedback,
  };
}
