import { getConfig } from "./config.js";
import { AnalysisError, errorMessage, ExecutionError, ProviderError, ResearchError } from "./errors.js";
import type { ModelClient } from "./llm/model.js";
import type { HistoryRecorder } from "./persistence/types.js";
import { Planner } from "./planner/planner.js";
import type { Task } from "./planner/types.js";
import type { CodeSandbox } from "./sandbox/types.js";
import type { SearchClient } from "./search/types.js";
import { createRunState, isTerminal, toHistoryEntry, type RunState } from "./state/run-state.js";
import { ModelJudge } from "./supervisor/judge.js";
import { decide } from "./supervisor/supervisor.js";
import type { Decision, SupervisorJudge } from "./supervisor/types.js";
import { log } from "./utils/logger.js";
import { AnalysisWorker } from "./workers/analysis-worker.js";
import { CodeExecutionWorker } from "./workers/code-worker.js";
import { ReportingWorker } from "./workers/reporting-worker.js";
import { ResearchWorker } from "./workers/research-worker.js";
import { emptyReport, type Report } from "./workers/types.js";
import type { WorkerKind, WorkerResult } from "./workers/worker.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type WorkerStatus = WorkerResult<unknown>["status"];

export type RunCallbacks = {
  onPlan?: (tasks: Task[]) => void;
  onDecision?: (decision: Decision, cycle: number) => void;
  onWorkerEnd?: (kind: WorkerKind, status: WorkerStatus) => void;
  onFinish?: (state: RunState) => void;
  onError?: (error: string) => void;
};

export type RunOptions = {
  maxCycles?: number;
  maxRevisions?: number;
};

export type BatchOptions = RunOptions & {
  /** Runs in flight at once (default: config limits.batchConcurrency) */
  concurrency?: number;
};

export type OrchestratorOptions = {
  model: ModelClient;
  search: SearchClient;
  sandbox: CodeSandbox;
  history?: HistoryRecorder;
  /** Override the supervisor's model-backed judgments (default: ModelJudge). */
  judge?: SupervisorJudge;
};

type RunLimits = { maxCycles: number; maxRevisions: number };

function pendingTasks(state: RunState): Task[] {
  const { current, remaining } = state.queue.snapshot();
  return current ? [current, ...remaining] : remaining;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly planner: Planner;
  readonly research: ResearchWorker;
  readonly analysis: AnalysisWorker;
  readonly code: CodeExecutionWorker;
  readonly reporting: ReportingWorker;

  private judge: SupervisorJudge;
  private history?: HistoryRecorder;

  constructor(opts: OrchestratorOptions) {
    this.history = opts.history;
    this.judge = opts.judge ?? new ModelJudge(opts.model);
    this.planner = new Planner({ model: opts.model, history: opts.history });
    this.research = new ResearchWorker({ search: opts.search });
    this.analysis = new AnalysisWorker(opts.model);
    this.code = new CodeExecutionWorker(opts.model, opts.sandbox);
    this.reporting = new ReportingWorker(opts.model);
  }

  /** Supervised loop: plan, then decide -> apply until a terminal status. */
  async run(query: string, opts?: RunOptions, callbacks?: RunCallbacks): Promise<RunState> {
    const state = createRunState(query);
    const defaults = getConfig().limits;
    const limits: RunLimits = {
      maxCycles: opts?.maxCycles ?? defaults.maxCycles,
      maxRevisions: opts?.maxRevisions ?? defaults.maxRevisions,
    };

    try {
      log.info(`Starting run ${state.runId.slice(0, 8)}`, { query });
      await this.loadPlan(state, undefined, callbacks);
      state.status = "running";

      while (!isTerminal(state.status)) {
        if (state.cycles >= limits.maxCycles) {
          await this.exhaust(state, callbacks);
          break;
        }
        state.cycles++;
        const decision = await decide(state, this.judge);
        log.info(`Cycle ${state.cycles}: ${decision.action}`);
        callbacks?.onDecision?.(decision, state.cycles);
        await this.apply(state, decision, limits, callbacks);
      }

      state.finishedAt = Date.now();
      log.info(`Run finished: ${state.status}`, {
        cycles: state.cycles,
        revisions: state.revisions,
        durationMs: state.finishedAt - state.startedAt,
      });
      callbacks?.onFinish?.(state);
    } catch (err) {
      state.status = "error";
      state.error = errorMessage(err);
      state.errorCode = err instanceof ResearchError ? err.code : undefined;
      state.finishedAt = Date.now();
      log.error("Run failed", { error: state.error, code: state.errorCode });
      callbacks?.onError?.(state.error);
    }

    return state;
  }

  /** Independent runs, `concurrency` at a time. Results keep the input order. */
  async runBatch(queries: string[], opts?: BatchOptions, callbacks?: RunCallbacks): Promise<RunState[]> {
    const concurrency = Math.max(1, opts?.concurrency ?? getConfig().limits.batchConcurrency);
    const states: RunState[] = [];

    for (let i = 0; i < queries.length; i += concurrency) {
      const batch = queries.slice(i, i + concurrency);
      log.info(`Batch ${i / concurrency + 1}: ${batch.length} run(s)`);
      const settled = await Promise.allSettled(batch.map((q) => this.run(q, opts, callbacks)));
      settled.forEach((outcome, j) => {
        if (outcome.status === "fulfilled") {
          states.push(outcome.value);
          return;
        }
        const failed = createRunState(batch[j] ?? "");
        failed.status = "error";
        failed.error = errorMessage(outcome.reason);
        failed.finishedAt = Date.now();
        states.push(failed);
      });
    }
    return states;
  }

  /** Preview: plan a query without executing anything (dry run). */
  plan(query: string): Promise<Task[]> {
    return this.planner.plan(query);
  }

  // -------------------------------------------------------------------------
  // Applying decisions
  // -------------------------------------------------------------------------

  private async apply(state: RunState, decision: Decision, limits: RunLimits, callbacks?: RunCallbacks): Promise<void> {
    switch (decision.action) {
      case "complete":
        state.validation = decision.validation;
        state.status = "complete";
        this.record(state, true);
        return;

      case "revise":
        state.validation = decision.validation;
        state.feedback = decision.feedback;
        state.queue.advance();
        this.record(state, false, decision.feedback);
        state.revisions++;
        if (state.revisions > limits.maxRevisions) {
          log.warn(`Report rejected ${state.revisions} time(s), giving up`);
          state.status = "rejected";
          return;
        }
        // Earlier results would pre-empt the new plan's tasks.
        state.report = undefined;
        state.analysis = undefined;
        state.research = [];
        state.codeExecutions = [];
        await this.loadPlan(state, decision.feedback, callbacks, pendingTasks(state));
        return;

      case "next_task":
        state.queue.advance();
        return;

      case "research": {
        const outcome = await this.research.execute(decision.task);
        callbacks?.onWorkerEnd?.(this.research.kind, outcome.status);
        if (outcome.status === "skipped") {
          log.warn(`Research skipped: ${outcome.reason}`);
          return;
        }
        const results =
          outcome.status === "success"
            ? outcome.value
            : [{ term: decision.task.description, status: "error" as const, error: outcome.error.message }];
        state.research.push({ task: decision.task, results });
        state.queue.advance();
        return;
      }

      case "execute_code": {
        const { task } = decision;
        if (decision.synthesized) {
          log.info(`Synthesized ${task.template ?? "code"} task`);
          state.queue.inject(task);
          state.tasks.push(task);
        }
        const outcome = await this.code.execute({ task, analysis: state.analysis });
        callbacks?.onWorkerEnd?.(this.code.kind, outcome.status);
        switch (outcome.status) {
          case "skipped":
            log.warn(`Code execution skipped: ${outcome.reason}`);
            return;
          case "success":
            state.codeExecutions.push({ task, result: outcome.value });
            break;
          case "error":
            state.codeExecutions.push({
              task,
              result: {
                status: "error",
                error: outcome.error.message,
                code: outcome.error instanceof ExecutionError ? outcome.error.generatedCode : undefined,
              },
            });
            break;
        }
        state.queue.advance();
        return;
      }

      case "analyze": {
        const outcome = await this.analysis.execute({ research: state.research, feedback: state.feedback });
        callbacks?.onWorkerEnd?.(this.analysis.kind, outcome.status);
        if (outcome.status === "skipped") throw new AnalysisError(`Analysis skipped: ${outcome.reason}`);
        if (outcome.status === "error") {
          if (!(outcome.error instanceof ProviderError)) throw outcome.error;
          log.warn("Analysis unavailable, reporting on what was collected", { error: outcome.error.message });
          state.report = await this.writeReport(state, callbacks);
          return;
        }
        state.analysis = outcome.value;
        return;
      }

      case "report":
        state.report = await this.writeReport(state, callbacks);
        return;
    }
  }

  private async writeReport(state: RunState, callbacks?: RunCallbacks): Promise<Report> {
    const outcome = await this.reporting.execute({
      query: state.query,
      analysis: state.analysis,
      codeExecutions: state.codeExecutions,
      research: state.research,
      feedback: state.feedback,
    });
    callbacks?.onWorkerEnd?.(this.reporting.kind, outcome.status);
    return outcome.status === "success" ? outcome.value : emptyReport();
  }

  private async loadPlan(
    state: RunState,
    feedback: string | undefined,
    callbacks?: RunCallbacks,
    pending?: Task[],
  ): Promise<void> {
    const tasks = await this.planner.plan(state.query, { feedback, pending });
    state.queue.load(tasks);
    state.tasks.push(...tasks);
    callbacks?.onPlan?.(tasks);
  }

  /** Cycle budget spent: make sure there is a report, then stop. */
  private async exhaust(state: RunState, callbacks?: RunCallbacks): Promise<void> {
    log.warn(`Cycle budget of ${state.cycles} reached, finishing`);
    if (!state.report) {
      state.report = await this.writeReport(state, callbacks);
    }
    state.status = "exhausted";
  }

  /** Fire-and-forget: a failed write is logged, never fatal. */
  private record(state: RunState, success: boolean, feedback?: string): void {
    if (!this.history) return;
    try {
      const pending = this.history.record(toHistoryEntry(state, success, feedback));
      if (pending instanceof Promise) {
        void pending.catch((err: unknown) => log.warn("Failed to record history", { error: errorMessage(err) }));
      }
    } catch (err) {
      log.warn("Failed to record history", { error: errorMessage(err) });
    }
  }
}
