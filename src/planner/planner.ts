import { getConfig } from "../config.js";
import { DecompositionError, errorMessage, SchemaError } from "../errors.js";
import type { ModelClient } from "../llm/model.js";
import { plannerPrompt, type PlanningContext } from "../llm/prompts.js";
import { askStructured } from "../llm/structured.js";
import type { HistoryRecorder } from "../persistence/types.js";
import type { StructuredParser } from "../schemas.js";
import { log } from "../utils/logger.js";
import { validateTasks } from "./task-validator.js";
import type { Task } from "./types.js";

export type PlannerOptions = {
  model: ModelClient;
  /** Past runs to draw similar queries and templates from. */
  history?: HistoryRecorder;
};

export type PlanOptions = {
  /** Reviewer feedback from a rejected report, when replanning. */
  feedback?: string;
  /** Tasks still queued when the report was rejected. */
  pending?: readonly Task[];
};

const parsePlan: StructuredParser<Task[]> = (data) => {
  const result = validateTasks(data);
  if (!result.valid) {
    throw new SchemaError(`Plan failed validation: ${result.errors.join("; ")}`, result.errors);
  }
  return result.tasks;
};

export class Planner {
  private model: ModelClient;
  private history?: HistoryRecorder;

  constructor(opts: PlannerOptions) {
    this.model = opts.model;
    this.history = opts.history;
  }

  /** Decompose a query into an ordered, validated task list. */
  async plan(query: string, opts: PlanOptions = {}): Promise<Task[]> {
    const context = await this.loadContext(query);
    const prompt = plannerPrompt(query, context, opts.feedback, opts.pending);

    let tasks: Task[];
    try {
      tasks = await askStructured(this.model, prompt, parsePlan, { label: "planning" });
    } catch (err) {
      if (err instanceof SchemaError) {
        throw new DecompositionError(`Could not decompose query: ${err.message}`, err.issues, { cause: err });
      }
      throw err;
    }

    log.info(`Planned ${tasks.length} task(s)`, {
      types: tasks.map((t) => t.type).join(","),
      replan: opts.feedback !== undefined,
    });
    return tasks;
  }

  /** History is advisory: a read failure leaves planning without it. */
  private async loadContext(query: string): Promise<PlanningContext | undefined> {
    if (!this.history) return undefined;
    const { similarLimit, templateLimit } = getConfig().history;
    try {
      const [similar, templates, metrics] = await Promise.all([
        this.history.similarQueries(query, similarLimit),
        this.history.templates(templateLimit),
        this.history.metrics(),
      ]);
      return {
        similar: similar.map((s) => ({ query: s.query, score: s.score, success: s.success, tasks: s.tasks })),
        templates,
        metrics: metrics.totalExecutions > 0 ? metrics : undefined,
      };
    } catch (err) {
      log.warn("Could not read planning history", { error: errorMessage(err) });
      return undefined;
    }
  }
}
