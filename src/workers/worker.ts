import type { ResearchError } from "../errors.js";

export type WorkerKind = "web_research" | "data_analysis" | "code_execution" | "reporting";

/**
 * Outcome of one worker invocation. `skipped` means the input was not meant
 * for this worker (a misrouted task) and is not a failure.
 */
export type WorkerResult<T> =
  | { status: "success"; value: T }
  | { status: "skipped"; reason: string }
  | { status: "error"; error: ResearchError };

export interface Worker<I, O> {
  readonly name: string;
  readonly kind: WorkerKind;
  execute(input: I): Promise<WorkerResult<O>>;
}
