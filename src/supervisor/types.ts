import type { CodeExecutionTask, WebResearchTask } from "../planner/types.js";
import type { Analysis, Report } from "../workers/types.js";

export type ValidationDecision = {
  approved: boolean;
  feedback?: string;
  confidence?: number;
};

export type CodeNeedDecision = {
  needs_code: boolean;
  reason?: string;
};

/**
 * One cycle's routing choice. `revise` (the report was rejected) and
 * `next_task` (move along the queue) are deliberately separate actions.
 */
export type Decision =
  | { action: "complete"; validation: ValidationDecision }
  | { action: "revise"; feedback: string; validation: ValidationDecision }
  | { action: "next_task" }
  | { action: "report" }
  | { action: "analyze" }
  | { action: "research"; task: WebResearchTask }
  | { action: "execute_code"; task: CodeExecutionTask; synthesized: boolean };

export type DecisionAction = Decision["action"];

/** Model-backed judgments the supervisor needs. Both are external calls. */
export interface SupervisorJudge {
  validate(report: Report, query: string): Promise<ValidationDecision>;
  needsCode(analysis: Analysis): Promise<CodeNeedDecision>;
}
