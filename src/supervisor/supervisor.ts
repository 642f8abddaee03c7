import type { CodeExecutionTask, Task } from "../planner/types.js";
import type { Analysis, CodeExecutionEntry, Report, ResearchEntry } from "../workers/types.js";
import type { Decision, SupervisorJudge } from "./types.js";

/** The slice of run state the supervisor reads. It never writes to it. */
export type SupervisorView = {
  readonly query: string;
  readonly queue: { readonly current: Task | undefined; readonly remaining: readonly Task[] };
  readonly research: readonly ResearchEntry[];
  readonly codeExecutions: readonly CodeExecutionEntry[];
  readonly analysis?: Analysis;
  readonly report?: Report;
};

export const DEFAULT_REVISION_FEEDBACK = "The report did not meet quality standards. Improve depth, accuracy and sourcing.";

export type SynthesizedKind = "visualization" | "processing";

/** The code task the supervisor inserts when the plan lacks one. */
export function synthesizeTask(kind: SynthesizedKind): CodeExecutionTask {
  if (kind === "visualization") {
    return {
      type: "code_execution",
      description: "Create visualizations of the analysis results",
      parameters: {
        code_requirements: [
          "Chart the metrics, categories and time series found in the analysis",
          "Give every chart a title, axis labels and a legend where needed",
          "Save every chart as a PNG file in temp_dir",
        ],
      },
      template: "visualization",
      success_criteria: ["At least one chart file is saved"],
      required_tools: ["python", "matplotlib", "seaborn", "numpy"],
    };
  }
  return {
    type: "code_execution",
    description: "Process and summarize the analysis data",
    parameters: {
      code_requirements: [
        "Compute summary statistics for the data in the analysis",
        "Plot the processed data and save the figure as a PNG file in temp_dir",
        "Set output to a short text summary of the results",
      ],
    },
    template: "data_processing",
    success_criteria: ["Processed data is summarized and plotted"],
    required_tools: ["python", "pandas", "matplotlib", "numpy"],
  };
}

export function needsVisualization(analysis: Analysis): boolean {
  return (
    analysis.visualizations.length > 0 ||
    analysis.metrics.length > 0 ||
    analysis.categories.length > 0 ||
    analysis.time_series.length > 0
  );
}

function codeDecision(current: Task | undefined, kind: SynthesizedKind): Decision {
  if (current?.type === "code_execution") {
    return { action: "execute_code", task: current, synthesized: false };
  }
  return { action: "execute_code", task: synthesizeTask(kind), synthesized: true };
}

/**
 * Pick the next action. Rules are checked in priority order and the first
 * match wins; the only external calls are the judge's.
 */
export async function decide(state: SupervisorView, judge: SupervisorJudge): Promise<Decision> {
  if (state.report) {
    const validation = await judge.validate(state.report, state.query);
    if (validation.approved) return { action: "complete", validation };
    const feedback = validation.feedback?.trim() || DEFAULT_REVISION_FEEDBACK;
    return { action: "revise", feedback, validation };
  }

  const current = state.queue.current;

  if (state.analysis) {
    if (state.codeExecutions.length > 0) return { action: "report" };
    if (needsVisualization(state.analysis)) return codeDecision(current, "visualization");
    const need = await judge.needsCode(state.analysis);
    return need.needs_code ? codeDecision(current, "processing") : { action: "report" };
  }

  if (state.research.length > 0) return { action: "analyze" };

  if (current) {
    switch (current.type) {
      case "web_research":
        return { action: "research", task: current };
      case "code_execution":
        return { action: "execute_code", task: current, synthesized: false };
      case "data_analysis":
        // Analysis runs off collected research; with none yet, move on.
        return { action: "next_task" };
    }
  }

  if (state.queue.remaining.length > 0) return { action: "next_task" };
  return { action: "report" };
}
