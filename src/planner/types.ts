export type TaskType = "web_research" | "data_analysis" | "code_execution";

export const TASK_TYPES: readonly TaskType[] = ["web_research", "data_analysis", "code_execution"];

/** Optional fields a plan may carry over from a reusable history template. */
export type TaskEnrichment = {
  template?: string;
  success_criteria?: string[];
  required_tools?: string[];
};

export type WebResearchTask = TaskEnrichment & {
  type: "web_research";
  description: string;
  parameters: { search_terms: string[] };
};

export type DataAnalysisTask = TaskEnrichment & {
  type: "data_analysis";
  description: string;
  parameters: { data_sources: string[] };
};

export type CodeExecutionTask = TaskEnrichment & {
  type: "code_execution";
  description: string;
  parameters: { code_requirements: string[] };
};

export type Task = WebResearchTask | DataAnalysisTask | CodeExecutionTask;

export type TaskQueueSnapshot = {
  current?: Task;
  remaining: Task[];
};
