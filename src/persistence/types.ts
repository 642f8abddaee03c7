import type { Task, TaskType } from "../planner/types.js";

/** One entry in a run's flat result log. */
export type HistoryResult = {
  kind: "web_research" | "code_execution" | "analysis" | "report";
  status: "success" | "error";
  task?: Task;
  output?: unknown;
};

export type HistoryEntry = {
  query: string;
  tasks: Task[];
  results: HistoryResult[];
  success: boolean;
  feedback?: string;
};

export type StoredExecution = HistoryEntry & {
  id: number;
  timestamp: string;
};

export type SimilarQuery = {
  query: string;
  score: number;
  success: boolean;
  tasks: Task[];
  timestamp: string;
};

/** A task that belonged to a successful run, with the query it served. */
export type TaskTemplate = Task & { query: string };

export type TaskTemplates = Record<TaskType, TaskTemplate[]>;

export type HistoryMetrics = {
  totalExecutions: number;
  successfulExecutions: number;
  taskTypeCounts: Record<TaskType, number>;
  successRateByType: Record<TaskType, number>;
};

/** Past runs, written once per verdict and read while planning. */
export interface HistoryRecorder {
  record(entry: HistoryEntry): void | Promise<void>;
  similarQueries(query: string, limit?: number): Promise<SimilarQuery[]>;
  templates(limit?: number): Promise<TaskTemplates>;
  metrics(): Promise<HistoryMetrics>;
}
