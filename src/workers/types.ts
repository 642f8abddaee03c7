import type { CodeExecutionTask, WebResearchTask } from "../planner/types.js";

// ---------------------------------------------------------------------------
// Research
// ---------------------------------------------------------------------------

export type SearchHit = {
  title: string;
  url: string;
  description: string;
  content: string;
};

export type TermResult =
  | { term: string; status: "success"; hits: SearchHit[] }
  | { term: string; status: "error"; error: string };

export type ResearchEntry = {
  task: WebResearchTask;
  results: TermResult[];
};

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

export type Metric = {
  name: string;
  value: number | string;
  unit?: string;
  source?: string;
  confidence?: number;
};

export type Category = {
  name: string;
  items: Array<{ name: string; count?: number; percentage?: number }>;
};

export type TimePoint = {
  year: number | string;
  metrics: Array<{ name: string; value: number | string }>;
};

export type Relationship = {
  from: string;
  to: string;
  type: string;
  strength?: number;
};

export type DataQuality = {
  completeness?: number;
  reliability?: number;
  sources_used?: number;
};

export type VisualizationSpec = {
  type: string;
  data_source?: string;
  purpose?: string;
  priority?: number;
};

/** Wire shape of the model's analysis block; absent sections are empty lists. */
export type Analysis = {
  key_findings: string[];
  implications: string[];
  metrics: Metric[];
  categories: Category[];
  time_series: TimePoint[];
  relationships: Relationship[];
  data_quality?: DataQuality;
  visualizations: VisualizationSpec[];
  next_steps: string[];
};

// ---------------------------------------------------------------------------
// Code execution
// ---------------------------------------------------------------------------

export type GeneratedCode = {
  code: string;
  explanation: string;
  visualization_type?: string;
};

export type CodeExecutionResult =
  | { status: "success"; code: string; explanation: string; urls: string[]; output: string }
  | { status: "error"; error: string; code?: string };

export type CodeExecutionEntry = {
  task: CodeExecutionTask;
  result: CodeExecutionResult;
};

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export type ReportVisualization = { url: string; description: string; type: string };

export type ReportSource = { url: string; description: string };

export type Report = {
  executive_summary: string;
  detailed_findings: string[];
  recommendations: string[];
  visualizations: ReportVisualization[];
  sources: ReportSource[];
  next_steps: string[];
};

export function emptyReport(): Report {
  return {
    executive_summary: "",
    detailed_findings: [],
    recommendations: [],
    visualizations: [],
    sources: [],
    next_steps: [],
  };
}
