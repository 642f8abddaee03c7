import { stringify } from "yaml";
import { getConfig } from "../config.js";
import type { Task } from "../planner/types.js";
import type { Analysis, CodeExecutionEntry, Report, ResearchEntry } from "../workers/types.js";

function truncate(text: string, max = getConfig().limits.promptTruncation): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

function dump(value: unknown): string {
  return truncate(stringify(value).trim());
}

function feedbackSection(feedback: string | undefined): string {
  return feedback ? `\n\nA reviewer rejected the previous attempt with this feedback. Address it:\n${feedback}` : "";
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export type PlanningContext = {
  similar: Array<{ query: string; score: number; success: boolean; tasks: Task[] }>;
  templates: Partial<Record<Task["type"], unknown[]>>;
  metrics?: unknown;
};

function pendingSection(pending: readonly Task[] | undefined): string {
  if (!pending || pending.length === 0) return "";
  return `\n\nThese tasks from the previous plan never ran. Keep the ones that still help:\n${dump(pending)}`;
}

export function plannerPrompt(
  query: string,
  context?: PlanningContext,
  feedback?: string,
  pending?: readonly Task[],
): string {
  let history = "";
  if (context && context.similar.length > 0) {
    history += `\n\nSimilar past queries and the tasks they used:\n${dump(context.similar)}`;
  }
  if (context && Object.values(context.templates).some((t) => t && t.length > 0)) {
    history += `\n\nTask templates that succeeded before (reuse the "template" name when one fits):\n${dump(context.templates)}`;
  }
  if (context?.metrics) {
    history += `\n\nHistorical success metrics:\n${dump(context.metrics)}`;
  }

  return `Break down this research query into specific tasks.

Query: ${query}${history}${feedbackSection(feedback)}${pendingSection(pending)}

Return ONLY this YAML structure, replacing the placeholders with actual values:

\`\`\`yaml
tasks:
  - type: web_research
    description: <specific research task>
    parameters:
      search_terms:
        - <specific search term>
  - type: data_analysis
    description: <specific analysis task>
    parameters:
      data_sources:
        - <specific data source>
  - type: code_execution
    description: <specific code task>
    parameters:
      code_requirements:
        - <specific requirement>
    template: <optional template name>
    success_criteria:
      - <optional criterion>
    required_tools:
      - <optional tool>
\`\`\`

Rules:
1. "type" is one of web_research, data_analysis, code_execution
2. Every task has type, description and parameters
3. parameters holds the list its type requires (search_terms, data_sources or code_requirements)
4. List tasks in the order they should run`;
}

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

export function analysisPrompt(research: readonly ResearchEntry[], feedback?: string): string {
  const results = research.map((entry) => ({
    task: entry.task.description,
    results: entry.results.map((r) =>
      r.status === "success"
        ? { term: r.term, hits: r.hits.map((h) => ({ title: h.title, url: h.url, content: truncate(h.content, 1_500) })) }
        : { term: r.term, error: r.error },
    ),
  }));

  return `Analyze these research results and extract structured data, both qualitative and quantitative.

Research results:
${dump(results)}${feedbackSection(feedback)}

\`\`\`yaml
analysis:
  key_findings:
    - <finding>
  implications:
    - <implication>
  metrics:
    - name: <metric name>
      value: <numeric value>
      unit: <unit>
      source: <where it came from>
      confidence: <0-1>
  categories:
    - name: <category>
      items:
        - name: <item>
          count: <occurrences>
          percentage: <share of total>
  time_series:
    - year: <year>
      metrics:
        - name: <metric name>
          value: <value>
  relationships:
    - from: <entity>
      to: <entity>
      type: <relationship type>
      strength: <0-1>
  data_quality:
    completeness: <0-1>
    reliability: <0-1>
    sources_used: <number>
  visualizations:
    - type: <chart type>
      data_source: <which data>
      purpose: <what it shows>
      priority: <1-5>
  next_steps:
    - <next step>
\`\`\`

Rules:
1. "analysis" is required; include only the sections the data supports
2. Use consistent units
3. Return only the YAML block`;
}

// ---------------------------------------------------------------------------
// Code generation
// ---------------------------------------------------------------------------

export function codePrompt(requirements: readonly string[], analysis?: Analysis): string {
  return `Generate Python code that satisfies these requirements:
${requirements.map((r) => `- ${r}`).join("\n")}

Context from analysis:
${analysis ? dump(analysis) : "(none)"}

\`\`\`yaml
code: |
  # valid Python with its imports
  # save every figure under temp_dir, e.g. plt.savefig(os.path.join(temp_dir, "chart.png"))
  # set a variable named output with a short result summary
explanation: |
  <what the code does>
visualization_type: <chart type, or none>
\`\`\`

Rules:
1. Return only the YAML block
2. The variable temp_dir is already defined and points at a writable directory
3. Save every visualization to temp_dir as .png, .jpg or .svg`;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export type ReportInputs = {
  query: string;
  analysis?: Analysis;
  codeExecutions: readonly CodeExecutionEntry[];
  research: readonly ResearchEntry[];
  visualizationUrls: string[];
  sources: Array<{ url: string; title: string }>;
  feedback?: string;
};

export function reportPrompt(inputs: ReportInputs): string {
  const codeResults = inputs.codeExecutions.map((e) =>
    e.result.status === "success"
      ? { task: e.task.description, explanation: e.result.explanation, output: e.result.output }
      : { task: e.task.description, error: e.result.error },
  );

  return `Generate a comprehensive research report for: ${inputs.query}

Analysis:
${inputs.analysis ? dump(inputs.analysis) : "(none)"}

Code execution results:
${dump(codeResults)}

Visualization URLs:
${dump(inputs.visualizationUrls)}

Sources:
${dump(inputs.sources)}${feedbackSection(inputs.feedback)}

\`\`\`yaml
report:
  executive_summary: |
    <summary>
  detailed_findings:
    - <finding>
  recommendations:
    - <recommendation>
  visualizations:
    - url: <one of the visualization URLs>
      description: <what it shows>
      type: <chart type>
  sources:
    - url: <source url>
      description: <what the source covers>
  next_steps:
    - <next step>
\`\`\``;
}

// ---------------------------------------------------------------------------
// Supervisor judgments
// ---------------------------------------------------------------------------

export function validationPrompt(report: Report, query: string): string {
  return `Review this research report for the query "${query}" and decide whether it meets quality standards.

${dump(report)}

\`\`\`yaml
decision:
  approved: <true or false>
  feedback: <what to fix, if not approved>
  confidence: <0-1>
\`\`\``;
}

export function codeNeedsPrompt(analysis: Analysis): string {
  return `Based on this analysis, decide whether running code (data processing, calculations, charts) would add to the final report.

${dump(analysis)}

\`\`\`yaml
decision:
  needs_code: <true or false>
  reason: <explanation>
\`\`\``;
}
