import { stringify } from "yaml";
import { FunctionModel } from "../../src/llm/model.js";
import type { CodeExecutionTask, DataAnalysisTask, WebResearchTask } from "../../src/planner/types.js";
import type { CodeSandbox, SandboxRun } from "../../src/sandbox/types.js";
import type { SearchClient } from "../../src/search/types.js";
import type { CodeNeedDecision, SupervisorJudge, ValidationDecision } from "../../src/supervisor/types.js";
import type { Analysis, Report, SearchHit } from "../../src/workers/types.js";

/** Wrap a value the way a model returns it: one fenced yaml block. */
export function fenced(value: unknown): string {
  return `Here you go:\n\`\`\`yaml\n${stringify(value)}\`\`\`\n`;
}

export type PromptKind = "plan" | "analysis" | "code" | "report" | "validate" | "needsCode";

const PROMPT_MARKERS: Array<[PromptKind, string]> = [
  ["plan", "Break down this research query"],
  ["analysis", "Analyze these research results"],
  ["code", "Generate Python code"],
  ["report", "Generate a comprehensive research report"],
  ["validate", "Review this research report"],
  ["needsCode", "Based on this analysis, decide"],
];

export function promptKind(prompt: string): PromptKind | undefined {
  return PROMPT_MARKERS.find(([, marker]) => prompt.startsWith(marker))?.[0];
}

export type Handler = string | ((prompt: string, call: number) => string);

/**
 * A model that answers by prompt kind. Unscripted prompts throw, which the
 * model wrapper turns into a non-retryable ProviderError.
 */
export function routedModel(handlers: Partial<Record<PromptKind, Handler>>) {
  const prompts: Array<{ kind: PromptKind | undefined; prompt: string }> = [];
  const counts = new Map<PromptKind, number>();
  const model = new FunctionModel({
    model: "scripted",
    fn: async (prompt) => {
      const kind = promptKind(prompt);
      prompts.push({ kind, prompt });
      const handler = kind ? handlers[kind] : undefined;
      if (!kind || handler === undefined) throw new Error(`unscripted prompt: ${prompt.slice(0, 40)}`);
      const call = (counts.get(kind) ?? 0) + 1;
      counts.set(kind, call);
      return typeof handler === "string" ? handler : handler(prompt, call);
    },
  });
  return { model, prompts, kinds: () => prompts.map((p) => p.kind) };
}

export class FakeSearch implements SearchClient {
  readonly name = "fake";
  readonly calls: Array<{ term: string; maxResults: number }> = [];

  constructor(private respond: (term: string) => SearchHit[] = (term) => [hit(term)]) {}

  async search(term: string, maxResults: number): Promise<SearchHit[]> {
    this.calls.push({ term, maxResults });
    return this.respond(term);
  }
}

export class FakeSandbox implements CodeSandbox {
  readonly calls: string[] = [];

  constructor(private result: SandboxRun = { success: true, urls: ["https://cdn.test/chart.png"], output: "done" }) {}

  async run(code: string): Promise<SandboxRun> {
    this.calls.push(code);
    return this.result;
  }
}

export function fakeJudge(opts: { approved?: boolean[]; needsCode?: boolean; feedback?: string } = {}) {
  const verdicts = [...(opts.approved ?? [true])];
  let validations = 0;
  let codeChecks = 0;
  const judge: SupervisorJudge = {
    async validate(): Promise<ValidationDecision> {
      validations++;
      const approved = verdicts.length > 1 ? (verdicts.shift() ?? true) : (verdicts[0] ?? true);
      return approved ? { approved: true } : { approved: false, feedback: opts.feedback };
    },
    async needsCode(): Promise<CodeNeedDecision> {
      codeChecks++;
      return { needs_code: opts.needsCode ?? false };
    },
  };
  return { judge, validations: () => validations, codeChecks: () => codeChecks };
}

export function hit(term: string, n = 1): SearchHit {
  return {
    title: `${term} result ${n}`,
    url: `https://example.test/${encodeURIComponent(term)}/${n}`,
    description: `About ${term}`,
    content: `Content about ${term}`,
  };
}

export function researchTask(terms: string[] = ["solar capacity"], description = "Research solar capacity"): WebResearchTask {
  return { type: "web_research", description, parameters: { search_terms: terms } };
}

export function analysisTask(description = "Analyze growth"): DataAnalysisTask {
  return { type: "data_analysis", description, parameters: { data_sources: ["search results"] } };
}

export function codeTask(description = "Chart growth"): CodeExecutionTask {
  return { type: "code_execution", description, parameters: { code_requirements: ["plot a line chart"] } };
}

export function analysis(overrides: Partial<Analysis> = {}): Analysis {
  return {
    key_findings: ["Capacity doubled"],
    implications: [],
    metrics: [],
    categories: [],
    time_series: [],
    relationships: [],
    visualizations: [],
    next_steps: [],
    ...overrides,
  };
}

export function report(overrides: Partial<Report> = {}): Report {
  return {
    executive_summary: "Solar grew fast.",
    detailed_findings: ["Capacity doubled"],
    recommendations: [],
    visualizations: [],
    sources: [],
    next_steps: [],
    ...overrides,
  };
}
