import { errorMessage } from "../errors.js";
import type { ModelClient } from "../llm/model.js";
import { reportPrompt } from "../llm/prompts.js";
import { askStructured } from "../llm/structured.js";
import { ReportEnvelopeSchema, zodParser } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Analysis, CodeExecutionEntry, Report, ResearchEntry } from "./types.js";
import { emptyReport } from "./types.js";
import type { Worker, WorkerResult } from "./worker.js";

export type ReportInput = {
  query: string;
  analysis?: Analysis;
  codeExecutions: readonly CodeExecutionEntry[];
  research: readonly ResearchEntry[];
  feedback?: string;
};

const parseReport = zodParser(ReportEnvelopeSchema, "Report");

export function visualizationUrls(executions: readonly CodeExecutionEntry[]): string[] {
  return executions.flatMap((e) => (e.result.status === "success" ? e.result.urls : []));
}

/** Distinct hit URLs across all research, in the order they were found. */
export function researchSources(research: readonly ResearchEntry[]): Array<{ url: string; title: string }> {
  const seen = new Map<string, string>();
  for (const entry of research) {
    for (const result of entry.results) {
      if (result.status !== "success") continue;
      for (const hit of result.hits) {
        if (!seen.has(hit.url)) seen.set(hit.url, hit.title);
      }
    }
  }
  return [...seen].map(([url, title]) => ({ url, title }));
}

export class ReportingWorker implements Worker<ReportInput, Report> {
  readonly name = "reporting";
  readonly kind = "reporting";

  constructor(private model: ModelClient) {}

  /** Never fails: any error yields the empty report skeleton. */
  async execute(input: ReportInput): Promise<WorkerResult<Report>> {
    const sources = researchSources(input.research);
    let report: Report;
    try {
      report = await askStructured(
        this.model,
        reportPrompt({ ...input, visualizationUrls: visualizationUrls(input.codeExecutions), sources }),
        parseReport,
        { label: "report" },
      );
    } catch (err) {
      log.warn(`[${this.name}] Report generation failed, returning empty report`, { error: errorMessage(err) });
      return { status: "success", value: emptyReport() };
    }

    if (report.sources.length === 0 && sources.length > 0) {
      report = { ...report, sources: sources.map((s) => ({ url: s.url, description: s.title })) };
    }
    return { status: "success", value: report };
  }
}
