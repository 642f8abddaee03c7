import { AnalysisError, ProviderError, SchemaError } from "../errors.js";
import type { ModelClient } from "../llm/model.js";
import { analysisPrompt } from "../llm/prompts.js";
import { askStructured } from "../llm/structured.js";
import { AnalysisEnvelopeSchema, zodParser } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Analysis, ResearchEntry } from "./types.js";
import type { Worker, WorkerResult } from "./worker.js";

export type AnalysisInput = {
  research: readonly ResearchEntry[];
  feedback?: string;
};

const parseAnalysis = zodParser(AnalysisEnvelopeSchema, "Analysis");

export function hasAnalyticalContent(analysis: Analysis): boolean {
  return (
    analysis.key_findings.length > 0 ||
    analysis.metrics.length > 0 ||
    analysis.categories.length > 0 ||
    analysis.time_series.length > 0
  );
}

export class AnalysisWorker implements Worker<AnalysisInput, Analysis> {
  readonly name = "analysis";
  readonly kind = "data_analysis";

  constructor(private model: ModelClient) {}

  async execute(input: AnalysisInput): Promise<WorkerResult<Analysis>> {
    let analysis: Analysis;
    try {
      analysis = await askStructured(this.model, analysisPrompt(input.research, input.feedback), parseAnalysis, {
        label: "analysis",
      });
    } catch (err) {
      if (err instanceof SchemaError) {
        return { status: "error", error: new AnalysisError(`Analysis failed: ${err.message}`, { cause: err }) };
      }
      // Transport failures stay ProviderErrors; the caller decides whether they end the run.
      if (err instanceof ProviderError) return { status: "error", error: err };
      throw err;
    }

    if (!hasAnalyticalContent(analysis)) {
      return {
        status: "error",
        error: new AnalysisError("Analysis has no findings, metrics, categories or time series"),
      };
    }

    log.info(`[${this.name}] Extracted analysis`, {
      findings: analysis.key_findings.length,
      metrics: analysis.metrics.length,
      categories: analysis.categories.length,
      timeSeries: analysis.time_series.length,
    });
    return { status: "success", value: analysis };
  }
}
