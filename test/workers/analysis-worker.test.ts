import { describe, expect, it } from "vitest";
import { AnalysisError, ProviderError } from "../../src/errors.js";
import { AnalysisWorker, hasAnalyticalContent } from "../../src/workers/analysis-worker.js";
import type { ResearchEntry } from "../../src/workers/types.js";
import { analysis, fenced, hit, researchTask, routedModel } from "../helpers/fakes.js";

const research: ResearchEntry[] = [
  { task: researchTask(), results: [{ term: "solar capacity", status: "success", hits: [hit("solar capacity")] }] },
];

describe("AnalysisWorker", () => {
  it("returns the parsed analysis", async () => {
    const { model } = routedModel({
      analysis: fenced({ analysis: { key_findings: ["Capacity doubled"], metrics: [{ name: "GW", value: 1200 }] } }),
    });
    const result = await new AnalysisWorker(model).execute({ research });

    expect(result.status).toBe("success");
    if (result.status === "success") {
      expect(result.value.key_findings).toEqual(["Capacity doubled"]);
      expect(result.value.metrics).toEqual([
        { name: "GW", value: 1200, unit: undefined, source: undefined, confidence: undefined },
      ]);
    }
  });

  it("puts research and feedback into the prompt", async () => {
    const { model, prompts } = routedModel({ analysis: fenced({ analysis: { key_findings: ["x"] } }) });
    await new AnalysisWorker(model).execute({ research, feedback: "Quantify the trend" });

    const prompt = prompts[0]?.prompt ?? "";
    expect(prompt).toContain("https://example.test/solar%20capacity/1");
    expect(prompt).toContain("Quantify the trend");
  });

  it("fails when the analysis has no findings or data", async () => {
    const { model } = routedModel({ analysis: fenced({ analysis: { implications: ["maybe"] } }) });
    const result = await new AnalysisWorker(model).execute({ research });

    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error).toBeInstanceOf(AnalysisError);
      expect(result.error.message).toBe("Analysis has no findings, metrics, categories or time series");
    }
  });

  it("fails when the block lacks the analysis key", async () => {
    const { model } = routedModel({ analysis: fenced({ key_findings: ["x"] }) });
    const result = await new AnalysisWorker(model).execute({ research });

    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error.code).toBe("ANALYSIS_FAILED");
      expect(result.error.message).toBe("Analysis failed: Analysis failed validation: analysis: Required");
    }
  });

  it("returns provider failures unwrapped", async () => {
    const { model } = routedModel({
      analysis: () => {
        throw new Error("503 upstream");
      },
    });
    const result = await new AnalysisWorker(model).execute({ research });

    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error).toBeInstanceOf(ProviderError);
      expect(result.error.message).toBe("[function] 503 upstream");
    }
  });
});

describe("hasAnalyticalContent", () => {
  it("needs findings, metrics, categories or time series", () => {
    expect(hasAnalyticalContent(analysis({ key_findings: [] }))).toBe(false);
    expect(hasAnalyticalContent(analysis({ key_findings: [], time_series: [{ year: 2024, metrics: [] }] }))).toBe(true);
  });
});
