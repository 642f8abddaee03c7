import { z } from "zod";
import { SchemaError } from "./errors.js";
import type { Task } from "./planner/types.js";
import type { CodeNeedDecision, ValidationDecision } from "./supervisor/types.js";
import type { Analysis, GeneratedCode, Report } from "./workers/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Turns a decoded value into T or throws SchemaError. */
export type StructuredParser<T> = (data: unknown) => T;

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new SchemaError(`${label} failed validation: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function zodParser<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): StructuredParser<T> {
  return (data) => parseOrThrow(schema, data, label);
}

// Model output is loose: YAML turns an empty section into null.
const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((v) => v ?? []);

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalNumber = z.coerce.number().optional().catch(undefined);

const numberOrString = z.union([z.number(), z.string()]);

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v).trim()));

const flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "yes", "no"]).transform((v) => v === "true" || v === "yes"),
]);

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

const enrichment = {
  template: optionalString,
  success_criteria: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? undefined),
  required_tools: z
    .array(z.string())
    .nullish()
    .transform((v) => (v ? [...new Set(v)] : undefined)),
};

const description = z.string().trim().min(1, "description must not be empty");

export const TaskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("web_research"),
    description,
    parameters: z.object({ search_terms: z.array(z.string()) }),
    ...enrichment,
  }),
  z.object({
    type: z.literal("data_analysis"),
    description,
    parameters: z.object({ data_sources: z.array(z.string()) }),
    ...enrichment,
  }),
  z.object({
    type: z.literal("code_execution"),
    description,
    parameters: z.object({ code_requirements: z.array(z.string()) }),
    ...enrichment,
  }),
]);

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

export const AnalysisSchema: z.ZodType<Analysis, z.ZodTypeDef, unknown> = z.object({
  key_findings: list(z.string()),
  implications: list(z.string()),
  metrics: list(
    z.object({
      name: z.string(),
      value: numberOrString,
      unit: optionalString,
      source: optionalString,
      confidence: optionalNumber,
    }),
  ),
  categories: list(
    z.object({
      name: z.string(),
      items: list(z.object({ name: z.string(), count: optionalNumber, percentage: optionalNumber })),
    }),
  ),
  time_series: list(
    z.object({
      year: numberOrString,
      metrics: list(z.object({ name: z.string(), value: numberOrString })),
    }),
  ),
  relationships: list(
    z.object({ from: z.string(), to: z.string(), type: z.string(), strength: optionalNumber }),
  ),
  data_quality: z
    .object({ completeness: optionalNumber, reliability: optionalNumber, sources_used: optionalNumber })
    .nullish()
    .transform((v) => v ?? undefined),
  visualizations: list(
    z.object({
      type: z.string(),
      data_source: optionalString,
      purpose: optionalString,
      priority: optionalNumber,
    }),
  ),
  next_steps: list(z.string()),
});

export const AnalysisEnvelopeSchema: z.ZodType<Analysis, z.ZodTypeDef, unknown> = z
  .object({ analysis: AnalysisSchema })
  .transform((e) => e.analysis);

// ---------------------------------------------------------------------------
// Code generation
// ---------------------------------------------------------------------------

export const GeneratedCodeSchema: z.ZodType<GeneratedCode, z.ZodTypeDef, unknown> = z.object({
  code: z.string().refine((s) => s.trim().length > 0, "code must not be empty"),
  explanation: text,
  visualization_type: optionalString,
});

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export const ReportSchema: z.ZodType<Report, z.ZodTypeDef, unknown> = z.object({
  executive_summary: text,
  detailed_findings: list(z.string()),
  recommendations: list(z.string()),
  visualizations: list(z.object({ url: text, description: text, type: text })),
  sources: list(z.object({ url: text, description: text })),
  next_steps: list(z.string()),
});

export const ReportEnvelopeSchema: z.ZodType<Report, z.ZodTypeDef, unknown> = z
  .object({ report: ReportSchema })
  .transform((e) => e.report);

// ---------------------------------------------------------------------------
// Supervisor judgments
// ---------------------------------------------------------------------------

export const ValidationEnvelopeSchema: z.ZodType<ValidationDecision, z.ZodTypeDef, unknown> = z
  .object({
    decision: z.object({ approved: flag, feedback: optionalString, confidence: optionalNumber }),
  })
  .transform((e) => e.decision);

export const CodeNeedEnvelopeSchema: z.ZodType<CodeNeedDecision, z.ZodTypeDef, unknown> = z
  .object({
    decision: z.object({ needs_code: flag, reason: optionalString }),
  })
  .transform((e) => e.decision);
