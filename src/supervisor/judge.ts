import type { ModelClient } from "../llm/model.js";
import { codeNeedsPrompt, validationPrompt } from "../llm/prompts.js";
import { askStructured } from "../llm/structured.js";
import { CodeNeedEnvelopeSchema, ValidationEnvelopeSchema, zodParser } from "../schemas.js";
import type { Analysis, Report } from "../workers/types.js";
import type { CodeNeedDecision, SupervisorJudge, ValidationDecision } from "./types.js";

const parseValidation = zodParser(ValidationEnvelopeSchema, "Validation decision");
const parseCodeNeed = zodParser(CodeNeedEnvelopeSchema, "Code decision");

/** Asks the model for both supervisor judgments. */
export class ModelJudge implements SupervisorJudge {
  constructor(private model: ModelClient) {}

  validate(report: Report, query: string): Promise<ValidationDecision> {
    return askStructured(this.model, validationPrompt(report, query), parseValidation, { label: "report validation" });
  }

  needsCode(analysis: Analysis): Promise<CodeNeedDecision> {
    return askStructured(this.model, codeNeedsPrompt(analysis), parseCodeNeed, { label: "code decision" });
  }
}
