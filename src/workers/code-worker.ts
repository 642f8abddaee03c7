import { ExecutionError, errorMessage, ResearchError } from "../errors.js";
import type { ModelClient } from "../llm/model.js";
import { codePrompt } from "../llm/prompts.js";
import { askStructured } from "../llm/structured.js";
import type { Task } from "../planner/types.js";
import type { CodeSandbox, SandboxRun } from "../sandbox/types.js";
import { GeneratedCodeSchema, zodParser } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Analysis, CodeExecutionResult, GeneratedCode } from "./types.js";
import type { Worker, WorkerResult } from "./worker.js";

export type CodeInput = {
  task: Task;
  analysis?: Analysis;
};

export type CodeSuccess = Extract<CodeExecutionResult, { status: "success" }>;

const parseGeneratedCode = zodParser(GeneratedCodeSchema, "Generated code");

/**
 * Generates Python for a code_execution task and runs it in the sandbox.
 * Success requires a clean run and at least one published artifact URL.
 */
export class CodeExecutionWorker implements Worker<CodeInput, CodeSuccess> {
  readonly name = "code";
  readonly kind = "code_execution";

  constructor(
    private model: ModelClient,
    private sandbox: CodeSandbox,
  ) {}

  async execute(input: CodeInput): Promise<WorkerResult<CodeSuccess>> {
    const { task } = input;
    if (task.type !== "code_execution") {
      return { status: "skipped", reason: `code worker cannot run a ${task.type} task` };
    }

    let generated: GeneratedCode;
    try {
      generated = await askStructured(
        this.model,
        codePrompt(task.parameters.code_requirements, input.analysis),
        parseGeneratedCode,
        { label: "code generation" },
      );
    } catch (err) {
      if (!(err instanceof ResearchError)) throw err;
      return { status: "error", error: new ExecutionError(`Code generation failed: ${err.message}`, { cause: err }) };
    }

    let run: SandboxRun;
    try {
      run = await this.sandbox.run(generated.code, {
        task: task.description,
        template: task.template,
        visualization_type: generated.visualization_type,
      });
    } catch (err) {
      return {
        status: "error",
        error: new ExecutionError(`Sandbox failed: ${errorMessage(err)}`, { generatedCode: generated.code, cause: err }),
      };
    }

    if (!run.success || run.urls.length === 0) {
      const message = run.error ?? "Code produced no visualization files";
      log.warn(`[${this.name}] Execution failed`, { error: message, partialUrls: run.urls.length });
      return {
        status: "error",
        error: new ExecutionError(message, { partialUrls: run.urls, generatedCode: generated.code }),
      };
    }

    log.info(`[${this.name}] Published ${run.urls.length} artifact(s)`);
    return {
      status: "success",
      value: {
        status: "success",
        code: generated.code,
        explanation: generated.explanation,
        urls: run.urls,
        output: run.output,
      },
    };
  }
}
