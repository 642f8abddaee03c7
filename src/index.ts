// Config
export { getConfig, configure, resetConfig, defaults, configFromEnv } from "./config.js";
export type { ResearchConfig, ModelProvider, DeepPartial } from "./config.js";

// Errors
export {
  ResearchError,
  SchemaError,
  DecompositionError,
  AnalysisError,
  ExecutionError,
  ProviderError,
  SearchError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  zodParser,
  TaskSchema,
  AnalysisSchema,
  ReportSchema,
  GeneratedCodeSchema,
} from "./schemas.js";
export type { StructuredParser } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, RunOptions, BatchOptions, RunCallbacks, WorkerStatus } from "./orchestrator.js";
export { createRunState, collectResults } from "./state/run-state.js";
export type { RunState, RunStatus } from "./state/run-state.js";

// Planning
export { Planner } from "./planner/planner.js";
export type { PlannerOptions, PlanOptions } from "./planner/planner.js";
export { TaskQueue } from "./planner/task-queue.js";
export { validateTasks } from "./planner/task-validator.js";
export type { TaskValidationResult } from "./planner/task-validator.js";
export { TASK_TYPES } from "./planner/types.js";
export type {
  Task,
  TaskType,
  WebResearchTask,
  DataAnalysisTask,
  CodeExecutionTask,
  TaskQueueSnapshot,
} from "./planner/types.js";

// Supervisor
export { decide, needsVisualization, synthesizeTask } from "./supervisor/supervisor.js";
export type { SupervisorView } from "./supervisor/supervisor.js";
export { ModelJudge } from "./supervisor/judge.js";
export type { Decision, DecisionAction, SupervisorJudge, ValidationDecision, CodeNeedDecision } from "./supervisor/types.js";

// Workers
export type { Worker, WorkerKind, WorkerResult } from "./workers/worker.js";
export { ResearchWorker } from "./workers/research-worker.js";
export { AnalysisWorker } from "./workers/analysis-worker.js";
export { CodeExecutionWorker } from "./workers/code-worker.js";
export { ReportingWorker } from "./workers/reporting-worker.js";
export { emptyReport } from "./workers/types.js";
export type { Analysis, Report, ResearchEntry, CodeExecutionEntry, SearchHit, TermResult } from "./workers/types.js";

// Models
export type { ModelClient, ModelFunction } from "./llm/model.js";
export { FunctionModel } from "./llm/model.js";
export { OpenAIModel, AnthropicModel, GoogleModel, createModelClient } from "./llm/providers.js";
export { askStructured, parseStructured } from "./llm/structured.js";

// Search, sandbox, storage
export type { SearchClient } from "./search/types.js";
export { FirecrawlSearch } from "./search/firecrawl.js";
export type { CodeSandbox, ArtifactStore, SandboxRun } from "./sandbox/types.js";
export { PythonSandbox } from "./sandbox/python-sandbox.js";
export type { ScriptRunner } from "./sandbox/python-sandbox.js";
export { SupabaseArtifactStore, LocalArtifactStore } from "./sandbox/artifact-store.js";

// Persistence
export { SqliteHistoryStore } from "./persistence/history-store.js";
export type { HistoryRecorder, HistoryEntry, SimilarQuery, TaskTemplates, HistoryMetrics } from "./persistence/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { Cache } from "./utils/cache.js";
export type { CacheOptions } from "./utils/cache.js";
