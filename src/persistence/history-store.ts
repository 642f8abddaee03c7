import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import { TASK_TYPES, type Task, type TaskType } from "../planner/types.js";
import { TaskSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type {
  HistoryEntry,
  HistoryMetrics,
  HistoryRecorder,
  HistoryResult,
  SimilarQuery,
  StoredExecution,
  TaskTemplate,
  TaskTemplates,
} from "./types.js";

const DEFAULT_DB_DIR = join(homedir(), ".research-supervisor");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "history.db");

type ExecutionRow = {
  id: number;
  query: string;
  tasks: string;
  results: string;
  success: number;
  feedback: string | null;
  timestamp: string;
};

const TasksColumn = z.array(TaskSchema);

const ResultsColumn: z.ZodType<HistoryResult[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    kind: z.enum(["web_research", "code_execution", "analysis", "report"]),
    status: z.enum(["success", "error"]),
    task: TaskSchema.optional(),
    output: z.unknown(),
  }),
);

/** Lower-cased words of three or more letters or digits. */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((t) => t.length > 2),
  );
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

function perType<T>(init: () => T): Record<TaskType, T> {
  return { web_research: init(), data_analysis: init(), code_execution: init() };
}

/** Run history in SQLite. Pass ":memory:" for a throwaway store. */
export class SqliteHistoryStore implements HistoryRecorder {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS task_executions (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        query      TEXT NOT NULL,
        tasks      TEXT NOT NULL,
        results    TEXT NOT NULL,
        success    INTEGER NOT NULL,
        feedback   TEXT,
        timestamp  TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_task_executions_query ON task_executions(query);
    `);
  }

  record(entry: HistoryEntry): void {
    this.db
      .prepare(
        `INSERT INTO task_executions (query, tasks, results, success, feedback, timestamp)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.query,
        JSON.stringify(entry.tasks),
        JSON.stringify(entry.results),
        entry.success ? 1 : 0,
        entry.feedback ?? null,
        new Date().toISOString(),
      );
    log.debug("Recorded execution", { query: entry.query, success: entry.success });
  }

  /** Newest first. */
  list(limit = 50): StoredExecution[] {
    return this.db
      .prepare<[number], ExecutionRow>("SELECT * FROM task_executions ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map(rowToExecution);
  }

  /**
   * Past queries ranked by word overlap with `query`, latest execution of
   * each. Ties keep the more recent query first.
   */
  async similarQueries(query: string, limit = getConfig().history.similarLimit): Promise<SimilarQuery[]> {
    const wanted = tokenize(query);
    const seen = new Set<string>();
    const scored: SimilarQuery[] = [];
    for (const exec of this.all()) {
      if (seen.has(exec.query)) continue;
      seen.add(exec.query);
      const score = jaccard(wanted, tokenize(exec.query));
      if (score > 0) {
        scored.push({ query: exec.query, score, success: exec.success, tasks: exec.tasks, timestamp: exec.timestamp });
      }
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  /** Tasks from successful runs grouped by type, newest first, de-duplicated by description. */
  async templates(limit = getConfig().history.templateLimit): Promise<TaskTemplates> {
    const templates = perType<TaskTemplate[]>(() => []);
    const seen = new Set<string>();
    for (const exec of this.all()) {
      if (!exec.success) continue;
      for (const task of exec.tasks) {
        const key = `${task.type}\u0000${task.description.toLowerCase()}`;
        if (seen.has(key) || templates[task.type].length >= limit) continue;
        seen.add(key);
        templates[task.type].push({ ...task, query: exec.query });
      }
    }
    return templates;
  }

  async metrics(): Promise<HistoryMetrics> {
    const counts = perType(() => 0);
    const successes = perType(() => 0);
    let total = 0;
    let successful = 0;
    for (const exec of this.all()) {
      total++;
      if (exec.success) successful++;
      for (const task of exec.tasks) {
        counts[task.type]++;
        if (exec.success) successes[task.type]++;
      }
    }
    const rates = perType(() => 0);
    for (const type of TASK_TYPES) {
      rates[type] = counts[type] > 0 ? successes[type] / counts[type] : 0;
    }
    return {
      totalExecutions: total,
      successfulExecutions: successful,
      taskTypeCounts: counts,
      successRateByType: rates,
    };
  }

  close(): void {
    this.db.close();
  }

  private all(): StoredExecution[] {
    return this.db
      .prepare<[], ExecutionRow>("SELECT * FROM task_executions ORDER BY id DESC")
      .all()
      .map(rowToExecution);
  }
}

function parseColumn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, fallback: T): T {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    log.warn("Unreadable history column", { error: String(err) });
    return fallback;
  }
  const result = schema.safeParse(data);
  return result.success ? result.data : fallback;
}

function rowToExecution(row: ExecutionRow): StoredExecution {
  const tasks: Task[] = parseColumn(TasksColumn, row.tasks, []);
  return {
    id: row.id,
    query: row.query,
    tasks,
    results: parseColumn(ResultsColumn, row.results, []),
    success: row.success === 1,
    feedback: row.feedback ?? undefined,
    timestamp: row.timestamp,
  };
}
