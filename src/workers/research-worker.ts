import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Task, WebResearchTask } from "../planner/types.js";
import type { SearchClient } from "../search/types.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { TermResult } from "./types.js";
import type { Worker, WorkerResult } from "./worker.js";

export type ResearchWorkerOptions = {
  search: SearchClient;
  /** Hits per term (default: config search.maxResults) */
  maxResults?: number;
  /** Terms searched per task (default: config search.maxTermsPerTask) */
  maxTermsPerTask?: number;
};

/** Terms to search for a task; the description stands in when the plan gave none. */
export function searchTermsFor(task: WebResearchTask, max: number): string[] {
  const terms = task.parameters.search_terms.map((t) => t.trim()).filter((t) => t.length > 0);
  return terms.length > 0 ? terms.slice(0, Math.max(1, max)) : [task.description];
}

export class ResearchWorker implements Worker<Task, TermResult[]> {
  readonly name = "research";
  readonly kind = "web_research";

  private search: SearchClient;
  private maxResults?: number;
  private maxTermsPerTask?: number;

  constructor(opts: ResearchWorkerOptions) {
    this.search = opts.search;
    this.maxResults = opts.maxResults;
    this.maxTermsPerTask = opts.maxTermsPerTask;
  }

  /** One result per term; a failed term is recorded, never thrown. */
  async execute(task: Task): Promise<WorkerResult<TermResult[]>> {
    if (task.type !== "web_research") {
      return { status: "skipped", reason: `research worker cannot run a ${task.type} task` };
    }

    const config = getConfig().search;
    const maxResults = this.maxResults ?? config.maxResults;
    const terms = searchTermsFor(task, this.maxTermsPerTask ?? config.maxTermsPerTask);

    const results: TermResult[] = [];
    for (const term of terms) {
      try {
        const hits = await withRetry(() => this.search.search(term, maxResults), {
          label: `search "${term}"`,
        });
        results.push({ term, status: "success", hits });
        log.info(`[${this.name}] "${term}": ${hits.length} hits`);
      } catch (err) {
        log.warn(`[${this.name}] Search failed for "${term}"`, { error: errorMessage(err) });
        results.push({ term, status: "error", error: errorMessage(err) });
      }
    }
    return { status: "success", value: results };
  }
}
