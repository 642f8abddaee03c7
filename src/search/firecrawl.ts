import { z } from "zod";
import { getConfig } from "../config.js";
import { ConfigError, errorMessage, SearchError } from "../errors.js";
import { formatIssues } from "../schemas.js";
import { Cache } from "../utils/cache.js";
import { log } from "../utils/logger.js";
import type { SearchHit } from "../workers/types.js";
import type { SearchClient } from "./types.js";

const logger = log.child("firecrawl");

export type FirecrawlSearchOptions = {
  apiKey: string;
  /** Search endpoint (default: config search.endpoint) */
  endpoint?: string;
  /** Timeout in ms (default: config search.timeoutMs) */
  timeout?: number;
  /** Result cache; pass false to disable (default: a TTL cache from config) */
  cache?: Cache<SearchHit[]> | false;
};

const FirecrawlResponseSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  data: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        markdown: z.string().nullish(),
      }),
    )
    .nullish(),
});

export class FirecrawlSearch implements SearchClient {
  readonly name = "firecrawl";

  private apiKey: string;
  private endpoint: string;
  private timeout: number;
  private cache?: Cache<SearchHit[]>;

  constructor(opts: FirecrawlSearchOptions) {
    const config = getConfig().search;
    this.apiKey = opts.apiKey;
    this.endpoint = opts.endpoint ?? config.endpoint;
    this.timeout = opts.timeout ?? config.timeoutMs;
    if (opts.cache !== false) {
      this.cache = opts.cache ?? new Cache({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries });
    }
  }

  /** Build from FIRECRAWL_API_KEY and optional FIRECRAWL_API_URL. */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): FirecrawlSearch {
    const apiKey = env.FIRECRAWL_API_KEY;
    if (!apiKey) throw new ConfigError("FIRECRAWL_API_KEY must be set to run web research");
    return new FirecrawlSearch({ apiKey, endpoint: env.FIRECRAWL_API_URL || undefined });
  }

  async search(term: string, maxResults: number): Promise<SearchHit[]> {
    if (!this.cache) return this.fetchHits(term, maxResults);
    return this.cache.getOrCompute(Cache.key(term, maxResults), () => this.fetchHits(term, maxResults));
  }

  private async fetchHits(term: string, maxResults: number): Promise<SearchHit[]> {
    const start = Date.now();
    logger.debug(`Searching "${term}"`, { maxResults });

    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query: term,
          limit: maxResults,
          scrapeOptions: { formats: ["markdown"] },
        }),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (err) {
      const isTimeout = err instanceof DOMException && (err.name === "TimeoutError" || err.name === "AbortError");
      throw new SearchError(
        term,
        isTimeout ? `Search timed out after ${this.timeout}ms` : `Search request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!res.ok) {
      const body = await res.text();
      throw new SearchError(term, `HTTP ${res.status}: ${body.slice(0, 200)}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new SearchError(term, "Search response is not JSON", { cause: err });
    }

    const parsed = FirecrawlResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchError(term, `Unexpected search response: ${formatIssues(parsed.error.issues).join("; ")}`);
    }
    if (parsed.data.success === false) {
      throw new SearchError(term, parsed.data.error ?? "Search reported failure");
    }

    const hits = (parsed.data.data ?? []).slice(0, maxResults).map((item) => ({
      title: item.title ?? "",
      url: item.url,
      description: item.description ?? "",
      content: item.markdown ?? "",
    }));
    logger.debug(`${hits.length} hits for "${term}"`, { durationMs: Date.now() - start });
    return hits;
  }
}
