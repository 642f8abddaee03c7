#!/usr/bin/env node

import { Command } from "commander";
import { stringify } from "yaml";
import { configFromEnv, configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createModelClient } from "./llm/providers.js";
import { Orchestrator } from "./orchestrator.js";
import { SqliteHistoryStore } from "./persistence/history-store.js";
import { Planner } from "./planner/planner.js";
import { LocalArtifactStore, SupabaseArtifactStore } from "./sandbox/artifact-store.js";
import { PythonSandbox } from "./sandbox/python-sandbox.js";
import type { ArtifactStore } from "./sandbox/types.js";
import { FirecrawlSearch } from "./search/firecrawl.js";
import type { RunState } from "./state/run-state.js";
import { isLogLevel, log, setLogLevel } from "./utils/logger.js";
import { emptyReport } from "./workers/types.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { error: errorMessage(reason) });
  process.exitCode = 1;
});

const program = new Command();

program
  .name("research-supervisor")
  .description("Supervised multi-step research runs: plan, search, analyze, chart and report")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) setLogLevel(level);
  if (actionCmd.optsWithGlobals().debug) setLogLevel("debug");
  configure(configFromEnv(process.env));
});

type RunCommandOptions = {
  batch?: boolean;
  maxRevisions?: string;
  maxCycles?: string;
  history: boolean;
  json?: boolean;
};

function intOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  return n;
}

function openHistory(enabled: boolean): SqliteHistoryStore | undefined {
  return enabled ? new SqliteHistoryStore(process.env.HISTORY_DB || undefined) : undefined;
}

function artifactStore(): ArtifactStore {
  if (process.env.SUPABASE_URL) return SupabaseArtifactStore.fromEnv(process.env);
  return new LocalArtifactStore(process.env.ARTIFACT_DIR || "artifacts");
}

function printState(state: RunState, json: boolean, heading?: string): void {
  const report = state.report ?? emptyReport();
  if (json) {
    console.log(JSON.stringify({ query: state.query, status: state.status, report }, null, 2));
    return;
  }
  if (heading) console.log(`# ${heading}`);
  console.log(stringify({ report }));
  const durationMs = (state.finishedAt ?? Date.now()) - state.startedAt;
  log.info(`${state.status} in ${durationMs}ms`, { cycles: state.cycles, revisions: state.revisions });
}

// --- run ---
program
  .command("run")
  .description("Research one query, or several with --batch")
  .argument("<queries...>", "Research queries")
  .option("-b, --batch", "Run every query (also enabled by BATCH_MODE=true)")
  .option("-r, --max-revisions <n>", "Rejected reports tolerated before giving up")
  .option("-c, --max-cycles <n>", "Supervisor cycles before forcing a finish")
  .option("--no-history", "Neither read nor record run history")
  .option("--json", "Print JSON instead of YAML")
  .action(async (queries: string[], opts: RunCommandOptions) => {
    const batch = opts.batch === true || process.env.BATCH_MODE?.toLowerCase() === "true";
    if (!batch && queries.length > 1) {
      log.error("Pass a single query, or use --batch for several");
      process.exitCode = 1;
      return;
    }

    const history = openHistory(opts.history);
    try {
      const orch = new Orchestrator({
        model: createModelClient(getConfig().model),
        search: FirecrawlSearch.fromEnv(process.env),
        sandbox: new PythonSandbox({ store: artifactStore() }),
        history,
      });
      const runOpts = {
        maxRevisions: intOption(opts.maxRevisions, "--max-revisions"),
        maxCycles: intOption(opts.maxCycles, "--max-cycles"),
      };

      const states = batch ? await orch.runBatch(queries, runOpts) : [await orch.run(queries[0] ?? "", runOpts)];
      states.forEach((state, i) => {
        if (state.status === "error") {
          log.error(`Run failed for "${state.query}": ${state.error ?? "unknown error"}`);
          process.exitCode = 1;
          return;
        }
        if (state.status !== "complete") log.warn(`Run for "${state.query}" ended ${state.status}`);
        printState(state, opts.json === true, batch ? `Research report ${i + 1}: ${state.query}` : undefined);
      });
    } catch (err) {
      log.error(`Run failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      history?.close();
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Preview the task plan for a query (dry run)")
  .argument("<query>", "The research query")
  .option("--no-history", "Plan without past runs")
  .action(async (query: string, opts: { history: boolean }) => {
    const history = openHistory(opts.history);
    try {
      const planner = new Planner({ model: createModelClient(getConfig().model), history });
      const tasks = await planner.plan(query);
      console.log(stringify({ tasks }));
    } catch (err) {
      log.error(`Planning failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      history?.close();
    }
  });

// --- history ---
program
  .command("history")
  .description("Show run history metrics, or past queries similar to one")
  .option("-s, --similar <query>", "List past queries similar to this one")
  .option("-n, --limit <n>", "How many entries to list", "10")
  .action(async (opts: { similar?: string; limit: string }) => {
    const store = new SqliteHistoryStore(process.env.HISTORY_DB || undefined);
    try {
      const limit = intOption(opts.limit, "--limit") ?? 10;
      if (opts.similar) {
        const similar = await store.similarQueries(opts.similar, limit);
        console.log(stringify({ similar }));
        return;
      }
      const metrics = await store.metrics();
      const recent = store.list(limit).map((e) => ({
        query: e.query,
        success: e.success,
        tasks: e.tasks.length,
        timestamp: e.timestamp,
      }));
      console.log(stringify({ metrics, recent }));
    } catch (err) {
      log.error(`History failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  log.error(errorMessage(err));
  process.exitCode = 1;
});
