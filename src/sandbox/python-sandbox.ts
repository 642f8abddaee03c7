import { spawn } from "node:child_process";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join } from "node:path";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ArtifactMetadata, ArtifactStore, CodeSandbox, SandboxRun } from "./types.js";

const logger = log.child("sandbox");

const KILL_GRACE_MS = 5_000;

export type ScriptRun = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type ScriptRunner = (script: {
  file: string;
  cwd: string;
  artifactDir: string;
  timeoutMs: number;
}) => Promise<ScriptRun>;

/**
 * Runs a script file with the given interpreter as a child process. On timeout
 * the child gets SIGTERM, then SIGKILL if it lingers.
 */
export function processRunner(bin: string): ScriptRunner {
  return ({ file, cwd, artifactDir, timeoutMs }) =>
    new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const child = spawn(bin, [file], {
        cwd,
        env: { ...process.env, ARTIFACT_DIR: artifactDir, MPLBACKEND: "Agg" },
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
        }, KILL_GRACE_MS).unref();
      }, timeoutMs);

      child.on("close", (exitCode) => {
        clearTimeout(timer);
        resolve({ exitCode: exitCode ?? -1, stdout, stderr, timedOut });
      });

      child.on("error", (err) => {
        clearTimeout(timer);
        resolve({ exitCode: -1, stdout, stderr: stderr || err.message, timedOut: false });
      });
    });
}

const PREAMBLE = `import os
temp_dir = os.environ["ARTIFACT_DIR"]
`;

const EPILOGUE = `
try:
    print(output)
except NameError:
    pass
`;

export function wrapScript(code: string): string {
  return `${PREAMBLE}\n${code}\n${EPILOGUE}`;
}

function lastLines(text: string, n = 5): string {
  return text.trim().split("\n").slice(-n).join("\n");
}

export type PythonSandboxOptions = {
  store: ArtifactStore;
  /** Interpreter (default: config sandbox.pythonBin) */
  pythonBin?: string;
  /** Timeout in ms (default: config sandbox.timeoutMs) */
  timeout?: number;
  /** Replaces the child-process runner */
  runner?: ScriptRunner;
};

/**
 * Runs generated Python in a scratch directory. The code sees `temp_dir`;
 * every image it saves there is uploaded. Nothing outlives the call.
 */
export class PythonSandbox implements CodeSandbox {
  private store: ArtifactStore;
  private timeout: number;
  private runner: ScriptRunner;

  constructor(opts: PythonSandboxOptions) {
    const config = getConfig().sandbox;
    this.store = opts.store;
    this.timeout = opts.timeout ?? config.timeoutMs;
    this.runner = opts.runner ?? processRunner(opts.pythonBin ?? config.pythonBin);
  }

  async run(code: string, metadata: ArtifactMetadata = {}): Promise<SandboxRun> {
    const scratch = await mkdtemp(join(tmpdir(), "research-sandbox-"));
    try {
      const artifactDir = join(scratch, "artifacts");
      await mkdir(artifactDir);
      const file = join(scratch, "main.py");
      await writeFile(file, wrapScript(code), "utf8");

      const start = Date.now();
      const result = await this.runner({ file, cwd: scratch, artifactDir, timeoutMs: this.timeout });
      logger.debug("Script finished", { exitCode: result.exitCode, durationMs: Date.now() - start });

      if (result.timedOut) {
        return { success: false, urls: [], output: result.stdout, error: `Code timed out after ${this.timeout}ms` };
      }
      if (result.exitCode !== 0) {
        const detail = lastLines(result.stderr) || `exit code ${result.exitCode}`;
        return { success: false, urls: [], output: result.stdout, error: `Code failed: ${detail}` };
      }

      const files = await collectArtifacts(artifactDir, getConfig().sandbox.artifactExtensions);
      if (files.length === 0) {
        return { success: false, urls: [], output: result.stdout, error: "Code produced no visualization files" };
      }

      const urls: string[] = [];
      for (const f of files) {
        try {
          urls.push(await this.store.upload(f, { ...metadata, file: basename(f) }));
        } catch (err) {
          logger.warn("Artifact upload failed", { file: basename(f), error: errorMessage(err) });
          return {
            success: false,
            urls,
            output: result.stdout,
            error: `Failed to upload ${basename(f)}: ${errorMessage(err)}`,
          };
        }
      }
      return { success: true, urls, output: result.stdout.trim() };
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }
}

/** Artifact files in `dir` with one of `extensions`, sorted by name. */
export async function collectArtifacts(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && wanted.has(extname(e.name).toLowerCase()))
    .map((e) => e.name)
    .sort()
    .map((name) => join(dir, name));
}
