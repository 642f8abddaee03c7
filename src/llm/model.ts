import { errorMessage, ProviderError, ResearchError } from "../errors.js";
import { log } from "../utils/logger.js";

/** Prompt text in, completion text out. Transport and auth failures throw ProviderError. */
export interface ModelClient {
  readonly provider: string;
  readonly model: string;
  invoke(prompt: string): Promise<string>;
}

export type ModelFunction = (prompt: string) => Promise<string>;

export type FunctionModelOptions = {
  fn: ModelFunction;
  model?: string;
  /** Timeout in ms (default: none) */
  timeout?: number;
};

/** Wraps a plain async function as a model; used for tests and custom backends. */
export class FunctionModel implements ModelClient {
  readonly provider = "function";
  readonly model: string;

  private fn: ModelFunction;
  private timeout?: number;

  constructor(opts: FunctionModelOptions) {
    this.fn = opts.fn;
    this.model = opts.model ?? "function";
    this.timeout = opts.timeout;
  }

  async invoke(prompt: string): Promise<string> {
    const start = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const pending = this.fn(prompt);
      const timeout = this.timeout;
      const output =
        timeout === undefined
          ? await pending
          : await Promise.race([
              pending,
              new Promise<never>((_, reject) => {
                timer = setTimeout(
                  () => reject(new ProviderError(this.provider, `Timed out after ${timeout}ms`, { retryable: true })),
                  timeout,
                );
              }),
            ]);
      log.debug("Model call finished", { provider: this.provider, durationMs: Date.now() - start });
      return output;
    } catch (err) {
      if (err instanceof ResearchError) throw err;
      throw new ProviderError(this.provider, errorMessage(err), { retryable: false, cause: err });
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
