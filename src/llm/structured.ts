import { parse } from "yaml";
import { getConfig } from "../config.js";
import { errorMessage, ProviderError, SchemaError } from "../errors.js";
import type { StructuredParser } from "../schemas.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { ModelClient } from "./model.js";

// Fences open and close at the start of a line; group 1 is the tag, group 2 the body.
const FENCED_BLOCKS = /^```[ \t]*([\w-]*)[ \t]*\r?\n([\s\S]*?)^```/gm;
const STRUCTURED_TAGS = new Set(["yaml", "yml", "json"]);

const STRICT_SUFFIX =
  "\n\nIMPORTANT: Respond with ONLY the fenced ```yaml block described above, with every required key. No other text.";

/**
 * Return the body of the first yaml or json block in a model response, or of
 * the first untagged block when there is none. Blocks tagged with another
 * language are skipped.
 */
export function extractBlock(raw: string): string {
  let untagged: string | undefined;
  for (const [, tag = "", body = ""] of raw.matchAll(FENCED_BLOCKS)) {
    if (STRUCTURED_TAGS.has(tag.toLowerCase())) return body;
    if (tag === "" && untagged === undefined) untagged = body;
  }
  if (untagged === undefined) {
    throw new SchemaError("Response contains no fenced structured block");
  }
  return untagged;
}

/** Decode a block as YAML. JSON bodies decode too, YAML being a superset. */
export function decodeBlock(block: string): unknown {
  try {
    return parse(block);
  } catch (err) {
    throw new SchemaError(`Structured block is not valid YAML: ${errorMessage(err)}`, [], { cause: err });
  }
}

/** The one parse step: fenced block -> decoded value -> validated T. Fails closed with SchemaError. */
export function parseStructured<T>(raw: string, parser: StructuredParser<T>): T {
  return parser(decodeBlock(extractBlock(raw)));
}

/** Call the model, retrying transport failures the provider marked retryable. */
export function invokeModel(model: ModelClient, prompt: string, label: string): Promise<string> {
  return withRetry(() => model.invoke(prompt), {
    label,
    shouldRetry: (err) => err instanceof ProviderError && err.retryable,
  });
}

export type AskOptions = {
  label: string;
  /** Attempts when the output fails to parse (default: config retry.schemaAttempts) */
  attempts?: number;
};

/**
 * Ask for a structured answer. Output that fails to parse is asked for again
 * with a stricter instruction, up to `attempts` times; the last SchemaError is
 * rethrown. Provider errors propagate once `invokeModel` gives up.
 */
export async function askStructured<T>(
  model: ModelClient,
  prompt: string,
  parser: StructuredParser<T>,
  opts: AskOptions,
): Promise<T> {
  const attempts = Math.max(1, opts.attempts ?? getConfig().retry.schemaAttempts);
  let lastError: SchemaError | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const raw = await invokeModel(model, attempt === 1 ? prompt : prompt + STRICT_SUFFIX, opts.label);
    try {
      return parseStructured(raw, parser);
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      lastError = err;
      log.warn(`${opts.label}: unusable model output`, {
        attempt,
        error: err.message,
        raw: raw.slice(0, 300),
      });
    }
  }
  throw lastError ?? new SchemaError(`${opts.label}: no usable output`);
}
