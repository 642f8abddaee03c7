import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import type { ModelProvider, ResearchConfig } from "../config.js";
import { ConfigError, errorMessage, ProviderError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ModelClient } from "./model.js";

export type ProviderModelOptions = {
  apiKey: string;
  model: string;
  maxTokens?: number;
  timeoutMs?: number;
};

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderError(provider, errorMessage(err), { status: statusOf(err), cause: err });
}

export class OpenAIModel implements ModelClient {
  readonly provider = "openai";
  readonly model: string;
  private client: OpenAI;

  constructor(opts: ProviderModelOptions & { baseURL?: string }) {
    this.model = opts.model;
    // Retries are ours (withRetry), not the SDK's.
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
  }

  async invoke(prompt: string): Promise<string> {
    log.debug(`Calling ${this.provider}`, { model: this.model, promptLength: prompt.length });
    try {
      const res = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
      });
      const content = res.choices[0]?.message.content;
      if (!content) throw new ProviderError(this.provider, "Completion had no content", { retryable: true });
      return content;
    } catch (err) {
      throw toProviderError(this.provider, err);
    }
  }
}

export class AnthropicModel implements ModelClient {
  readonly provider = "anthropic";
  readonly model: string;
  private client: Anthropic;
  private maxTokens: number;

  constructor(opts: ProviderModelOptions) {
    this.model = opts.model;
    this.maxTokens = opts.maxTokens ?? 4_096;
    this.client = new Anthropic({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
  }

  async invoke(prompt: string): Promise<string> {
    log.debug(`Calling ${this.provider}`, { model: this.model, promptLength: prompt.length });
    try {
      const res = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: "user", content: prompt }],
      });
      const text = res.content.map((block) => (block.type === "text" ? block.text : "")).join("");
      if (!text) throw new ProviderError(this.provider, "Message had no text content", { retryable: true });
      return text;
    } catch (err) {
      throw toProviderError(this.provider, err);
    }
  }
}

export class GoogleModel implements ModelClient {
  readonly provider = "google";
  readonly model: string;
  private client: GoogleGenAI;

  constructor(opts: ProviderModelOptions) {
    this.model = opts.model;
    this.client = new GoogleGenAI({ apiKey: opts.apiKey });
  }

  async invoke(prompt: string): Promise<string> {
    log.debug(`Calling ${this.provider}`, { model: this.model, promptLength: prompt.length });
    try {
      const res = await this.client.models.generateContent({ model: this.model, contents: prompt });
      const text = res.text;
      if (!text) throw new ProviderError(this.provider, "Response had no text", { retryable: true });
      return text;
    } catch (err) {
      throw toProviderError(this.provider, err);
    }
  }
}

const API_KEY_VARS: Record<ModelProvider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_API_KEY",
};

/** Build the configured provider's client, reading its key from the environment. */
export function createModelClient(
  config: Readonly<ResearchConfig["model"]>,
  env: NodeJS.ProcessEnv = process.env,
): ModelClient {
  const keyVar = API_KEY_VARS[config.provider];
  const apiKey = env[keyVar];
  if (!apiKey) {
    throw new ConfigError(`${keyVar} must be set to use the ${config.provider} provider`);
  }
  const opts: ProviderModelOptions = {
    apiKey,
    model: config.name,
    maxTokens: config.maxTokens,
    timeoutMs: config.timeoutMs,
  };
  switch (config.provider) {
    case "openai":
      return new OpenAIModel({ ...opts, baseURL: env.OPENAI_BASE_URL || undefined });
    case "anthropic":
      return new AnthropicModel(opts);
    case "google":
      return new GoogleModel(opts);
  }
}
