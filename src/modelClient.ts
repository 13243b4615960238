// Text-in / text-out access to the generative model.

import OpenAI from "openai";
import type { Config } from "./config.js";
import { ConfigurationError } from "./errors.js";

export interface ModelClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

type ChatCreate = Pick<OpenAI["chat"]["completions"], "create">;

/** The slice of the OpenAI client this module calls. */
export type ChatClient = { chat: { completions: ChatCreate } };

export class OpenAIModelClient implements ModelClient {
  readonly model: string;
  private readonly completions: ChatCreate;
  private readonly temperature: number;

  constructor(args: { client: ChatClient; model: string; temperature?: number }) {
    this.completions = args.client.chat.completions;
    this.model = args.model;
    this.temperature = args.temperature ?? 0.7;
  }

  async complete(prompt: string): Promise<string> {
    const t0 = Date.now();
    const completion = await this.completions.create({
      model: this.model,
      temperature: this.temperature,
      response_format: { type: "json_object" },
      messages: [{ role: "user", content: prompt }],
    });

    console.log(
      `model: ${this.model} answered in ${Date.now() - t0}ms, tokens=${completion.usage?.total_tokens ?? "n/a"}`
    );

    const msg = completion.choices[0]?.message;
    if (msg?.refusal) return msg.refusal.trim();
    return msg?.content?.trim() ?? "";
  }
}

/**
 * Throws ConfigurationError when no API key is configured; callers run
 * without a generator in that case.
 */
export function createModelClient(config: Config): OpenAIModelClient {
  if (!config.openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set");
  }
  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    timeout: config.modelTimeoutMs,
    // exactly one attempt per generation request
    maxRetries: 0,
  });
  return new OpenAIModelClient({ client, model: config.openaiModel });
}
