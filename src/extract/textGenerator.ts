import OpenAI from "openai";
import { MalformedOutputError, TransportError } from "../core/errors";
import { errorMessage } from "../observability";

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface OpenAiTextGeneratorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

/**
 * Chat-completions backend. Works against any OpenAI-compatible endpoint via `baseUrl`.
 * SDK-level retries are off; callers wrap this in a RetryPolicy.
 */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiTextGeneratorOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions
      .create({
        model: this.model,
        temperature: 0,
        messages: [{ role: "user", content: prompt }],
      })
      .catch((error: unknown) => {
        throw new TransportError(`Text generation request failed: ${errorMessage(error)}`, error);
      });

    const text = completion.choices[0]?.message?.content;
    if (!text) {
      throw new MalformedOutputError("Text generation returned an empty completion");
    }
    return text;
  }
}
