/**
 * Report generation through the OpenAI Chat Completions API.
 */

import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import type { Logger } from "../logging/index.js";
import { fail, succeed, type Outcome } from "../types/index.js";
import { GenerationError, type GenerationRequest, type Generator } from "./generator.js";

/**
 * The slice of the OpenAI client this adapter calls.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export type ChatClientFactory = (credential: string) => ChatClient;

export interface OpenAIGeneratorOptions {
  /** Alternate OpenAI-compatible endpoint */
  baseURL?: string;
  /** Builds a client for a credential; defaults to the OpenAI SDK */
  createClient?: ChatClientFactory;
  /** Models sent without `temperature`; they reject anything but the default */
  fixedTemperatureModels?: readonly string[];
  logger?: Logger;
}

export class OpenAIGenerator implements Generator {
  private readonly createClient: ChatClientFactory;
  private readonly fixedTemperatureModels: readonly string[];
  private readonly logger: Logger | undefined;

  constructor(options: OpenAIGeneratorOptions = {}) {
    const { baseURL } = options;
    this.logger = options.logger;
    this.fixedTemperatureModels = options.fixedTemperatureModels ?? [];
    this.createClient =
      options.createClient ?? ((apiKey) => new OpenAI({ apiKey, baseURL, maxRetries: 0 }));
  }

  async generate(request: GenerationRequest): Promise<Outcome<string, GenerationError>> {
    try {
      const client = this.createClient(request.credential);
      const completion = await client.chat.completions.create(this.toRequestBody(request));

      const text = completion.choices[0]?.message.content?.trim() ?? "";
      if (text === "") {
        return fail(new GenerationError("The model returned an empty response."));
      }

      this.logger?.debug("Completion received", {
        model: request.model,
        characters: text.length,
      });
      return succeed(text);
    } catch (err) {
      return fail(toGenerationError(err));
    }
  }

  private toRequestBody(request: GenerationRequest): ChatCompletionCreateParamsNonStreaming {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      max_completion_tokens: request.maxOutputTokens,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
    };

    if (this.fixedTemperatureModels.includes(request.model)) {
      this.logger?.debug("Temperature omitted for model", { model: request.model });
      return body;
    }
    return { ...body, temperature: request.temperature };
  }
}

function toGenerationError(err: unknown): GenerationError {
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError(message, { cause: err });
}
