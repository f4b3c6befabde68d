import Anthropic from "@anthropic-ai/sdk";
import { ServiceUnavailableError } from "./utils/errors.ts";

const DEFAULT_MODEL = "claude-haiku-4-5-20251001";

export interface CompletionRequest {
  system?: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * The language model evaluation service as the pipeline sees it:
 * prompt in, text out. Implementations throw ServiceUnavailableError
 * on transport or auth failures.
 */
export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}

export class AnthropicModel implements LanguageModel {
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(client: Anthropic, model: string = DEFAULT_MODEL) {
    this.client = client;
    this.model = model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: "user", content: request.prompt }],
      });

      return response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    } catch (err) {
      throw new ServiceUnavailableError("model", "Language model request failed", { cause: err });
    }
  }
}

/**
 * Stand-in used when no API key is configured: every request fails the
 * way an unreachable service would, so callers fall back to their
 * sentinel values.
 */
export const offlineModel: LanguageModel = {
  async complete(): Promise<string> {
    throw new ServiceUnavailableError("model", "ANTHROPIC_API_KEY not set");
  },
};

/** Returns null when ANTHROPIC_API_KEY is not set. */
export function createModelFromEnv(): LanguageModel | null {
  if (!process.env.ANTHROPIC_API_KEY) {
    return null;
  }
  return new AnthropicModel(new Anthropic(), process.env.ANTHROPIC_MODEL || DEFAULT_MODEL);
}
