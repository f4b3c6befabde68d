import { encodingForModel } from "js-tiktoken";
import type { Tiktoken } from "js-tiktoken";

const CHARS_PER_TOKEN = 4;

let encoder: Tiktoken | null = null;

/**
 * Token count under the GPT-4 encoding. Falls back to ~4 characters per
 * token when the text cannot be encoded (e.g. it holds a special token).
 */
export function countTokens(text: string): number {
  try {
    encoder ??= encodingForModel("gpt-4");
    return encoder.encode(text).length;
  } catch {
    return estimateTokens(text);
  }
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
