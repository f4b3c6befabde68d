/**
 * Reads a JSON object out of a model reply. Tries the whole text first,
 * then the first top-level brace-delimited span (models like to wrap
 * JSON in prose or code fences, or repeat it). Returns null when neither
 * parses to an object.
 */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  const direct = tryParse(text);
  if (direct) return direct;

  const span = firstBracedSpan(text);
  return span === null ? null : tryParse(span);
}

/**
 * The text from the first "{" to the brace that closes it. Braces inside
 * JSON strings do not count. Null when the span never closes.
 */
export function firstBracedSpan(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(text: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}
