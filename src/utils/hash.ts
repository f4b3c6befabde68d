import { createHash } from "crypto";

/**
 * Stable storage key for a posting: md5 of its URL.
 * Postings without a URL have no identity and get no key.
 */
export function postingKey(url: string): string | null {
  const trimmed = url.trim();
  if (!trimmed) return null;
  return createHash("md5").update(trimmed).digest("hex");
}

export function md5(input: string): string {
  return createHash("md5").update(input).digest("hex");
}
