/**
 * Semantic similarity as token overlap between two free-text blobs.
 *
 * Cheap stand-in for real semantics: alphanumeric tokens longer than two
 * characters, minus a few stop words, compared with the same max-denominator
 * overlap the skill scorer uses.
 */

import crypto from "crypto";
import { BoundedLRUCache } from "./bounded-lru-cache";

const MAX_TEXT_LENGTH = 20_000;
const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;
const STOP_WORDS = new Set(["the", "and", "for", "with", "from", "that", "this", "are", "you", "our"]);

const tokenCache = new BoundedLRUCache<ReadonlySet<string>>({ capacity: 500 });

export function semanticTokens(text: string): ReadonlySet<string> {
  const clipped = text.slice(0, MAX_TEXT_LENGTH);
  const key = crypto.createHash("sha1").update(clipped).digest("hex");
  const cached = tokenCache.get(key);
  if (cached) {
    return cached;
  }

  const tokens = new Set<string>();
  for (const match of clipped.matchAll(TOKEN_PATTERN)) {
    const token = match[0].toLowerCase();
    if (token.length > 2 && !STOP_WORDS.has(token)) {
      tokens.add(token);
    }
  }

  tokenCache.set(key, tokens);
  return tokens;
}

/**
 * Overlap in [0,1], or null when either side has no usable text
 */
export function semanticSimilarity(a: string | undefined, b: string | undefined): number | null {
  if (!a || !b) {
    return null;
  }
  const left = semanticTokens(a);
  const right = semanticTokens(b);
  if (left.size === 0 || right.size === 0) {
    return null;
  }

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared++;
    }
  }
  return shared / Math.max(left.size, right.size);
}
