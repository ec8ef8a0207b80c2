import { createHash } from "node:crypto";
import type { ContentType } from "../models/routing.ts";
import { normalizeQueryText } from "./queryAnalyzer.ts";

export interface FingerprintInput {
  readonly q: string;
  readonly maxResults: number;
  readonly providers?: ReadonlyArray<string>;
  readonly contentType?: ContentType;
  readonly requireAllProviders?: boolean;
}

/**
 * Stable cache key for semantically identical queries.
 * Provider order and duplicates, letter case and extra whitespace do not change the key.
 * Callers pass options with routing hints already folded in.
 */
export function queryFingerprint(input: FingerprintInput, prefix = "search:"): string {
  const canonical = JSON.stringify({
    q: normalizeQueryText(input.q),
    providers: [...new Set(input.providers ?? [])].sort(),
    maxResults: input.maxResults,
    contentType: input.contentType ?? null,
    requireAllProviders: input.requireAllProviders === true,
  });
  return `${prefix}${createHash("sha256").update(canonical).digest("hex")}`;
}
