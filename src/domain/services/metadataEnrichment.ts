import type { ContentType } from "../models/routing.ts";
import type { MetadataValue, SearchResult } from "../models/search.ts";
import { extractDomain } from "./urlNormalizer.ts";

const WORDS_PER_MINUTE = 225;
const ORGANIZATION_TLDS = new Set(["com", "org", "net", "io"]);

function organizationOf(domain: string): string | undefined {
  const labels = domain.split(".");
  if (labels.length < 2) return undefined;
  const tld = labels[labels.length - 1];
  return ORGANIZATION_TLDS.has(tld) ? labels[labels.length - 2] : undefined;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function publicationYear(publishedAt: string | undefined): number | undefined {
  if (!publishedAt) return undefined;
  const time = Date.parse(publishedAt);
  return Number.isNaN(time) ? undefined : new Date(time).getUTCFullYear();
}

/**
 * Adds derived metadata to a result. Keys the provider already set are kept as they are.
 */
export function enrichResult(result: SearchResult, contentType?: ContentType): SearchResult {
  const derived: Record<string, MetadataValue> = {};

  const domain = extractDomain(result.url);
  const organization = domain ? organizationOf(domain) : undefined;
  if (domain) derived.domain = domain;
  if (organization) derived.organization = organization;

  const wordCount = countWords(result.content ?? result.snippet);
  derived.wordCount = wordCount;
  derived.readingTimeMinutes = Math.max(1, Math.ceil(wordCount / WORDS_PER_MINUTE));

  if (contentType) derived.contentType = contentType;

  const year = publicationYear(result.publishedAt);
  const publisher = organization ?? domain;
  derived.citation = [
    result.title,
    publisher ? `${publisher}${year ? ` (${year})` : ""}` : undefined,
    result.url,
  ].filter((part) => part !== undefined && part.length > 0).join(". ");

  return {
    ...result,
    metadata: { ...derived, ...result.metadata },
  };
}
