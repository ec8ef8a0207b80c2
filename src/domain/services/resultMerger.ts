import type { QueryFeatures } from "../models/routing.ts";
import type { MergedResult, SearchResult } from "../models/search.ts";
import { deduplicate } from "./deduplication.ts";
import { enrichResult } from "./metadataEnrichment.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MergeOptions {
  readonly maxResults: number;
  readonly fuzzyThreshold: number;
  readonly contentThreshold: number;
  readonly consensusWeight: number;
  readonly recencyWeight: number;
  readonly recencyHorizonDays: number;
  /** Static quality weight per provider id */
  readonly qualityWeights: Readonly<Record<string, number>>;
  readonly defaultQualityWeight?: number;
  readonly features?: QueryFeatures;
  readonly now?: number;
}

interface RankedGroup {
  readonly result: MergedResult;
  readonly canonicalUrl: string;
  readonly bestWeight: number;
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function normalizeScores(results: ReadonlyArray<SearchResult>): number[] {
  const max = Math.max(0, ...results.map((r) => r.score));
  return results.map((r) => Math.max(0, max > 1 ? r.score / max : r.score));
}

function recencyPenalty(result: SearchResult, options: MergeOptions, now: number): number {
  if (options.features?.contentType !== "news" || !result.publishedAt) {
    return 0;
  }
  const published = Date.parse(result.publishedAt);
  if (Number.isNaN(published)) {
    return 0;
  }
  const ageDays = Math.max(0, (now - published) / DAY_MS);
  return options.recencyWeight * Math.min(1, ageDays / options.recencyHorizonDays);
}

/**
 * Merges per-provider result lists into one ranked list.
 *
 * Providers are visited in id order and each list in its own order, so the output does not
 * depend on map ordering. Ranking: final score desc, best provider quality weight desc,
 * raw score desc, canonical URL asc.
 */
export function mergeResults(
  resultsByProvider: ReadonlyMap<string, ReadonlyArray<SearchResult>>,
  options: MergeOptions,
): MergedResult[] {
  const now = options.now ?? Date.now();
  const weightOf = (provider: string) =>
    options.qualityWeights[provider] ?? options.defaultQualityWeight ?? 0.8;

  const providers = [...resultsByProvider.keys()]
    .filter((id) => (resultsByProvider.get(id)?.length ?? 0) > 0)
    .sort(compareStrings);

  const flat: SearchResult[] = [];
  const normalized: number[] = [];
  for (const provider of providers) {
    const results = resultsByProvider.get(provider) ?? [];
    normalized.push(...normalizeScores(results));
    flat.push(...results.map((r) => enrichResult({ ...r, source: provider }, options.features?.contentType)));
  }

  const groups = deduplicate(flat, options);
  const consensusDenominator = Math.max(1, providers.length - 1);

  const ranked: RankedGroup[] = groups.map((group) => {
    const base = Math.max(
      ...group.memberIndexes.map((i) => weightOf(flat[i].source) * normalized[i]),
    );
    const consensusBoost = options.consensusWeight * (group.sources.length - 1) / consensusDenominator;
    const finalScore = round6(base + consensusBoost - recencyPenalty(group.representative, options, now));

    return {
      canonicalUrl: group.canonicalUrl,
      bestWeight: Math.max(...group.sources.map(weightOf)),
      result: {
        ...group.representative,
        rank: 0,
        consensusCount: group.sources.length,
        finalScore,
        sources: group.sources,
      },
    };
  });

  ranked.sort((a, b) =>
    b.result.finalScore - a.result.finalScore ||
    b.bestWeight - a.bestWeight ||
    b.result.score - a.result.score ||
    compareStrings(a.canonicalUrl, b.canonicalUrl)
  );

  return ranked
    .slice(0, Math.max(0, options.maxResults))
    .map((entry, index) => ({ ...entry.result, rank: index + 1 }));
}
