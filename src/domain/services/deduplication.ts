import natural from "natural";
import type { MetadataValue, SearchResult } from "../models/search.ts";
import { canonicalizeUrl } from "./urlNormalizer.ts";

export interface DeduplicationOptions {
  /** Minimum Indel similarity ratio (0-100) for URLs or titles */
  readonly fuzzyThreshold: number;
  /** Minimum cosine similarity (0-1) of title and snippet n-grams */
  readonly contentThreshold: number;
}

export interface DuplicateGroup {
  readonly canonicalUrl: string;
  readonly representative: SearchResult;
  /** Indexes into the input list of every member, representative first */
  readonly memberIndexes: ReadonlyArray<number>;
  /** Provider ids in first-seen order */
  readonly sources: ReadonlyArray<string>;
}

const MIN_TITLE_LENGTH = 20;
const MIN_CONTENT_TOKENS = 3;

const tokenizer = new natural.WordTokenizer();

/**
 * Similarity ratio in [0,100] based on insert/delete edit distance
 */
export function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  const distance = natural.LevenshteinDistance(a, b, {
    insertion_cost: 1,
    deletion_cost: 1,
    substitution_cost: 2,
  });
  return 100 * (1 - distance / total);
}

function termFrequencies(text: string): Map<string, number> | undefined {
  const tokens = tokenizer.tokenize(text.toLowerCase());
  if (tokens.length < MIN_CONTENT_TOKENS) return undefined;

  const terms = new Map<string, number>();
  const add = (term: string) => terms.set(term, (terms.get(term) ?? 0) + 1);
  tokens.forEach((token, i) => {
    add(token);
    if (i > 0) add(`${tokens[i - 1]} ${token}`);
  });
  return terms;
}

/**
 * Cosine similarity of unigram and bigram term frequencies.
 * Uses no corpus statistics, so a pair scores the same in any result set.
 */
export function contentSimilarity(a: string, b: string): number {
  const left = termFrequencies(a);
  const right = termFrequencies(b);
  if (!left || !right) return 0;

  let dot = 0;
  for (const [term, count] of left) {
    dot += count * (right.get(term) ?? 0);
  }
  const norm = (terms: Map<string, number>) =>
    Math.sqrt([...terms.values()].reduce((sum, count) => sum + count * count, 0));
  return dot / (norm(left) * norm(right));
}

function mergeInto(target: SearchResult, other: SearchResult): SearchResult {
  const metadata: Record<string, MetadataValue> = { ...other.metadata, ...target.metadata };
  return {
    ...target,
    score: Math.max(target.score, other.score),
    content: target.content ?? other.content,
    publishedAt: target.publishedAt ?? other.publishedAt,
    metadata,
  };
}

interface MutableGroup {
  canonicalUrl: string;
  representative: SearchResult;
  memberIndexes: number[];
  sources: string[];
}

function absorb(target: MutableGroup, other: MutableGroup): void {
  target.representative = mergeInto(target.representative, other.representative);
  target.memberIndexes.push(...other.memberIndexes);
  for (const source of other.sources) {
    if (!target.sources.includes(source)) target.sources.push(source);
  }
}

class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  // The smaller index stays root so the earliest group represents the set
  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    if (rootA < rootB) this.parent[rootB] = rootA;
    else this.parent[rootA] = rootB;
  }
}

function isNearDuplicate(a: MutableGroup, b: MutableGroup, options: DeduplicationOptions): boolean {
  if (indelRatio(a.canonicalUrl, b.canonicalUrl) >= options.fuzzyThreshold) {
    return true;
  }

  const titleA = a.representative.title.trim().toLowerCase();
  const titleB = b.representative.title.trim().toLowerCase();
  if (
    titleA.length >= MIN_TITLE_LENGTH && titleB.length >= MIN_TITLE_LENGTH &&
    indelRatio(titleA, titleB) >= options.fuzzyThreshold
  ) {
    return true;
  }

  return contentSimilarity(
    `${a.representative.title} ${a.representative.snippet}`,
    `${b.representative.title} ${b.representative.snippet}`,
  ) >= options.contentThreshold;
}

/**
 * Groups equivalent results in two passes: exact canonical URL, then near-duplicates.
 * Later members merge into the first one seen; nothing is dropped.
 */
export function deduplicate(
  results: ReadonlyArray<SearchResult>,
  options: DeduplicationOptions,
): DuplicateGroup[] {
  const byUrl = new Map<string, MutableGroup>();
  results.forEach((result, index) => {
    const canonicalUrl = canonicalizeUrl(result.url);
    const group: MutableGroup = {
      canonicalUrl,
      representative: result,
      memberIndexes: [index],
      sources: [result.source],
    };
    const existing = byUrl.get(canonicalUrl);
    if (existing) absorb(existing, group);
    else byUrl.set(canonicalUrl, group);
  });

  const groups = [...byUrl.values()];
  const sets = new UnionFind(groups.length);
  for (let i = 0; i < groups.length; i++) {
    for (let j = i + 1; j < groups.length; j++) {
      if (sets.find(i) !== sets.find(j) && isNearDuplicate(groups[i], groups[j], options)) {
        sets.union(i, j);
      }
    }
  }

  const merged = new Map<number, MutableGroup>();
  groups.forEach((group, i) => {
    const root = sets.find(i);
    const target = merged.get(root);
    if (target) absorb(target, group);
    else merged.set(root, group);
  });

  return [...merged.values()];
}
