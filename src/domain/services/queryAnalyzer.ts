import { readFileSync } from "node:fs";
import natural from "natural";
import { z } from "zod";
import { CONTENT_TYPES, type ContentType, type QueryFeatures } from "../models/routing.ts";

const WeightedPatternSchema = z.object({
  pattern: z.string(),
  weight: z.number().positive(),
});

const ContentSignalsSchema = z.object({
  contentTypes: z.record(
    z.enum(CONTENT_TYPES),
    z.object({
      keywords: z.record(z.string(), z.number().positive()),
      patterns: z.array(WeightedPatternSchema),
    }),
  ),
  analyticalKeywords: z.array(z.string()),
  multiIntentMarkers: z.array(z.string()),
  hedgingWords: z.array(z.string()),
  domains: z.record(z.string(), z.array(z.string())),
  timeSensitivity: z.array(z.object({
    level: z.number().min(0).max(1),
    phrases: z.array(z.string()),
  })),
  factualMarkers: z.array(z.string()),
  opinionMarkers: z.array(z.string()),
});

export type ContentSignals = z.infer<typeof ContentSignalsSchema>;

export function loadContentSignals(
  url: URL = new URL("./data/content-signals.json", import.meta.url),
): ContentSignals {
  return ContentSignalsSchema.parse(JSON.parse(readFileSync(url, "utf8")));
}

const LEADING_DEEP_QUESTION = /^(how|why|explain)\b/;
const LEADING_QUESTION = /^(what|when|where|who|which|whose|how|why|is|are|can|does|do|did|should|could|would|will)\b/;

const EMPTY_FEATURES: QueryFeatures = {
  text: "",
  length: 0,
  wordCount: 0,
  contentType: "mixed",
  contentTypeScores: {},
  complexity: 0,
  keywords: [],
  ambiguity: {
    multipleQuestions: false,
    hedging: false,
    crossDomain: false,
    multiIntent: false,
  },
  containsQuestion: false,
  timeSensitivity: 0,
  factualNature: 0.5,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function phraseRegExp(phrase: string, flags = ""): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?![a-z0-9])`, flags);
}

interface CompiledPhrase {
  readonly phrase: string;
  readonly regex: RegExp;
}

function compile(phrases: ReadonlyArray<string>): CompiledPhrase[] {
  return phrases.map((phrase) => ({ phrase, regex: phraseRegExp(phrase) }));
}

function countPresent(text: string, phrases: ReadonlyArray<CompiledPhrase>): number {
  return phrases.filter((p) => p.regex.test(text)).length;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function normalizeQueryText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Extracts routing features from query text.
 * Pure and deterministic: the same text always yields the same features.
 */
export class QueryAnalyzer {
  private readonly tokenizer = new natural.WordTokenizer();
  private readonly stopwords = new Set(natural.stopwords);
  private readonly typeSignals: ReadonlyArray<{
    contentType: ContentType;
    keywords: ReadonlyArray<CompiledPhrase & { weight: number }>;
    patterns: ReadonlyArray<{ regex: RegExp; weight: number }>;
  }>;
  private readonly analytical: CompiledPhrase[];
  private readonly hedging: CompiledPhrase[];
  private readonly multiIntentMarkers: RegExp[];
  private readonly domains: ReadonlyArray<CompiledPhrase[]>;
  private readonly timeLevels: ReadonlyArray<{ level: number; phrases: CompiledPhrase[] }>;
  private readonly factualMarkers: CompiledPhrase[];
  private readonly opinionMarkers: CompiledPhrase[];

  constructor(signals: ContentSignals = loadContentSignals()) {
    this.typeSignals = CONTENT_TYPES.flatMap((contentType) => {
      const entry = signals.contentTypes[contentType];
      if (!entry) return [];
      return [{
        contentType,
        keywords: Object.entries(entry.keywords).map(([phrase, weight]) => ({
          phrase,
          weight,
          regex: phraseRegExp(phrase),
        })),
        patterns: entry.patterns.map((p) => ({ regex: new RegExp(p.pattern), weight: p.weight })),
      }];
    });
    this.analytical = compile(signals.analyticalKeywords);
    this.hedging = compile(signals.hedgingWords);
    this.multiIntentMarkers = signals.multiIntentMarkers.map((m) => phraseRegExp(m, "g"));
    this.domains = Object.values(signals.domains).map(compile);
    this.timeLevels = [...signals.timeSensitivity]
      .sort((a, b) => b.level - a.level)
      .map((t) => ({ level: t.level, phrases: compile(t.phrases) }));
    this.factualMarkers = compile(signals.factualMarkers);
    this.opinionMarkers = compile(signals.opinionMarkers);
  }

  analyze(text: string, contentTypeHint?: ContentType): QueryFeatures {
    const normalized = normalizeQueryText(text);
    if (normalized.length === 0) {
      return contentTypeHint ? { ...EMPTY_FEATURES, contentType: contentTypeHint } : EMPTY_FEATURES;
    }

    const wordCount = normalized.split(" ").length;
    const scores = this.scoreContentTypes(normalized);
    const questionMarks = (normalized.match(/\?/g) ?? []).length;
    const containsQuestion = questionMarks > 0 || LEADING_QUESTION.test(normalized);
    const intents = 1 + this.multiIntentMarkers.reduce(
      (sum, marker) => sum + (normalized.match(marker) ?? []).length,
      0,
    );
    const domainsHit = this.domains.filter((domain) => countPresent(normalized, domain) > 0).length;
    const hedges = countPresent(normalized, this.hedging);

    const ambiguity = {
      multipleQuestions: questionMarks >= 2,
      hedging: hedges > 0,
      crossDomain: domainsHit >= 2,
      multiIntent: intents >= 2,
    };

    const complexity = Math.min(
      1,
      this.lengthFactor(wordCount) +
        Math.min(countPresent(normalized, this.analytical) * 0.15, 0.4) +
        (LEADING_DEEP_QUESTION.test(normalized) ? 0.2 : containsQuestion ? 0.1 : 0) +
        (intents >= 3 ? 0.2 : intents === 2 ? 0.1 : 0) +
        (ambiguity.crossDomain ? 0.2 : 0) +
        Math.min(hedges * 0.05, 0.1) +
        (ambiguity.multipleQuestions ? 0.1 : 0),
    );

    return {
      text: normalized,
      length: normalized.length,
      wordCount,
      contentType: contentTypeHint ?? this.pickContentType(scores),
      contentTypeScores: scores,
      complexity: round3(complexity),
      keywords: this.extractKeywords(normalized),
      ambiguity,
      containsQuestion,
      timeSensitivity: this.timeSensitivity(normalized),
      factualNature: this.factualNature(normalized),
    };
  }

  private lengthFactor(wordCount: number): number {
    if (wordCount <= 3) return 0;
    if (wordCount <= 6) return 0.1;
    if (wordCount <= 10) return 0.15;
    if (wordCount <= 15) return 0.2;
    return 0.25;
  }

  private scoreContentTypes(text: string): Partial<Record<ContentType, number>> {
    const scores: Partial<Record<ContentType, number>> = {};
    for (const signal of this.typeSignals) {
      const total = signal.keywords
        .filter((k) => k.regex.test(text))
        .reduce((sum, k) => sum + k.weight, 0) +
        signal.patterns
          .filter((p) => p.regex.test(text))
          .reduce((sum, p) => sum + p.weight, 0);
      if (total > 0) {
        scores[signal.contentType] = round3(total);
      }
    }
    return scores;
  }

  // A tie at the top is reported as mixed rather than an arbitrary winner
  private pickContentType(scores: Partial<Record<ContentType, number>>): ContentType {
    let best: ContentType = "mixed";
    let bestScore = 0;
    let tied = false;
    for (const contentType of CONTENT_TYPES) {
      const score = scores[contentType] ?? 0;
      if (score > bestScore) {
        best = contentType;
        bestScore = score;
        tied = false;
      } else if (score > 0 && score === bestScore) {
        tied = true;
      }
    }
    return tied ? "mixed" : best;
  }

  private extractKeywords(text: string): string[] {
    const keywords = this.tokenizer
      .tokenize(text)
      .filter((token) => token.length >= 2 && !this.stopwords.has(token));
    return [...new Set(keywords)];
  }

  private timeSensitivity(text: string): number {
    const match = this.timeLevels.find((t) => countPresent(text, t.phrases) > 0);
    return match ? match.level : 0.3;
  }

  private factualNature(text: string): number {
    if (countPresent(text, this.factualMarkers) > 0) return 0.9;
    if (countPresent(text, this.opinionMarkers) > 0) return 0.2;
    return 0.5;
  }
}
