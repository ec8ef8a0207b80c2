import type { ContentType, QueryFeatures } from "../../../domain/models/routing.ts";

/**
 * Output port for query feature extraction
 */
export interface QueryAnalyzerPort {
  analyze(text: string, contentTypeHint?: ContentType): QueryFeatures;
}
