import type { ContentType, RoutingHints, StrategyName } from "../models/routing.ts";

const THOROUGH = /\b(reliable|thorough|complete|comprehensive)\b/;
const FAST = /\b(fast|quick|quickly|speed)\b/;

const CONTENT_TYPE_HINTS: ReadonlyArray<[RegExp, ContentType]> = [
  [/\b(academic|research|scholarly)\b/, "academic"],
  [/\b(news|recent|latest)\b/, "news"],
  [/\b(technical|code|docs)\b/, "technical"],
];

/**
 * Parses free-text routing hints such as "prefer tavily, be thorough".
 * Provider ids are matched as whole words against the known ids.
 */
export function parseRoutingHints(
  text: string | undefined,
  knownProviders: ReadonlyArray<string>,
): RoutingHints {
  const hint = text?.trim().toLowerCase() ?? "";
  if (hint.length === 0) {
    return {};
  }

  const providers = knownProviders.filter((id) =>
    new RegExp(`(?<![a-z0-9_-])${id.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}(?![a-z0-9_-])`)
      .test(hint)
  );

  let strategy: StrategyName | undefined;
  let requireAllProviders: boolean | undefined;
  if (THOROUGH.test(hint)) {
    strategy = "cascade";
    requireAllProviders = true;
  } else if (FAST.test(hint)) {
    strategy = "parallel";
  }

  const contentType = CONTENT_TYPE_HINTS.find(([pattern]) => pattern.test(hint))?.[1];

  return {
    ...(providers.length > 0 ? { providers } : {}),
    ...(strategy ? { strategy } : {}),
    ...(contentType ? { contentType } : {}),
    ...(requireAllProviders ? { requireAllProviders } : {}),
  };
}
