const TRACKING_PARAMS = new Set([
  "gclid",
  "dclid",
  "fbclid",
  "msclkid",
  "yclid",
  "igshid",
  "mkt_tok",
  "_ga",
  "_gl",
  "_hsenc",
  "_hsmi",
  "ref",
  "ref_src",
  "source",
  "spm",
]);

const TRACKING_PREFIXES = ["utm_", "mc_", "pk_", "hsa_"];

function isTrackingParam(name: string): boolean {
  const key = name.toLowerCase();
  return TRACKING_PARAMS.has(key) || TRACKING_PREFIXES.some((prefix) => key.startsWith(prefix));
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function stripTrailingSlash(value: string): string {
  return value.length > 1 && value.endsWith("/") ? value.replace(/\/+$/, "") : value;
}

/**
 * Canonical form of a result URL used for every equality and similarity check.
 * Unparseable input is trimmed and lowercased.
 */
export function canonicalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!URL.canParse(trimmed)) {
    return stripTrailingSlash(trimmed.toLowerCase());
  }

  const url = new URL(trimmed);
  const host = url.hostname.replace(/^(www|m)\./, "");
  const port = url.port ? `:${url.port}` : "";
  const path = url.pathname === "/" ? "" : stripTrailingSlash(url.pathname);

  const params = [...url.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([aName, aValue], [bName, bValue]) =>
      aName === bName ? compareStrings(aValue, bValue) : compareStrings(aName, bName)
    );
  const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : "";

  return `${url.protocol}//${host}${port}${path}${query}`.toLowerCase();
}

/**
 * Host of a URL without a leading "www.", or undefined when it cannot be parsed
 */
export function extractDomain(raw: string): string | undefined {
  if (!URL.canParse(raw.trim())) {
    return undefined;
  }
  return new URL(raw.trim()).hostname.replace(/^www\./, "");
}
