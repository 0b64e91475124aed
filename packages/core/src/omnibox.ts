import type { SearchEngineId } from "@skiff/schema";

export { DEFAULT_HOME_URL } from "@skiff/schema";

export const SEARCH_ENGINES: Record<SearchEngineId, { label: string; queryUrl: string }> = {
  duckduckgo: { label: "DuckDuckGo", queryUrl: "https://duckduckgo.com/?q=" },
  google: { label: "Google", queryUrl: "https://www.google.com/search?q=" },
  bing: { label: "Bing", queryUrl: "https://www.bing.com/search?q=" }
};

const PASSTHROUGH_SCHEMES = ["about:", "file:", "data:"];

export type AddressOptions = {
  searchEngine?: SearchEngineId;
};

/**
 * Turns whatever was typed into the address bar into a URL to load.
 * Text with a space, or without a dot, is a search query.
 */
export function resolveAddressInput(text: string, options: AddressOptions = {}): string | null {
  const input = text.trim();
  if (!input) return null;

  const lower = input.toLowerCase();
  if (PASSTHROUGH_SCHEMES.some((scheme) => lower.startsWith(scheme))) return input;

  if (input.includes(" ") || !input.includes(".")) {
    return searchUrl(input, options.searchEngine ?? "duckduckgo");
  }
  if (!/^https?:\/\//i.test(input)) return `https://${input}`;
  return input;
}

export function searchUrl(query: string, engine: SearchEngineId = "duckduckgo"): string {
  const encoded = query
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => encodeURIComponent(word))
    .join("+");
  return `${SEARCH_ENGINES[engine].queryUrl}${encoded}`;
}
