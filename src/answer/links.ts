// ============================================
// Project Links — GitHub repos and docs sites
// mentioned in the retrieved messages
// ============================================

import type { FilteredSet, LinkKind, ProjectLink } from "../evidence/types.js";

/**
 * URL patterns per link kind, checked in order for every message.
 */
export const LINK_PATTERNS: ReadonlyArray<{ kind: LinkKind; pattern: RegExp }> = [
  { kind: "github", pattern: /https?:\/\/(?:www\.)?github\.com\/[\w-]+\/[\w.-]+/gi },
  { kind: "documentation", pattern: /https?:\/\/[\w-]+\.(?:readthedocs\.io|github\.io)\/[\w./-]*/gi },
  { kind: "documentation", pattern: /https?:\/\/docs?\.[\w-]+\.[a-z]{2,}\/[\w./-]*/gi },
];

/** Sentence punctuation that sticks to URLs: "see https://github.com/a/b." */
const TRAILING_PUNCTUATION = /[.,!?)]+$/;

/**
 * Links found in the retrieved message texts (not in the generated answer),
 * deduplicated by exact URL, tagged with the channel they came from.
 */
export function extractProjectLinks(filtered: FilteredSet): ProjectLink[] {
  const links: ProjectLink[] = [];
  const seen = new Set<string>();

  for (const candidate of filtered) {
    const sourceChannel = candidate.metadata.channelName || "unknown";

    for (const { kind, pattern } of LINK_PATTERNS) {
      for (const match of candidate.text.matchAll(pattern)) {
        const url = match[0].replace(TRAILING_PUNCTUATION, "");
        if (seen.has(url)) continue;

        seen.add(url);
        links.push({ kind, url, sourceChannel });
      }
    }
  }

  return links;
}
