/**
 * Lexical grounding retrieval.
 *
 * Sources are split into blank-line separated sections (first 15 per
 * source). A section scores |prompt ∩ section| / |prompt| over unique
 * tokens of two or more characters; zero-overlap sections are dropped.
 */

import type { GroundingSnippet, GroundingSource } from '../contracts/deployment.types.js';

const MAX_SECTIONS_PER_SOURCE = 15;
const MAX_SNIPPET_WORDS = 120;

export function groundingTokens(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z0-9]{2,}/g) ?? []);
}

export function splitSections(text: string): string[] {
  const sections = text
    .split(/\n\s*\n/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .slice(0, MAX_SECTIONS_PER_SOURCE);
  return sections.length > 0 ? sections : [text];
}

export function retrieveSnippets(
  prompt: string,
  sources: readonly GroundingSource[],
  topK: number
): GroundingSnippet[] {
  const query = groundingTokens(prompt);
  if (query.size === 0) return [];

  const scored: GroundingSnippet[] = [];
  for (const source of sources) {
    splitSections(source.text).forEach((section, index) => {
      let overlap = 0;
      for (const token of groundingTokens(section)) {
        if (query.has(token)) overlap++;
      }
      if (overlap === 0) return;

      scored.push({
        sourceId: `${source.id}#${index}`,
        text: section.split(/\s+/).filter(Boolean).slice(0, MAX_SNIPPET_WORDS).join(' '),
        score: Math.round((overlap / query.size) * 10_000) / 10_000,
      });
    });
  }

  // stable: equal scores keep source order
  return scored.sort((a, b) => b.score - a.score).slice(0, topK);
}
