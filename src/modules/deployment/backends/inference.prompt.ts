import type { GroundingSnippet } from '../contracts/deployment.types.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a company assistant. Answer only from the provided evidence and refuse unsupported claims.';

export function formatEvidence(snippets: readonly GroundingSnippet[]): string {
  return snippets.map((s, i) => `[${i + 1}] ${s.text}`).join('\n');
}

export function composePrompt(prompt: string, snippets: readonly GroundingSnippet[]): string {
  const evidence = snippets.length > 0 ? formatEvidence(snippets) : 'No citations available.';
  return [
    'Answer the question using only the provided evidence.',
    `Evidence:\n${evidence}`,
    `Question:\n${prompt}`,
  ].join('\n');
}
