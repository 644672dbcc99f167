/**
 * Text scoring primitives for held-out evaluation.
 *
 * Everything here is lexical: no embeddings, no network.
 */

const TOKEN_RE = /[a-z0-9]+/g;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'your', 'with', 'this', 'that',
  'from', 'have', 'has', 'was', 'were', 'will', 'can', 'all', 'any', 'our', 'its',
  'they', 'them', 'then', 'than', 'into', 'out', 'per', 'who', 'what', 'when',
]);

const REFUSAL_MARKERS = [
  'cannot',
  "can't",
  'do not have',
  "don't have",
  'insufficient',
  'unable to',
  'escalate',
];

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((t) => t.length > 2 && !STOPWORDS.has(t));
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        prev[j] + 1,        // deletion
        curr[j - 1] + 1,    // insertion
        prev[j - 1] + cost  // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/** 1 - distance / longer length, on normalized text. */
export function editSimilarity(a: string, b: string): number {
  const x = normalizeText(a);
  const y = normalizeText(b);
  if (x.length === 0 && y.length === 0) return 1;
  return 1 - levenshtein(x, y) / Math.max(x.length, y.length);
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
  return tf;
}

/** Cosine over term-frequency vectors. */
export function termCosine(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (ta.length === 0 && tb.length === 0) return 1;
  if (ta.length === 0 || tb.length === 0) return 0;

  const fa = termFrequencies(ta);
  const fb = termFrequencies(tb);
  let dot = 0;
  for (const [term, count] of fa) dot += count * (fb.get(term) ?? 0);
  const norm = (f: Map<string, number>) => Math.sqrt(Array.from(f.values()).reduce((s, c) => s + c * c, 0));
  return dot / (norm(fa) * norm(fb));
}

export function isRefusal(text: string): boolean {
  const lowered = text.toLowerCase();
  return REFUSAL_MARKERS.some((marker) => lowered.includes(marker));
}

/** Sentences with at least one token. */
export function splitClaims(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => tokenize(s).length > 0);
}

/**
 * A claim is traceable when at least `minCoverage` of its content tokens
 * occur in the source. Claims made only of stopwords count as supported.
 */
export function isClaimSupported(claim: string, source: ReadonlySet<string>, minCoverage = 0.6): boolean {
  const tokens = contentTokens(claim);
  if (tokens.length === 0) return true;
  const hits = tokens.filter((t) => source.has(t)).length;
  return hits / tokens.length >= minCoverage;
}

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
