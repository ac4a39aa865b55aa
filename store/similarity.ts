const TOKEN = /[a-z0-9]+/g;

/** Lower-cased alphanumeric tokens of two or more characters. */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN) ?? []).filter((t) => t.length > 1);
}

export function termFrequencies(tokens: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
  return tf;
}

function norm(values: Iterable<number>): number {
  let sum = 0;
  for (const v of values) sum += v * v;
  return Math.sqrt(sum);
}

/** Cosine similarity of two sparse term vectors. */
export function sparseCosine(
  a: Map<string, number>,
  b: Map<string, number>,
): number {
  if (a.size === 0 || b.size === 0) return 0;
  let dot = 0;
  for (const [term, weight] of a) dot += weight * (b.get(term) ?? 0);
  if (dot === 0) return 0;
  return dot / (norm(a.values()) * norm(b.values()));
}

/** Cosine similarity of two dense vectors of equal length. */
export function denseCosine(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < len; i++) dot += (a[i] ?? 0) * (b[i] ?? 0);
  const denom = norm(a) * norm(b);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Order by descending score, breaking ties by insertion order, so the same
 * query over the same store always yields the same sequence.
 */
export function rank<T extends { score: number; position: number }>(
  items: T[],
  k: number,
  minScore: number,
): T[] {
  return items
    .filter((i) => i.score > minScore)
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, Math.max(0, k));
}
