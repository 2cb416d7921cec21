export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Cosine over sparse term-count vectors. */
export function sparseCosine(a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): number {
  let dot = 0;
  for (const [term, count] of a) dot += count * (b.get(term) ?? 0);
  if (dot === 0) return 0;
  const norm = (v: ReadonlyMap<string, number>) => {
    let sum = 0;
    for (const count of v.values()) sum += count * count;
    return Math.sqrt(sum);
  };
  return dot / (norm(a) * norm(b));
}

/** Index and value of the largest score; ties keep the earliest. */
export function argMax(scores: readonly number[]): { index: number; score: number } {
  let index = -1;
  let score = 0;
  scores.forEach((s, i) => {
    if (index === -1 || s > score) {
      index = i;
      score = s;
    }
  });
  return { index, score };
}
