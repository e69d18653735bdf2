function vectorNorm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/** Unit-length copy of `vector`. A zero vector stays zero. */
export function normalizeVector(vector: number[]): number[] {
  const norm = vectorNorm(vector);
  if (norm === 0) {
    return vector.map(() => 0);
  }
  return vector.map((value) => value / norm);
}

export function dotProduct(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function clampScore(score: number): number {
  return Math.min(1, Math.max(-1, score));
}
