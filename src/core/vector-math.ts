export const NORM_EPSILON = 1e-12;

export const dotProduct = (vectorA: readonly number[], vectorB: readonly number[]): number => {
  if (vectorA.length !== vectorB.length) {
    throw new Error(
      `dotProduct requires vectors with equal length (got ${vectorA.length} and ${vectorB.length})`
    );
  }
  let dot = 0;
  for (let i = 0; i < vectorA.length; i += 1) {
    dot += vectorA[i] * vectorB[i];
  }
  return dot;
};

export const squaredNorm = (vector: readonly number[]): number => {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return sum;
};

const maxAbs = (vector: readonly number[]): number => {
  let max = 0;
  for (const value of vector) {
    max = Math.max(max, Math.abs(value));
  }
  return max;
};

// Dividing by the largest component keeps squares and products finite for any finite input.
const scaleDown = (vector: readonly number[], scale: number): number[] =>
  vector.map((value) => value / scale);

export const vectorNorm = (vector: readonly number[]): number => {
  const scale = maxAbs(vector);
  return scale === 0 ? 0 : scale * Math.sqrt(squaredNorm(scaleDown(vector, scale)));
};

export const isFiniteVector = (value: unknown): value is number[] =>
  Array.isArray(value) &&
  value.every((item) => typeof item === "number" && Number.isFinite(item));

// Taking one square root of the product keeps cos(v, v) at exactly 1.
export const cosineSimilarity = (
  vectorA: readonly number[],
  vectorB: readonly number[],
  epsilon: number = NORM_EPSILON
): number => {
  if (vectorA.length !== vectorB.length) {
    throw new Error(
      `cosineSimilarity requires vectors with equal length (got ${vectorA.length} and ${vectorB.length})`
    );
  }
  if (vectorNorm(vectorA) <= epsilon || vectorNorm(vectorB) <= epsilon) {
    return 0;
  }

  const unitA = scaleDown(vectorA, maxAbs(vectorA));
  const unitB = scaleDown(vectorB, maxAbs(vectorB));
  const similarity = dotProduct(unitA, unitB) / Math.sqrt(squaredNorm(unitA) * squaredNorm(unitB));
  return Math.max(-1, Math.min(1, similarity));
};

export const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));
