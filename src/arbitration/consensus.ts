import { clampUnit } from "../core/vector-math.js";

export type ConsensusReport = {
  hasConsensus: boolean;
  averageSimilarity: number;
  pairCount: number;
};

export const DEFAULT_CONSENSUS_THRESHOLD = 0.7;

const normalizeLexicalText = (value: string): string =>
  value.toLowerCase().replace(/\s+/g, " ").trim();

const wordSet = (value: string): Set<string> =>
  new Set(value.split(" ").filter((word) => word.length > 0));

export const jaccardWordOverlap = (textA: string, textB: string): number => {
  const wordsA = wordSet(normalizeLexicalText(textA));
  const wordsB = wordSet(normalizeLexicalText(textB));
  if (wordsA.size === 0 || wordsB.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) {
      intersection += 1;
    }
  }
  return intersection / (wordsA.size + wordsB.size - intersection);
};

const bigramCounts = (value: string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (let i = 0; i < value.length - 1; i += 1) {
    const bigram = value.slice(i, i + 2);
    counts.set(bigram, (counts.get(bigram) ?? 0) + 1);
  }
  return counts;
};

export const diceBigramSimilarity = (textA: string, textB: string): number => {
  const a = normalizeLexicalText(textA);
  const b = normalizeLexicalText(textB);
  if (a.length < 2 || b.length < 2) {
    return a.length > 0 && a === b ? 1 : 0;
  }
  const countsA = bigramCounts(a);
  const countsB = bigramCounts(b);
  let shared = 0;
  for (const [bigram, count] of countsA) {
    shared += Math.min(count, countsB.get(bigram) ?? 0);
  }
  return (2 * shared) / (a.length - 1 + (b.length - 1));
};

/**
 * Surface overlap between two texts: the larger of word-set Jaccard and
 * character-bigram Dice, so small lexical edits do not read as disagreement.
 */
export const lexicalSimilarity = (textA: string, textB: string): number => {
  const a = normalizeLexicalText(textA);
  const b = normalizeLexicalText(textB);
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  return clampUnit(Math.max(jaccardWordOverlap(a, b), diceBigramSimilarity(a, b)));
};

export const detectConsensus = (
  texts: readonly string[],
  threshold: number = DEFAULT_CONSENSUS_THRESHOLD
): ConsensusReport => {
  if (texts.length < 2) {
    return { hasConsensus: true, averageSimilarity: 1, pairCount: 0 };
  }

  let total = 0;
  let pairCount = 0;
  for (let i = 0; i < texts.length; i += 1) {
    for (let j = i + 1; j < texts.length; j += 1) {
      total += lexicalSimilarity(texts[i], texts[j]);
      pairCount += 1;
    }
  }
  const averageSimilarity = total / pairCount;
  return {
    hasConsensus: averageSimilarity >= threshold,
    averageSimilarity,
    pairCount
  };
};
