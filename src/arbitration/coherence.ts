/**
 * Coherence is a cheap structural proxy: it counts discourse connectives that
 * usually mark explicit reasoning. It does not read meaning and should not be
 * grown into semantic analysis.
 */
export const DISCOURSE_CONNECTIVES: readonly string[] = [
  "therefore",
  "because",
  "however",
  "thus",
  "consequently",
  "for example",
  "specifically",
  "in particular"
];

/** Connective count at which coherence saturates. */
export const COHERENCE_SATURATION_COUNT = 3;

const CONNECTIVE_PATTERNS: readonly RegExp[] = DISCOURSE_CONNECTIVES.map(
  (phrase) => new RegExp(`\\b${phrase.split(" ").join("\\s+")}\\b`, "gi")
);

export const countDiscourseConnectives = (text: string): number =>
  CONNECTIVE_PATTERNS.reduce((count, pattern) => count + (text.match(pattern)?.length ?? 0), 0);

export const scoreCoherence = (text: string): number =>
  Math.min(1, countDiscourseConnectives(text) / COHERENCE_SATURATION_COUNT);
