/**
 * String and number helpers
 */

/**
 * Normalizes a label string
 * - guards null/undefined
 * - replaces line breaks (\r\n, \n) with a space
 * - collapses runs of whitespace
 * - trims both ends
 */
export const normalizeLabel = (s?: string | null): string => {
  if (s == null) return "";
  return s
    .replace(/\r?\n/g, " ")
    .replace(/\s+/g, " ")
    .trim();
};

/**
 * Splits a pipe-separated catalog field into trimmed, non-empty items
 */
export const splitPipeList = (s?: string | null): string[] => {
  if (s == null) return [];
  return s
    .split("|")
    .map((item) => normalizeLabel(item))
    .filter((item) => item.length > 0);
};

/**
 * Arithmetic mean; null when there is nothing to average
 */
export const computeMean = (values: number[]): number | null => {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const roundTo = (value: number, digits: number = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Formats a score for display ("2.5"), or "N/A" when missing
 */
export const formatScore = (score: number | null | undefined, digits: number = 1): string => {
  if (score == null || !Number.isFinite(score)) return "N/A";
  return score.toFixed(digits);
};
