/** Rough characters-per-token ratio for English text */
export const CHARS_PER_TOKEN = 4;

/**
 * Estimates the token count of a prompt for the throughput budget.
 *
 * Under-estimates are accepted: the budget is charged once, before the call.
 *
 * @example
 * ```typescript
 * estimateTokenCount(""); // 0
 * estimateTokenCount("hi"); // 1
 * estimateTokenCount("a".repeat(4000)); // 1000
 * ```
 */
export const estimateTokenCount = (text: string): number =>
  text.length === 0 ? 0 : Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN));
