/** Sentence-aligned truncation shared by content providers and content capture. */
const SENTENCE_END = /[.!?](?=\s|$)/g;

/**
 * Cuts {@link text} to at most {@link maxChars} characters, ending on the last
 * complete sentence that fits. Text without a sentence boundary inside the
 * budget is cut at the budget.
 */
export function truncateAtSentence(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (maxChars <= 0) {
    return "";
  }
  if (trimmed.length <= maxChars) {
    return trimmed;
  }
  const window = trimmed.slice(0, maxChars + 1);
  let cut = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    const end = (match.index ?? 0) + 1;
    if (end <= maxChars) {
      cut = end;
    }
  }
  return cut > 0 ? trimmed.slice(0, cut) : trimmed.slice(0, maxChars).trimEnd();
}
