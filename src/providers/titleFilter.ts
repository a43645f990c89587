/** Characters that never appear in a valid document title. */
export const INVALID_TITLE_CHARACTERS: readonly string[] = [".", "#", ",", ":"];

export function isValidTitle(title: string): boolean {
  if (title.trim().length === 0) {
    return false;
  }
  return !INVALID_TITLE_CHARACTERS.some((character) => title.includes(character));
}

/**
 * Drops link titles containing invalid characters and links pointing back at
 * {@link selfTitle}. Provider order is preserved, duplicates keep their first
 * occurrence.
 */
export function filterLinkTitles(titles: readonly string[], selfTitle: string): string[] {
  const seen = new Set<string>();
  const kept: string[] = [];
  for (const raw of titles) {
    const title = raw.trim();
    if (title === selfTitle || !isValidTitle(title) || seen.has(title)) {
      continue;
    }
    seen.add(title);
    kept.push(title);
  }
  return kept;
}
