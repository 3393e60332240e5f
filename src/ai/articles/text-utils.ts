/**
 * Text helpers shared by the research and writing steps.
 */

/**
 * Counts whitespace-separated words.
 *
 * @example
 * countWords('  Alan  Turing\nwas born in 1912. '); // 6
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

/**
 * Cuts `text` to at most `maxChars`, backing up to the last whitespace so no
 * word is split, and appends an ellipsis when anything was removed.
 */
export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const slice = text.slice(0, maxChars);
  const lastSpace = slice.search(/\s\S*$/);
  const cut = lastSpace > 0 ? slice.slice(0, lastSpace) : slice;
  return `${cut.trimEnd()}…`;
}

/**
 * Joins non-empty paragraphs with a blank line.
 */
export function joinParagraphs(parts: readonly string[]): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join('\n\n');
}
