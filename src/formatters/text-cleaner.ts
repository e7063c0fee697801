/**
 * Text cleanup utilities
 * Normalize whitespace, split paragraphs, truncate at word boundaries
 */

/**
 * Collapse every whitespace run (including line breaks) into one space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalize block text
 * - Collapse spaces and tabs inside each line
 * - Drop empty lines
 * - Separate the remaining lines as paragraphs
 */
export function normalizeParagraphs(text: string): string {
  return text
    .split('\n')
    .map(line => collapseWhitespace(line))
    .filter(line => line.length > 0)
    .join('\n\n');
}

/**
 * Truncate text to a maximum length
 * Breaks at word boundaries and adds ellipsis
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  // Find the last space before maxLength
  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '…';
  }

  return truncated + '…';
}

/**
 * Single-line leading slice of a longer text
 */
export function summarize(text: string, maxLength: number): string {
  return truncateText(collapseWhitespace(text), maxLength);
}

/**
 * Hard cap for short metadata fields (titles, authors)
 */
export function clip(text: string | undefined, maxLength: number): string | undefined {
  if (!text) return undefined;
  const cleaned = collapseWhitespace(text);
  if (!cleaned) return undefined;
  return cleaned.length > maxLength ? cleaned.substring(0, maxLength) : cleaned;
}
