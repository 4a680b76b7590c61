import cliTruncate from 'cli-truncate';
import stringWidth from 'string-width';
import wrapAnsi from 'wrap-ansi';

/**
 * Word wrap by terminal columns. Words wider than the line are hard-split, and
 * existing newlines are kept as paragraph breaks. Paragraphs that already fit
 * are returned untouched, leading indentation included.
 */
export function wrapText(text: string, width: number): string[] {
  const maxWidth = Math.max(1, Math.floor(width));
  return text.split('\n').flatMap((paragraph) =>
    stringWidth(paragraph) <= maxWidth ? [paragraph] : wrapAnsi(paragraph, maxWidth, { hard: true }).split('\n')
  );
}

export function trimText(text: string | null | undefined, maxLength: number): string {
  if (!text) return '';
  const flat = text.trim().replace(/\n/g, ' ');
  return flat.length > maxLength ? `${flat.slice(0, maxLength)}…` : flat;
}

// Lines wider than the terminal end in an ellipsis.
export function truncateLine(text: string, width: number): string {
  if (width <= 0) return '';
  return cliTruncate(text, width);
}
