export const DEFAULT_TITLE_MAX_CHARS = 70;

const ELLIPSIS = '…';

/**
 * Clamp a title to maxChars code points: keep maxChars - 1, trim trailing
 * whitespace, append an ellipsis. Titles that fit are returned unchanged.
 */
export function clampTitle(title: string, maxChars: number = DEFAULT_TITLE_MAX_CHARS): string {
  if (maxChars < 1) {
    return '';
  }

  const codePoints = Array.from(title);
  if (codePoints.length <= maxChars) {
    return title;
  }

  return codePoints.slice(0, maxChars - 1).join('').trimEnd() + ELLIPSIS;
}
