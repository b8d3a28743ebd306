/**
 * Shared string utility helpers.
 */

/** Truncate a string to `max` characters, appending `...` if truncated. */
export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + '...';
}

/** `1 block`, `3 blocks`. */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Letter for a 0-based column index. Only the first 26 columns get a
 * letter; later ones are labelled `Col<index>`.
 */
export function columnLetter(index: number): string {
  return index < 26 ? String.fromCharCode(65 + index) : `Col${index}`;
}
