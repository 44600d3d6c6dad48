/**
 * Page text assembly from pdfjs text-content items.
 *
 * Runs on the same baseline are concatenated without separators (so a
 * value drawn flush against its neighbour stays glued, e.g. "1:342104").
 * A new line starts on an explicit end-of-line flag or a baseline change.
 */

import type { TextRun } from './types.js';

const DEFAULT_LINE_TOLERANCE = 2;

/** True for text items; pdfjs also yields marked-content markers without `str`. */
export function isTextRun(item: object): item is TextRun {
  return 'str' in item && typeof item.str === 'string'
    && 'transform' in item && Array.isArray(item.transform);
}

/** Join pdfjs text items into plain text with "\n" between lines. */
export function joinTextRuns(items: readonly object[], lineTolerance = DEFAULT_LINE_TOLERANCE): string {
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    if (!isTextRun(item)) continue;

    const y = item.transform[5];
    const newLine = lastY !== undefined && typeof y === 'number' && Math.abs(y - lastY) > lineTolerance;
    if (newLine && text.length > 0 && !text.endsWith('\n')) text += '\n';

    text += item.str;
    if (item.hasEOL) text += '\n';
    if (typeof y === 'number') lastY = y;
  }

  return text.replace(/\n+$/, '');
}
