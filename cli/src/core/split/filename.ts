/**
 * Archive entry names for resolved group keys.
 */

import { UNKNOWN } from './types.js';
import type { ClassificationKey } from './types.js';

/**
 * Depot ID → Call List file name: drop the first digit, add "V".
 *   2104     →  104V_CL.pdf
 *   UNKNOWN  →  UNKNOWN_CL.pdf
 *   5        →  5_CL.pdf   (too short, used verbatim)
 */
export function depotFileName(key: ClassificationKey): string {
  const stem = key === UNKNOWN || !/^\d+$/.test(key) || key.length < 2
    ? key
    : `${key.slice(1)}V`;
  return `${stem}_CL.pdf`;
}

/** Shipping Point → Group List file name, key used as-is: 123V → 123V_Group.pdf. */
export function shippingPointFileName(key: ClassificationKey): string {
  return `${key}_Group.pdf`;
}

/**
 * Make a file name unique among those already taken by inserting "-2", "-3", …
 * before the extension. Returns the name unchanged when it is free.
 */
export function uniqueFileName(fileName: string, taken: ReadonlySet<string>): string {
  if (!taken.has(fileName)) return fileName;

  const dot = fileName.lastIndexOf('.');
  const base = dot > 0 ? fileName.slice(0, dot) : fileName;
  const ext = dot > 0 ? fileName.slice(dot) : '';
  let n = 2;
  while (taken.has(`${base}-${n}${ext}`)) n++;
  return `${base}-${n}${ext}`;
}
