/**
 * Classification key extraction from page text.
 *
 * Each extractor is an ordered list of rules tried in turn; the first rule
 * that matches wins and only its first occurrence in the text is used.
 * No scoring, no best-of-many.
 *
 * Depot ID (Call List):
 *   before-label   "1:342104\nDepot ID"  →  2104  (numeral glued to the line above the label)
 *   after-label    "Depot ID ... 2104"   →  2104
 *
 * Shipping Point (Group List):
 *   label          "Shipping Point : 123V Messer St Hubert"  →  123V
 */

import { UNKNOWN } from './types.js';
import type { ClassificationKey, ExtractResult, Extractor } from './types.js';

/** A named pattern whose first capture group is the key. */
export interface KeyRule {
  name: string;
  pattern: RegExp;
  /** Optional check on the captured token; a rejected token does not match. */
  accept?: (token: string) => boolean;
}

// ── Rules ────────────────────────────────────────────────────

// The label is case-insensitive; digits have no case.
export const DEPOT_ID_RULES: readonly KeyRule[] = [
  { name: 'before-label', pattern: /(\d{4})\s*[\r\n]+\s*Depot ID/i },
  { name: 'after-label', pattern: /Depot ID[^\d]+(\d{4})/i },
];

// The `i` flag covers the label only: a lowercase "v" token is rejected.
export const SHIPPING_POINT_RULES: readonly KeyRule[] = [
  {
    name: 'label',
    pattern: /Shipping Point\s*:\s*(\d{3}v)/gi,
    accept: (token) => token.endsWith('V'),
  },
];

// ── Matching ─────────────────────────────────────────────────

function firstAccepted(rule: KeyRule, text: string): string | undefined {
  if (!rule.pattern.global) {
    const m = text.match(rule.pattern);
    if (!m || m[1] === undefined) return undefined;
    return !rule.accept || rule.accept(m[1]) ? m[1] : undefined;
  }
  for (const m of text.matchAll(rule.pattern)) {
    const token = m[1];
    if (token !== undefined && (!rule.accept || rule.accept(token))) return token;
  }
  return undefined;
}

/** Try rules in order against the text; first match wins. */
export function matchFirst(rules: readonly KeyRule[], text: string | null | undefined): ExtractResult {
  if (!text) return { matched: false };

  for (const rule of rules) {
    const key = firstAccepted(rule, text);
    if (key !== undefined) return { matched: true, key, rule: rule.name };
  }
  return { matched: false };
}

/** Collapse an extract result to its key, or UNKNOWN. */
export function keyOf(result: ExtractResult): ClassificationKey {
  return result.matched ? result.key : UNKNOWN;
}

// ── Extractors ───────────────────────────────────────────────

/** Depot ID for the Call List: before-label first, then after-label. */
export const extractDepotId: Extractor = (text) => matchFirst(DEPOT_ID_RULES, text);

/** Shipping Point (3 digits + "V") for the Group List. */
export const extractShippingPoint: Extractor = (text) => matchFirst(SHIPPING_POINT_RULES, text);
