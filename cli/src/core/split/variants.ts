/**
 * The two splitting tools. Each is the same pipeline with a different
 * extractor, UNKNOWN policy and naming rule.
 */

import { extractDepotId, extractShippingPoint } from './extract.js';
import { depotFileName, shippingPointFileName } from './filename.js';
import type { SplitVariant, VariantId } from './types.js';

export const CALL_LIST: SplitVariant = {
  id: 'call-list',
  title: 'Call List Splitter',
  keyLabel: 'Depot ID',
  extract: extractDepotId,
  policy: 'attach-to-previous',
  formatFileName: depotFileName,
  archiveName: 'call_lists_by_depot.zip',
};

export const GROUP_LIST: SplitVariant = {
  id: 'group-list',
  title: 'Group List Splitter',
  keyLabel: 'Shipping Point',
  extract: extractShippingPoint,
  policy: 'drop',
  formatFileName: shippingPointFileName,
  archiveName: 'group_lists_by_shipping_point.zip',
};

export const VARIANTS: Record<VariantId, SplitVariant> = {
  'call-list': CALL_LIST,
  'group-list': GROUP_LIST,
};

/** Short names accepted on the command line. */
const ALIASES: Record<string, VariantId> = {
  cl: 'call-list',
  gl: 'group-list',
  calllist: 'call-list',
  grouplist: 'group-list',
};

/** Look up a tool by id or alias (case-insensitive). */
export function findVariant(name: string): SplitVariant | undefined {
  const normalized = name.trim().toLowerCase();
  if (normalized === 'call-list' || normalized === 'group-list') return VARIANTS[normalized];
  const aliased = ALIASES[normalized];
  return aliased ? VARIANTS[aliased] : undefined;
}
