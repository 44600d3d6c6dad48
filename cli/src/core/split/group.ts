/**
 * Pure grouping logic: assigns each page to a group by its extracted key.
 *
 * Pages are folded strictly in source order because the attach-to-previous
 * policy depends on the key resolved for earlier pages. No I/O here; text
 * is read by the runner before grouping.
 */

import { keyOf } from './extract.js';
import { UNKNOWN } from './types.js';
import type {
  ClassificationKey,
  Extractor,
  GroupingDiagnostics,
  GroupingResult,
  PageAssignment,
  PageGroup,
  PageText,
  UnknownPolicy,
} from './types.js';

export interface GroupPagesOptions {
  extract: Extractor;
  policy: UnknownPolicy;
}

/** Ordered key → pages table. Group order is the order keys were first added. */
export class GroupTable {
  private readonly order: ClassificationKey[] = [];
  private readonly index = new Map<ClassificationKey, number[]>();

  append(key: ClassificationKey, page: number): void {
    let pages = this.index.get(key);
    if (!pages) {
      pages = [];
      this.index.set(key, pages);
      this.order.push(key);
    }
    pages.push(page);
  }

  get size(): number {
    return this.order.length;
  }

  toGroups(): PageGroup[] {
    return this.order.map((key) => ({ key, pages: [...(this.index.get(key) ?? [])] }));
  }
}

interface GroupingState {
  table: GroupTable;
  diagnostics: GroupingDiagnostics;
  assignments: PageAssignment[];
  lastKey: ClassificationKey | null;
  pageCount: number;
}

/** Resolve the group for an unmatched page, recording why. Null means drop. */
function resolveUnknown(state: GroupingState, page: number, policy: UnknownPolicy): ClassificationKey | null {
  switch (policy) {
    case 'drop':
      state.diagnostics.dropped.push(page);
      return null;
    case 'attach-to-previous':
      if (state.lastKey !== null) {
        state.diagnostics.reattributed.push({ page, assignedTo: state.lastKey });
        return state.lastKey;
      }
      state.diagnostics.unresolved.push(page);
      return UNKNOWN;
    default: {
      const _exhaustive: never = policy;
      throw new Error(`Unknown policy: ${_exhaustive}`);
    }
  }
}

/**
 * Group pages by extracted key.
 *
 * Every page lands in exactly one group under attach-to-previous; under
 * drop, a page is grouped iff its own text yields a key.
 */
export function groupPages(pages: Iterable<PageText>, opts: GroupPagesOptions): GroupingResult {
  const initial: GroupingState = {
    table: new GroupTable(),
    diagnostics: { reattributed: [], unresolved: [], dropped: [] },
    assignments: [],
    lastKey: null,
    pageCount: 0,
  };

  const state = [...pages].reduce((acc, { page, text }) => {
    const result = opts.extract(text);
    const extracted = keyOf(result);

    let assignedTo: ClassificationKey | null;
    if (result.matched) {
      assignedTo = result.key;
      acc.lastKey = result.key;
    } else {
      assignedTo = resolveUnknown(acc, page, opts.policy);
    }

    if (assignedTo !== null) acc.table.append(assignedTo, page);
    acc.assignments.push({ page, extracted, assignedTo });
    acc.pageCount++;
    return acc;
  }, initial);

  return {
    groups: state.table.toGroups(),
    diagnostics: state.diagnostics,
    assignments: state.assignments,
    pageCount: state.pageCount,
  };
}

/** Total pages across all groups. */
export function groupedPageCount(result: GroupingResult): number {
  return result.groups.reduce((sum, g) => sum + g.pages.length, 0);
}
