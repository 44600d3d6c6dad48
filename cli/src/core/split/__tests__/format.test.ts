import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import chalk from 'chalk';
import { formatPageLine, printSplitHeader, printSplitResult, splitResultJson } from '../format.js';
import { groupPages } from '../group.js';
import { CALL_LIST, GROUP_LIST } from '../variants.js';
import { UNKNOWN } from '../types.js';
import type { SplitOutcome } from '../types.js';
import { pagesOf } from './fakes.js';

const RULE = '─'.repeat(60);

function callListOutcome(): SplitOutcome {
  const grouping = groupPages(
    pagesOf(['', '1:342104\nDepot ID', 'continued', 'Depot ID 2200']),
    { extract: CALL_LIST.extract, policy: CALL_LIST.policy },
  );
  return {
    variant: 'call-list',
    pageCount: 4,
    grouping,
    archive: {
      bytes: new Uint8Array(),
      entries: [
        { fileName: 'UNKNOWN_CL.pdf', key: UNKNOWN, pages: [1] },
        { fileName: '104V_CL.pdf', key: '2104', pages: [2, 3] },
        { fileName: '200V_CL.pdf', key: '2200', pages: [4] },
      ],
      warnings: ['Group 3104 written as 104V_CL-2.pdf (104V_CL.pdf already used)'],
    },
    unreadablePages: [],
  };
}

function groupListOutcome(): SplitOutcome {
  const grouping = groupPages(
    pagesOf(['Shipping Point : 123V', '', 'Shipping Point : 140V']),
    { extract: GROUP_LIST.extract, policy: GROUP_LIST.policy },
  );
  return {
    variant: 'group-list',
    pageCount: 3,
    grouping,
    archive: {
      bytes: new Uint8Array(),
      entries: [
        { fileName: '123V_Group.pdf', key: '123V', pages: [1] },
        { fileName: '140V_Group.pdf', key: '140V', pages: [3] },
      ],
      warnings: [],
    },
    unreadablePages: [2],
  };
}

describe('split output', () => {
  let level: typeof chalk.level;
  let logs: string[];

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  beforeEach(() => {
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('formatPageLine', () => {
    it('words Call List pages with the extracted key and the group', () => {
      expect(formatPageLine(CALL_LIST, { page: 2, extracted: '2104', assignedTo: '2104' }))
        .toBe('Page 2: extracted Depot ID 2104, assigned to group 2104');
      expect(formatPageLine(CALL_LIST, { page: 3, extracted: UNKNOWN, assignedTo: '2104' }))
        .toBe('Page 3: extracted Depot ID UNKNOWN, assigned to group 2104');
    });

    it('words Group List pages by key, or as ignored', () => {
      expect(formatPageLine(GROUP_LIST, { page: 1, extracted: '123V', assignedTo: '123V' }))
        .toBe('Page 1: Shipping Point 123V');
      expect(formatPageLine(GROUP_LIST, { page: 2, extracted: UNKNOWN, assignedTo: null }))
        .toBe('Page 2: no valid Shipping Point (ignored).');
    });
  });

  it('prints the header with the page count', () => {
    printSplitHeader(CALL_LIST, 'calls.pdf', 3);
    expect(logs).toEqual(['Call List Splitter', '  File: calls.pdf (3 pages)', '']);
  });

  it('prints Call List groups, reattributed and unresolved pages, warnings and the saved path', () => {
    printSplitResult(CALL_LIST, callListOutcome(), '/out/calls.zip');

    expect(logs).toEqual([
      '',
      'Depot ID groups created: 3',
      '  4 of 4 pages grouped',
      RULE,
      '  UNKNOWN    UNKNOWN_CL.pdf               1 page',
      '  2104       104V_CL.pdf                  2 pages',
      '  2200       200V_CL.pdf                  1 page',
      RULE,
      '\n  Some pages had no Depot ID match and were attached to the previous group:',
      '    • page 3 → 2104',
      '\n  Some pages had no Depot ID and no previous group to attach to.',
      '  Grouped as UNKNOWN: pages 1',
      '',
      '  1 warning(s):',
      '    • Group 3104 written as 104V_CL-2.pdf (104V_CL.pdf already used)',
      '',
      'Splitting complete! Saved to /out/calls.zip',
    ]);
  });

  it('prints Group List dropped and unreadable pages on a dry run', () => {
    printSplitResult(GROUP_LIST, groupListOutcome());

    expect(logs).toEqual([
      '',
      'Shipping Point groups created: 2',
      '  2 of 3 pages grouped',
      RULE,
      '  123V       123V_Group.pdf               1 page',
      '  140V       140V_Group.pdf               1 page',
      RULE,
      '\n  Pages with no valid Shipping Point were ignored: 2',
      '\n  Text could not be read on pages 2 (treated as blank).',
      '',
      'Dry run — no archive written.',
    ]);
  });

  it('includes unreadable pages in the JSON result', () => {
    expect(splitResultJson('groups.pdf', groupListOutcome())).toEqual({
      file: 'groups.pdf',
      tool: 'group-list',
      pageCount: 3,
      groups: [
        { key: '123V', fileName: '123V_Group.pdf', pages: [1] },
        { key: '140V', fileName: '140V_Group.pdf', pages: [3] },
      ],
      diagnostics: { reattributed: [], unresolved: [], dropped: [2] },
      warnings: [],
      unreadablePages: [2],
      archive: null,
    });
  });
});
