/**
 * CLI output formatting for split runs.
 * Follows the same chalk + summary-block pattern as the other job printers.
 */

import chalk from 'chalk';
import { groupedPageCount } from './group.js';
import { UNKNOWN } from './types.js';
import type { PageAssignment, SplitOutcome, SplitVariant } from './types.js';

const line = (w: number): string => chalk.dim('─'.repeat(w));
const code = (s: string): string => chalk.cyan(s);

/** One progress line for a page, worded per tool. */
export function formatPageLine(variant: SplitVariant, a: PageAssignment): string {
  if (a.assignedTo === null) {
    return `Page ${a.page}: ${chalk.dim(`no valid ${variant.keyLabel} (ignored).`)}`;
  }
  if (variant.policy === 'drop') {
    return `Page ${a.page}: ${variant.keyLabel} ${code(a.assignedTo)}`;
  }
  const extracted = a.extracted === UNKNOWN ? chalk.yellow(a.extracted) : code(a.extracted);
  return `Page ${a.page}: extracted ${variant.keyLabel} ${extracted}, assigned to group ${code(a.assignedTo)}`;
}

/** Header printed before page lines. */
export function printSplitHeader(variant: SplitVariant, fileName: string, pageCount?: number): void {
  console.log(chalk.bold(variant.title));
  console.log(`  File: ${fileName}${pageCount !== undefined ? ` (${pageCount} pages)` : ''}`);
  console.log();
}

/** Print groups, diagnostics and the archive summary. */
export function printSplitResult(variant: SplitVariant, outcome: SplitOutcome, savedTo?: string): void {
  const W = 60;
  const { grouping, archive } = outcome;
  const { reattributed, unresolved, dropped } = grouping.diagnostics;

  console.log();
  console.log(chalk.bold(`${variant.keyLabel} groups created: ${grouping.groups.length}`));
  console.log(chalk.dim(`  ${groupedPageCount(grouping)} of ${outcome.pageCount} pages grouped`));
  console.log(line(W));
  for (const entry of archive.entries) {
    const pages = entry.pages.length === 1 ? '1 page' : `${entry.pages.length} pages`;
    console.log(`  ${entry.key.padEnd(10)} ${entry.fileName.padEnd(28)} ${chalk.dim(pages)}`);
  }
  console.log(line(W));

  if (reattributed.length > 0) {
    console.log(chalk.yellow(`\n  Some pages had no ${variant.keyLabel} match and were attached to the previous group:`));
    for (const r of reattributed) {
      console.log(chalk.yellow(`    • page ${r.page} → ${r.assignedTo}`));
    }
  }

  if (unresolved.length > 0) {
    console.log(chalk.red(`\n  Some pages had no ${variant.keyLabel} and no previous group to attach to.`));
    console.log(chalk.red(`  Grouped as ${UNKNOWN}: pages ${unresolved.join(', ')}`));
  }

  if (dropped.length > 0) {
    console.log(chalk.dim(`\n  Pages with no valid ${variant.keyLabel} were ignored: ${dropped.join(', ')}`));
  }

  if (outcome.unreadablePages.length > 0) {
    console.log(chalk.yellow(`\n  Text could not be read on pages ${outcome.unreadablePages.join(', ')} (treated as blank).`));
  }

  if (archive.warnings.length > 0) {
    console.log();
    console.log(chalk.yellow(`  ${archive.warnings.length} warning(s):`));
    for (const w of archive.warnings) {
      console.log(chalk.yellow(`    • ${w}`));
    }
  }

  console.log();
  if (savedTo) {
    console.log(chalk.green(`Splitting complete! Saved to ${savedTo}`));
  } else {
    console.log(chalk.dim('Dry run — no archive written.'));
  }
}

/** JSON shape for --json output. */
export function splitResultJson(file: string, outcome: SplitOutcome, savedTo?: string): Record<string, unknown> {
  return {
    file,
    tool: outcome.variant,
    pageCount: outcome.pageCount,
    groups: outcome.archive.entries.map((e) => ({ key: e.key, fileName: e.fileName, pages: e.pages })),
    diagnostics: outcome.grouping.diagnostics,
    warnings: outcome.archive.warnings,
    unreadablePages: outcome.unreadablePages,
    archive: savedTo ?? null,
  };
}
