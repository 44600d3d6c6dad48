/**
 * Top-level split pipeline: open → read text → group → archive.
 *
 * Everything a run touches lives in this call; concurrent runs share nothing.
 * Pages are read one after another, in order.
 */

import { buildArchive } from './archive.js';
import { NoGroupsProducedError, SerializationError, errorMessage } from './errors.js';
import { groupPages } from './group.js';
import type {
  CreateArchive,
  DocumentSource,
  OpenDocument,
  PageAssignment,
  PageText,
  SplitOutcome,
  SplitVariant,
} from './types.js';

export interface SplitDeps {
  openDocument: OpenDocument;
  createArchive: CreateArchive;
  /** Called once the document is open, before any page is read. */
  onOpen?: (pageCount: number) => void;
  /** Called once per page, in order, after grouping. */
  onPage?: (assignment: PageAssignment) => void;
  /** Called when a page's text could not be read (the page is treated as blank). */
  onTextError?: (page: number, err: unknown) => void;
  /** Called when closing the document fails. Without it, a close failure after a successful run is thrown. */
  onCloseError?: (err: unknown) => void;
}

/** Read every page's text in order. A page that fails to yield text counts as blank. */
export async function readPageTexts(
  source: DocumentSource,
  onTextError?: (page: number, err: unknown) => void,
): Promise<PageText[]> {
  const pages: PageText[] = [];
  for (let page = 1; page <= source.pageCount; page++) {
    let text = '';
    try {
      text = await source.pageText(page);
    } catch (err) {
      onTextError?.(page, err);
    }
    pages.push({ page, text });
  }
  return pages;
}

/**
 * Split a document with the given tool.
 *
 * @throws NoGroupsProducedError when no group ends up with pages.
 * @throws SerializationError when the document cannot be read or an output cannot be written.
 */
export async function splitDocument(
  bytes: Uint8Array,
  variant: SplitVariant,
  deps: SplitDeps,
): Promise<SplitOutcome> {
  let source: DocumentSource;
  try {
    source = await deps.openDocument(bytes);
  } catch (err) {
    throw new SerializationError(`Could not read document: ${errorMessage(err)}`, { cause: err });
  }

  const unreadablePages: number[] = [];
  let failed = false;
  try {
    deps.onOpen?.(source.pageCount);
    const pages = await readPageTexts(source, (page, err) => {
      unreadablePages.push(page);
      deps.onTextError?.(page, err);
    });
    const grouping = groupPages(pages, { extract: variant.extract, policy: variant.policy });

    if (deps.onPage) {
      for (const a of grouping.assignments) deps.onPage(a);
    }

    if (grouping.groups.length === 0) {
      throw new NoGroupsProducedError(
        `No valid ${variant.keyLabel} found on any page. Nothing to split.`,
        grouping.diagnostics.dropped,
      );
    }

    const archive = await buildArchive(grouping.groups, variant.formatFileName, source, deps.createArchive);

    return {
      variant: variant.id,
      pageCount: source.pageCount,
      grouping,
      archive,
      unreadablePages,
    };
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      await source.close();
    } catch (err) {
      // the error that ended the run wins over a close failure
      if (deps.onCloseError) deps.onCloseError(err);
      else if (!failed) throw err;
    }
  }
}
