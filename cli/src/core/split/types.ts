/**
 * Types for page-keyed PDF splitting.
 *
 * A split reads every page's text, derives a classification key from it,
 * groups pages by key and writes one PDF per group into a ZIP archive.
 */

// ── Keys ─────────────────────────────────────────────────────

/** Sentinel key for pages whose text yields no classification key. */
export const UNKNOWN = 'UNKNOWN';

/** A domain key (e.g. "2104", "123V") or the UNKNOWN sentinel. */
export type ClassificationKey = string;

/** Outcome of running an extractor over one page's text. `rule` names the pattern that matched. */
export type ExtractResult =
  | { matched: true; key: ClassificationKey; rule: string }
  | { matched: false };

export type Extractor = (text: string | null | undefined) => ExtractResult;

/** Maps a resolved group key to an archive entry file name. */
export type KeyFormatter = (key: ClassificationKey) => string;

// ── Grouping ─────────────────────────────────────────────────

/**
 * What to do with a page whose text yields no key.
 *   attach-to-previous  add it to the last resolved group (UNKNOWN group if none yet)
 *   drop                leave it out of every group
 */
export type UnknownPolicy = 'attach-to-previous' | 'drop';

/** A page as seen by the grouping engine. */
export interface PageText {
  /** 1-based page number in the source document. */
  page: number;
  text: string;
}

/** Per-page decision, in source order. */
export interface PageAssignment {
  page: number;
  /** Key extracted from this page's own text (UNKNOWN when unmatched). */
  extracted: ClassificationKey;
  /** Group the page was added to; null when the page was dropped. */
  assignedTo: ClassificationKey | null;
}

export interface Reattribution {
  page: number;
  assignedTo: ClassificationKey;
}

export interface GroupingDiagnostics {
  /** Unmatched pages added to the previous group. */
  reattributed: Reattribution[];
  /** Unmatched pages with no previous group (grouped as UNKNOWN). */
  unresolved: number[];
  /** Unmatched pages left out of every group. */
  dropped: number[];
}

/** A group of pages sharing one effective key. */
export interface PageGroup {
  key: ClassificationKey;
  /** 1-based page numbers, in source order. */
  pages: number[];
}

export interface GroupingResult {
  /** Groups in order of first appearance. */
  groups: PageGroup[];
  diagnostics: GroupingDiagnostics;
  assignments: PageAssignment[];
  pageCount: number;
}

// ── Collaborators ────────────────────────────────────────────

/** An opened source document. Implementations wrap a PDF library. */
export interface DocumentSource {
  readonly pageCount: number;
  /** Plain text of a 1-based page; may be empty. */
  pageText(page: number): Promise<string>;
  /** Serialise the given 1-based pages, in the given order, into a new document. */
  writePages(pages: readonly number[]): Promise<Uint8Array>;
  close(): Promise<void>;
}

export type OpenDocument = (bytes: Uint8Array) => Promise<DocumentSource>;

/** Collects named entries and serialises them into one archive. */
export interface ArchiveSink {
  add(fileName: string, content: Uint8Array): void;
  finish(): Promise<Uint8Array>;
}

export type CreateArchive = () => ArchiveSink;

// ── Variants ─────────────────────────────────────────────────

export type VariantId = 'call-list' | 'group-list';

/** One splitting tool: how keys are found, named and what happens to misses. */
export interface SplitVariant {
  id: VariantId;
  /** Display name, e.g. "Call List Splitter". */
  title: string;
  /** What the key is called in progress output, e.g. "Depot ID". */
  keyLabel: string;
  extract: Extractor;
  policy: UnknownPolicy;
  formatFileName: KeyFormatter;
  /** Default archive file name. */
  archiveName: string;
}

// ── Results ──────────────────────────────────────────────────

export interface ArchiveEntry {
  fileName: string;
  key: ClassificationKey;
  pages: number[];
}

export interface ArchiveResult {
  bytes: Uint8Array;
  entries: ArchiveEntry[];
  /** Human-readable notes, e.g. renamed duplicate entries. */
  warnings: string[];
}

export interface SplitOutcome {
  variant: VariantId;
  pageCount: number;
  grouping: GroupingResult;
  archive: ArchiveResult;
  /** Pages whose text could not be read and were grouped as blank. */
  unreadablePages: number[];
}
