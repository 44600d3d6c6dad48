/**
 * Terminal errors for a split run. Extraction misses are never errors;
 * they resolve to UNKNOWN and go through the grouping policy.
 */

/** Bad command-line input (missing file, wrong extension, unknown tool). */
export class SplitInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SplitInputError';
  }
}

/** No page produced a usable key, so there is nothing to put in an archive. */
export class NoGroupsProducedError extends Error {
  readonly droppedPages: number[];

  constructor(message: string, droppedPages: number[] = []) {
    super(message);
    this.name = 'NoGroupsProducedError';
    this.droppedPages = droppedPages;
  }
}

/** Reading the source document or writing an output document/archive failed. */
export class SerializationError extends Error {
  /** Group being written when the failure happened, if any. */
  readonly groupKey?: string;

  constructor(message: string, opts: { cause?: unknown; groupKey?: string } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'SerializationError';
    this.groupKey = opts.groupKey;
  }
}

/** Error message for display, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
