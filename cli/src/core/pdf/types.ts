/**
 * Types for PDF text extraction.
 */

/** The part of a pdfjs text item that text assembly reads. */
export interface TextRun {
  str: string;
  /** Text matrix; transform[5] is the baseline Y (from the page bottom). */
  transform: number[];
  /** Set by pdfjs when the run ends a line. */
  hasEOL?: boolean;
}

