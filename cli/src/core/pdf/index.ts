/**
 * PDF text extraction + page copying for the splitter.
 *
 * Usage:
 *   import { openPdf, copyPagesToPdf, ... } from '../core/pdf/index.js';
 */

export { PdfDocumentSource, openPdf } from './source.js';
export { joinTextRuns, isTextRun } from './text.js';
export { loadPdf, copyPagesToPdf } from './write.js';
export type { TextRun } from './types.js';
