/**
 * Page copying via pdf-lib: builds a new PDF from selected pages of a loaded one.
 * Everything stays in memory; no temp files.
 */

import { PDFDocument } from 'pdf-lib';

/** Load PDF bytes for page copying. Encrypted PDFs are rejected by pdf-lib. */
export function loadPdf(bytes: Uint8Array): Promise<PDFDocument> {
  return PDFDocument.load(bytes, { updateMetadata: false });
}

/**
 * Copy 1-based pages, in the order given, into a new PDF and serialise it.
 * @throws RangeError if a page number is outside the source document.
 */
export async function copyPagesToPdf(source: PDFDocument, pages: readonly number[]): Promise<Uint8Array> {
  const count = source.getPageCount();
  for (const p of pages) {
    if (!Number.isInteger(p) || p < 1 || p > count) {
      throw new RangeError(`Page ${p} is out of range (document has ${count} pages)`);
    }
  }

  const out = await PDFDocument.create();
  const copied = await out.copyPages(source, pages.map((p) => p - 1));
  for (const page of copied) out.addPage(page);
  return out.save();
}
