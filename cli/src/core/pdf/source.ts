/**
 * DocumentSource over a PDF: pdfjs-dist reads page text, pdf-lib copies pages.
 *
 * Both libraries load the same bytes; pdf-lib's page count is authoritative
 * because page copies index into it.
 */

// pdfjs-dist legacy build for Node.js (no canvas requirement)
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocument } from 'pdf-lib';
import type { DocumentSource } from '../split/types.js';
import { joinTextRuns } from './text.js';
import { copyPagesToPdf, loadPdf } from './write.js';

type PdfJsDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

export class PdfDocumentSource implements DocumentSource {
  private constructor(
    private readonly textDoc: PdfJsDocument,
    private readonly pdf: PDFDocument,
  ) {}

  /** Open PDF bytes with both libraries. */
  static async open(bytes: Uint8Array): Promise<PdfDocumentSource> {
    const pdf = await loadPdf(bytes);
    const textDoc = await getDocument({
      // pdfjs may take ownership of the buffer and rejects Node Buffers; give it a plain copy
      data: new Uint8Array(bytes),
      isEvalSupported: false, // Security: no code generation from strings
      verbosity: 0,           // Suppress warnings
    }).promise;
    return new PdfDocumentSource(textDoc, pdf);
  }

  get pageCount(): number {
    return this.pdf.getPageCount();
  }

  async pageText(page: number): Promise<string> {
    const pdfPage = await this.textDoc.getPage(page); // 1-based
    try {
      const content = await pdfPage.getTextContent();
      return joinTextRuns(content.items);
    } finally {
      pdfPage.cleanup();
    }
  }

  writePages(pages: readonly number[]): Promise<Uint8Array> {
    return copyPagesToPdf(this.pdf, pages);
  }

  async close(): Promise<void> {
    await this.textDoc.destroy();
  }
}

/** OpenDocument implementation for PDFs. */
export function openPdf(bytes: Uint8Array): Promise<DocumentSource> {
  return PdfDocumentSource.open(bytes);
}
