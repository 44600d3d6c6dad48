/**
 * In-memory ZIP archive (jszip, DEFLATE). Entry order = order added.
 */

import JSZip from 'jszip';
import type { ArchiveSink } from '../split/types.js';

export class ZipArchiveSink implements ArchiveSink {
  private readonly zip = new JSZip();
  private readonly names = new Set<string>();

  add(fileName: string, content: Uint8Array): void {
    if (this.names.has(fileName)) {
      throw new Error(`Duplicate archive entry: ${fileName}`);
    }
    this.names.add(fileName);
    this.zip.file(fileName, content, { binary: true });
  }

  finish(): Promise<Uint8Array> {
    return this.zip.generateAsync({
      type: 'uint8array',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}

/** CreateArchive implementation for ZIP output. */
export function createZipArchive(): ArchiveSink {
  return new ZipArchiveSink();
}
