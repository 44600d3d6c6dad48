/**
 * Packs grouped pages into one archive: one output document per group.
 *
 * Fail-fast: if any group cannot be serialised the whole build aborts and
 * no archive bytes are returned.
 */

import { SerializationError, errorMessage } from './errors.js';
import { uniqueFileName } from './filename.js';
import type {
  ArchiveEntry,
  ArchiveResult,
  CreateArchive,
  DocumentSource,
  KeyFormatter,
  PageGroup,
} from './types.js';

/**
 * Write each non-empty group (in order) as an archive entry named by `formatFileName`.
 * Entries whose names collide get a numeric suffix and a warning.
 */
export async function buildArchive(
  groups: readonly PageGroup[],
  formatFileName: KeyFormatter,
  source: DocumentSource,
  createArchive: CreateArchive,
): Promise<ArchiveResult> {
  const sink = createArchive();
  const entries: ArchiveEntry[] = [];
  const warnings: string[] = [];
  const taken = new Set<string>();

  for (const group of groups) {
    if (group.pages.length === 0) continue;

    const wanted = formatFileName(group.key);
    const fileName = uniqueFileName(wanted, taken);
    if (fileName !== wanted) {
      warnings.push(`Group ${group.key} written as ${fileName} (${wanted} already used)`);
    }
    taken.add(fileName);

    let bytes: Uint8Array;
    try {
      bytes = await source.writePages(group.pages);
    } catch (err) {
      throw new SerializationError(
        `Failed to write ${fileName} for group ${group.key}: ${errorMessage(err)}`,
        { cause: err, groupKey: group.key },
      );
    }

    sink.add(fileName, bytes);
    entries.push({ fileName, key: group.key, pages: [...group.pages] });
  }

  let archive: Uint8Array;
  try {
    archive = await sink.finish();
  } catch (err) {
    throw new SerializationError(`Failed to write archive: ${errorMessage(err)}`, { cause: err });
  }

  return { bytes: archive, entries, warnings };
}
