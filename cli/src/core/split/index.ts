/**
 * Page-keyed PDF splitting (Call List by Depot ID, Group List by Shipping Point).
 *
 * Usage:
 *   import { splitDocument, findVariant, ... } from '../core/split/index.js';
 */

export { UNKNOWN } from './types.js';
export { extractDepotId, extractShippingPoint, matchFirst, keyOf, DEPOT_ID_RULES, SHIPPING_POINT_RULES } from './extract.js';
export type { KeyRule } from './extract.js';
export { depotFileName, shippingPointFileName, uniqueFileName } from './filename.js';
export { groupPages, groupedPageCount, GroupTable } from './group.js';
export type { GroupPagesOptions } from './group.js';
export { buildArchive } from './archive.js';
export { splitDocument, readPageTexts } from './run.js';
export type { SplitDeps } from './run.js';
export { CALL_LIST, GROUP_LIST, VARIANTS, findVariant } from './variants.js';
export { SplitInputError, NoGroupsProducedError, SerializationError, errorMessage } from './errors.js';
export { formatPageLine, printSplitHeader, printSplitResult, splitResultJson } from './format.js';
export type {
  ClassificationKey,
  ExtractResult,
  Extractor,
  KeyFormatter,
  UnknownPolicy,
  PageText,
  PageAssignment,
  Reattribution,
  GroupingDiagnostics,
  PageGroup,
  GroupingResult,
  DocumentSource,
  OpenDocument,
  ArchiveSink,
  CreateArchive,
  VariantId,
  SplitVariant,
  ArchiveEntry,
  ArchiveResult,
  SplitOutcome,
} from './types.js';
