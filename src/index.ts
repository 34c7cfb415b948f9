export { MergeError, isMergeError, type MergeErrorKind } from './lib/errors';
export {
  cellForIndex,
  orientDimensions,
  placePage,
  planSheet,
  planSheets,
  resolveGrid,
  toMatrix,
} from './lib/layout';
export { mergePdfs } from './lib/merge';
export { copyLinear, mergePageOntoPage, renderSheets } from './lib/pdf/compose';
export { SourceDocuments, loadPageSequence } from './lib/pdf/documents';
export { resolveSources, scanPdfDirectory } from './lib/sources';
export type * from './types/merge';
