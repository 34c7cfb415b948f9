import type { PDFPage } from 'pdf-lib';

export type Orientation = 'portrait' | 'landscape';

/**
 * Media box dimensions in PDF points.
 */
export type PageSize = {
  width: number;
  height: number;
};

/**
 * One page of one loaded source document. Only a view: the content stays in the
 * document that `SourceDocuments` holds until the run ends.
 */
export type PageRef = PageSize & {
  /** Absolute path of the file the page came from. */
  source: string;
  /** Zero-based index of the page in its document. */
  index: number;
  page: PDFPage;
};

export type GridSpec = {
  pagesPerSheet: number;
  rows: number;
  cols: number;
  orientation: Orientation;
};

export type GridRequest = {
  pagesPerSheet?: number;
  rows?: number;
  cols?: number;
  orientation: Orientation;
};

export type PlacementTransform = {
  scale: number;
  offsetX: number;
  offsetY: number;
};

/**
 * PDF matrix `[a b c d e f]`, mapping `(x, y)` to `(a*x + c*y + e, b*x + d*y + f)`.
 */
export type TransformMatrix = [number, number, number, number, number, number];

export type Placement<T extends PageSize = PageSize> = {
  page: T;
  col: number;
  rowFromTop: number;
  transform: PlacementTransform;
};

export type SheetPlan<T extends PageSize = PageSize> = {
  width: number;
  height: number;
  placements: Placement<T>[];
};

export type MergeRequest = {
  /** Explicit input files, appended after any directory inputs. */
  inputs: string[];
  inputDir?: string;
  output: string;
  pagesPerSheet?: number;
  rows?: number;
  cols?: number;
  orientation: Orientation;
  overwrite: boolean;
};

export type MergeResult = {
  outputPath: string;
  inputCount: number;
  pageCount: number;
  sheetCount: number;
  grid: GridSpec;
};

export interface MergeOptions {
  onProgress?: (completed: number, total: number) => void;
}
