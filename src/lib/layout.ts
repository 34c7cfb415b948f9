import { DEFAULT_PAGES_PER_SHEET } from '../config/defaults';
import type {
  GridRequest,
  GridSpec,
  Orientation,
  PageSize,
  Placement,
  PlacementTransform,
  SheetPlan,
  TransformMatrix,
} from '../types/merge';
import { MergeError } from './errors';

export const GRID_MESSAGES = {
  pagesPerSheet: '--pages-per-sheet must be a positive integer.',
  rows: '`--nup-rows` must be a positive integer.',
  cols: '`--nup-cols` must be a positive integer.',
  rowsWithoutCols: '`--nup-rows` and `--nup-cols` must be used together.',
  countMismatch: '`--pages-per-sheet` must equal rows * cols when specifying both.',
} as const;

function ensurePositiveInt(value: number | undefined, message: string): number {
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    throw new MergeError('InvalidArgument', message);
  }
  return value;
}

/**
 * Resolves the grid for a run. With only a page count, the grid is as square as
 * possible, and portrait runs take the taller of the two shapes.
 */
export function resolveGrid({ pagesPerSheet, rows, cols, orientation }: GridRequest): GridSpec {
  if (rows === undefined && cols === undefined) {
    const count = ensurePositiveInt(
      pagesPerSheet ?? DEFAULT_PAGES_PER_SHEET,
      GRID_MESSAGES.pagesPerSheet,
    );
    let gridCols = Math.ceil(Math.sqrt(count));
    let gridRows = Math.ceil(count / gridCols);

    if (orientation === 'portrait' && count > 1 && gridRows < gridCols) {
      [gridRows, gridCols] = [gridCols, gridRows];
    }

    return { pagesPerSheet: count, rows: gridRows, cols: gridCols, orientation };
  }

  if (rows === undefined || cols === undefined) {
    throw new MergeError('InvalidArgument', GRID_MESSAGES.rowsWithoutCols);
  }

  const gridRows = ensurePositiveInt(rows, GRID_MESSAGES.rows);
  const gridCols = ensurePositiveInt(cols, GRID_MESSAGES.cols);

  if (pagesPerSheet === undefined) {
    return { pagesPerSheet: gridRows * gridCols, rows: gridRows, cols: gridCols, orientation };
  }

  const count = ensurePositiveInt(pagesPerSheet, GRID_MESSAGES.pagesPerSheet);
  if (count !== gridRows * gridCols) {
    throw new MergeError('InvalidArgument', GRID_MESSAGES.countMismatch);
  }

  return { pagesPerSheet: count, rows: gridRows, cols: gridCols, orientation };
}

export function orientDimensions(width: number, height: number, orientation: Orientation): PageSize {
  if (orientation === 'portrait') {
    return { width: Math.min(width, height), height: Math.max(width, height) };
  }
  return { width: Math.max(width, height), height: Math.min(width, height) };
}

/**
 * Grid cell for the page at `idx` within its sheet. Portrait sheets fill
 * column by column, top to bottom; landscape sheets fill row by row, left to right.
 */
export function cellForIndex(idx: number, grid: GridSpec): { col: number; rowFromTop: number } {
  if (grid.orientation === 'portrait') {
    return { col: Math.floor(idx / grid.rows), rowFromTop: idx % grid.rows };
  }
  return { col: idx % grid.cols, rowFromTop: Math.floor(idx / grid.cols) };
}

function assertGeometry(page: PageSize) {
  const valid = (value: number) => Number.isFinite(value) && value > 0;
  if (!valid(page.width) || !valid(page.height)) {
    throw new MergeError(
      'InvalidGeometry',
      `Cannot lay out a page of size ${page.width}x${page.height}.`,
    );
  }
}

/**
 * Scales `page` to fit a `cellWidth` x `cellHeight` cell and centers it there.
 * PDF origin is bottom-left, so the row is counted from the bottom.
 */
export function placePage(
  page: PageSize,
  cell: { col: number; rowFromTop: number },
  cellWidth: number,
  cellHeight: number,
  rows: number,
): PlacementTransform {
  const scale = Math.min(cellWidth / page.width, cellHeight / page.height);
  const rowFromBottom = rows - 1 - cell.rowFromTop;

  return {
    scale,
    offsetX: cell.col * cellWidth + (cellWidth - page.width * scale) / 2,
    offsetY: rowFromBottom * cellHeight + (cellHeight - page.height * scale) / 2,
  };
}

export function toMatrix({ scale, offsetX, offsetY }: PlacementTransform): TransformMatrix {
  return [scale, 0, 0, scale, offsetX, offsetY];
}

export function planSheet<T extends PageSize>(chunk: T[], grid: GridSpec): SheetPlan<T> {
  const [first] = chunk;
  if (!first) {
    throw new MergeError('EmptyInput', 'Cannot compose a sheet without pages.');
  }
  chunk.forEach(assertGeometry);

  const { width, height } = orientDimensions(first.width, first.height, grid.orientation);
  const cellWidth = width / grid.cols;
  const cellHeight = height / grid.rows;

  const placements: Placement<T>[] = chunk.map((page, idx) => {
    const cell = cellForIndex(idx, grid);
    return {
      page,
      ...cell,
      transform: placePage(page, cell, cellWidth, cellHeight, grid.rows),
    };
  });

  return { width, height, placements };
}

/**
 * Splits `pages` into chunks of `grid.pagesPerSheet` and plans one sheet per
 * chunk. Planning runs over every chunk before anything is drawn, so a bad page
 * anywhere aborts the run with no output.
 */
export function planSheets<T extends PageSize>(pages: T[], grid: GridSpec): SheetPlan<T>[] {
  const plans: SheetPlan<T>[] = [];
  for (let start = 0; start < pages.length; start += grid.pagesPerSheet) {
    plans.push(planSheet(pages.slice(start, start + grid.pagesPerSheet), grid));
  }
  return plans;
}
