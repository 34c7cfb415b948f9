import {
  type PDFDocument,
  concatTransformationMatrix,
  drawObject,
  popGraphicsState,
  pushGraphicsState,
  type PDFEmbeddedPage,
  type PDFPage,
} from 'pdf-lib';
import type { MergeOptions, PageRef, SheetPlan, TransformMatrix } from '../../types/merge';
import { toMatrix } from '../layout';

/**
 * Draws `source` onto `dest` under `matrix`. This is the only place a sheet's
 * content is mutated.
 */
export function mergePageOntoPage(dest: PDFPage, source: PDFEmbeddedPage, matrix: TransformMatrix) {
  const xObjectKey = dest.node.newXObject('EmbeddedPdfPage', source.ref);
  dest.pushOperators(
    pushGraphicsState(),
    concatTransformationMatrix(...matrix),
    drawObject(xObjectKey),
    popGraphicsState(),
  );
}

/**
 * Pass-through for one page per sheet: pages are copied unscaled. Runs of pages
 * from the same document go through a single `copyPages` call.
 */
export async function copyLinear(output: PDFDocument, pages: PageRef[], options: MergeOptions = {}) {
  let processed = 0;
  let start = 0;

  while (start < pages.length) {
    const source = pages[start].page.doc;
    let end = start + 1;
    while (end < pages.length && pages[end].page.doc === source) {
      end += 1;
    }

    const indices = pages.slice(start, end).map((ref) => ref.index);
    const copiedPages = await output.copyPages(source, indices);
    copiedPages.forEach((page) => {
      output.addPage(page);
      processed += 1;
      options.onProgress?.(processed, pages.length);
    });

    start = end;
  }
}

export async function renderSheets(
  output: PDFDocument,
  plans: SheetPlan<PageRef>[],
  options: MergeOptions = {},
) {
  let processed = 0;

  for (const plan of plans) {
    const sheet = output.addPage([plan.width, plan.height]);

    for (const placement of plan.placements) {
      // A page without a content stream is blank and cannot be embedded.
      if (!placement.page.page.node.Contents()) {
        continue;
      }
      const embedded = await output.embedPage(placement.page.page);
      mergePageOntoPage(sheet, embedded, toMatrix(placement.transform));
    }

    processed += 1;
    options.onProgress?.(processed, plans.length);
  }
}
