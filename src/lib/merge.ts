import { writeFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';
import type { MergeOptions, MergeRequest, MergeResult } from '../types/merge';
import { MergeError } from './errors';
import { planSheets, resolveGrid } from './layout';
import { copyLinear, renderSheets } from './pdf/compose';
import { SourceDocuments, loadPageSequence } from './pdf/documents';
import { resolveSources } from './sources';

async function writeOutput(outputPath: string, bytes: Uint8Array, overwrite: boolean) {
  try {
    await writeFile(outputPath, bytes, { flag: overwrite ? 'w' : 'wx' });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new MergeError(
        'AlreadyExists',
        `Output file already exists: ${outputPath} (use --overwrite to replace it).`,
        { cause: error },
      );
    }
    throw error;
  }
}

/**
 * Runs a whole merge: validates every input, composes the output in memory and
 * writes it once. Nothing is written when any step before the write fails.
 */
export async function mergePdfs(request: MergeRequest, options: MergeOptions = {}): Promise<MergeResult> {
  const { inputPaths, outputPath } = await resolveSources(request);
  const grid = resolveGrid(request);

  const documents = new SourceDocuments();
  try {
    const pages = await loadPageSequence(documents, inputPaths);
    const output = await PDFDocument.create();

    if (grid.pagesPerSheet === 1) {
      await copyLinear(output, pages, options);
    } else {
      await renderSheets(output, planSheets(pages, grid), options);
    }

    const bytes = await output.save();
    await writeOutput(outputPath, bytes, request.overwrite);

    return {
      outputPath,
      inputCount: inputPaths.length,
      pageCount: pages.length,
      sheetCount: output.getPageCount(),
      grid,
    };
  } finally {
    documents.release();
  }
}
