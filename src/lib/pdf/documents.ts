import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';
import type { PageRef } from '../../types/merge';
import { MergeError, describeError } from '../errors';

type LoadedSource = {
  path: string;
  document: PDFDocument;
};

/**
 * Owns every source document of a run. Page refs point into these documents,
 * so the collection has to stay alive until the output has been written.
 */
export class SourceDocuments {
  private sources: LoadedSource[] = [];
  private released = false;

  get size(): number {
    return this.sources.length;
  }

  async open(path: string): Promise<PDFDocument> {
    if (this.released) {
      throw new Error('Source documents were already released.');
    }

    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new MergeError('NotFound', `Input file not found: ${path}`, { cause: error });
    }

    let document: PDFDocument;
    try {
      document = await PDFDocument.load(bytes);
    } catch (error) {
      throw new MergeError('NotFound', `Unable to open PDF: ${path} (${describeError(error)})`, {
        cause: error,
      });
    }

    this.sources.push({ path, document });
    return document;
  }

  /**
   * Every page of every opened document, in document order then stored page order.
   */
  pages(): PageRef[] {
    return this.sources.flatMap(({ path, document }) =>
      document.getPages().map((page, index) => {
        const { width, height } = page.getSize();
        return { source: path, index, page, width, height };
      }),
    );
  }

  release() {
    this.sources = [];
    this.released = true;
  }
}

export async function loadPageSequence(documents: SourceDocuments, paths: string[]): Promise<PageRef[]> {
  for (const path of paths) {
    await documents.open(path);
  }

  const pages = documents.pages();
  if (pages.length === 0) {
    throw new MergeError('EmptyInput', 'No PDF pages found in the provided inputs.');
  }
  return pages;
}
