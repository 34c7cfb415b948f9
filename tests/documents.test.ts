import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceDocuments, loadPageSequence } from '../src/lib/pdf/documents';
import { makeTempDir, writePdf } from './helpers/fixtures';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('SourceDocuments', () => {
  it('flattens pages in document order then page order', async () => {
    const first = await writePdf(dir, 'first.pdf', [
      [100, 200],
      [300, 400],
    ]);
    const second = await writePdf(dir, 'second.pdf', [[500, 600]]);

    const documents = new SourceDocuments();
    const pages = await loadPageSequence(documents, [first, second]);

    expect(documents.size).toBe(2);
    expect(pages.map(({ source, index, width, height }) => ({ source, index, width, height }))).toEqual([
      { source: first, index: 0, width: 100, height: 200 },
      { source: first, index: 1, width: 300, height: 400 },
      { source: second, index: 0, width: 500, height: 600 },
    ]);
  });

  it('enumerates the same pages again on request', async () => {
    const file = await writePdf(dir, 'one.pdf', [[100, 100]]);
    const documents = new SourceDocuments();
    await documents.open(file);

    expect(documents.pages().map((ref) => ref.page)).toEqual(documents.pages().map((ref) => ref.page));
  });

  it('reports a missing file as not found', async () => {
    const missing = path.join(dir, 'missing.pdf');

    await expect(new SourceDocuments().open(missing)).rejects.toMatchObject({
      kind: 'NotFound',
      message: `Input file not found: ${missing}`,
    });
  });

  it('reports bytes that are not a PDF as not found', async () => {
    const broken = path.join(dir, 'broken.pdf');
    await writeFile(broken, 'definitely not a pdf');

    await expect(new SourceDocuments().open(broken)).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('fails with empty input when no document has pages', async () => {
    const a = await writePdf(dir, 'a.pdf', []);
    const b = await writePdf(dir, 'b.pdf', []);

    await expect(loadPageSequence(new SourceDocuments(), [a, b])).rejects.toMatchObject({
      kind: 'EmptyInput',
      message: 'No PDF pages found in the provided inputs.',
    });
  });

  it('drops every document on release and refuses to open more', async () => {
    const file = await writePdf(dir, 'one.pdf', [[100, 100]]);
    const documents = new SourceDocuments();
    await documents.open(file);

    documents.release();

    expect(documents.size).toBe(0);
    expect(documents.pages()).toEqual([]);
    await expect(documents.open(file)).rejects.toThrow('Source documents were already released.');
  });
});
