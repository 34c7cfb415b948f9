import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PDFDocument, rgb } from 'pdf-lib';

type FixtureOptions = {
  /** Leave the pages without a content stream. */
  blank?: boolean;
};

export async function createPdfBytes(
  sizes: Array<[number, number]>,
  { blank = false }: FixtureOptions = {},
): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  sizes.forEach(([width, height]) => {
    const page = doc.addPage([width, height]);
    if (!blank) {
      page.drawRectangle({ x: 0, y: 0, width: width / 2, height: height / 2, color: rgb(0.2, 0.2, 0.2) });
    }
  });
  return doc.save({ addDefaultPage: false });
}

export async function writePdf(
  dir: string,
  name: string,
  sizes: Array<[number, number]>,
  options?: FixtureOptions,
): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, await createPdfBytes(sizes, options));
  return file;
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'pdf-nup-merge-'));
}

export async function pageSizes(bytes: Uint8Array): Promise<Array<[number, number]>> {
  const doc = await PDFDocument.load(bytes);
  return doc.getPages().map((page) => {
    const { width, height } = page.getSize();
    return [width, height];
  });
}
