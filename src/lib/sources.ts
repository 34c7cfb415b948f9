import { readdir, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import { MIN_INPUT_FILES, PDF_EXTENSION } from '../config/defaults';
import { MergeError } from './errors';

export type SourceRequest = {
  inputs: string[];
  inputDir?: string;
  output: string;
  overwrite: boolean;
};

export type ResolvedSources = {
  inputPaths: string[];
  outputPath: string;
};

/**
 * Expands a leading `~` and resolves against the working directory.
 */
export function resolveUserPath(raw: string): string {
  if (raw === '~') {
    return homedir();
  }
  if (raw.startsWith('~/') || raw.startsWith(`~${path.sep}`)) {
    return path.resolve(homedir(), raw.slice(2));
  }
  return path.resolve(raw);
}

async function statOrUndefined(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function isPdfPath(target: string): boolean {
  return path.extname(target).toLowerCase() === PDF_EXTENSION;
}

/**
 * PDF files directly inside `directory`, sorted case-insensitively by name,
 * without `excludePath`.
 */
export async function scanPdfDirectory(directory: string, excludePath?: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && isPdfPath(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => {
      const left = a.toLowerCase();
      const right = b.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .map((name) => path.join(directory, name))
    .filter((file) => file !== excludePath);
}

export async function resolveSources({ inputs, inputDir, output, overwrite }: SourceRequest): Promise<ResolvedSources> {
  const outputPath = resolveUserPath(output);
  if ((await statOrUndefined(outputPath)) && !overwrite) {
    throw new MergeError(
      'AlreadyExists',
      `Output file already exists: ${outputPath} (use --overwrite to replace it).`,
    );
  }

  const outputDir = path.dirname(outputPath);
  if (!(await statOrUndefined(outputDir))?.isDirectory()) {
    throw new MergeError('NotFound', `Output directory does not exist: ${outputDir}`);
  }

  const inputPaths: string[] = [];

  if (inputDir !== undefined) {
    const directory = resolveUserPath(inputDir);
    if (!(await statOrUndefined(directory))?.isDirectory()) {
      throw new MergeError('NotFound', `Input directory does not exist: ${directory}`);
    }

    const directoryPdfs = await scanPdfDirectory(directory, outputPath);
    if (directoryPdfs.length === 0) {
      throw new MergeError('NotFound', `No PDF files found in directory: ${directory}`);
    }
    inputPaths.push(...directoryPdfs);
  }

  for (const raw of inputs) {
    const file = resolveUserPath(raw);
    if (!(await statOrUndefined(file))?.isFile()) {
      throw new MergeError('NotFound', `Input file not found: ${file}`);
    }
    if (!isPdfPath(file)) {
      throw new MergeError('InvalidArgument', `Input file is not a PDF: ${file}`);
    }
    inputPaths.push(file);
  }

  if (inputPaths.length < MIN_INPUT_FILES) {
    throw new MergeError('InvalidArgument', 'Provide at least two PDF files via arguments or --input-dir.');
  }

  return { inputPaths, outputPath };
}
