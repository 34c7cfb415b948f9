import minimist from 'minimist';
import { z } from 'zod';
import { DEFAULT_ORIENTATION, ORIENTATIONS } from '../config/defaults';
import { MergeError } from '../lib/errors';
import { GRID_MESSAGES } from '../lib/layout';
import type { MergeRequest } from '../types/merge';

export const USAGE = `Merge multiple PDF files into a single PDF in the given order.

Usage:
  pdf-nup-merge -o <output.pdf> [inputs...] [options]

Options:
  -o, --output <file>            Output PDF file path (required)
  --input-dir <dir>              Merge every PDF in <dir>, sorted by file name, before the explicit inputs
  --pages-per-sheet <n>          Original pages placed on each output page (default: 1)
  --nup-rows <r>                 Rows per sheet (use together with --nup-cols)
  --nup-cols <c>                 Columns per sheet (use together with --nup-rows)
  --orientation <orientation>    ${ORIENTATIONS.map(({ value, label }) => `${value}: ${label}`).join('; ')}
                                 (default: ${DEFAULT_ORIENTATION}; only applies with more than one page per sheet)
  --overwrite                    Replace the output file if it already exists
  --verbose                      Report progress while composing
  -h, --help                     Show this help message`;

const integerFlag = (message: string) =>
  z
    .string({ invalid_type_error: message })
    .trim()
    .regex(/^\+?\d+$/, message)
    .transform(Number)
    .optional();

const cliSchema = z.object({
  inputs: z.array(z.string()),
  output: z
    .string({ required_error: '--output is required.', invalid_type_error: '--output must be given once.' })
    .min(1, '--output is required.'),
  inputDir: z
    .string({ invalid_type_error: '--input-dir must be given once.' })
    .min(1, '--input-dir must not be empty.')
    .optional(),
  pagesPerSheet: integerFlag(GRID_MESSAGES.pagesPerSheet),
  rows: integerFlag(GRID_MESSAGES.rows),
  cols: integerFlag(GRID_MESSAGES.cols),
  orientation: z
    .enum(['portrait', 'landscape'], {
      errorMap: () => ({
        message: `--orientation must be one of: ${ORIENTATIONS.map(({ value }) => value).join(', ')}.`,
      }),
    })
    .default(DEFAULT_ORIENTATION),
  overwrite: z.boolean(),
  verbose: z.boolean(),
});

const NUMERIC_FLAGS = new Set(['--pages-per-sheet', '--nup-rows', '--nup-cols']);

/**
 * minimist reads a value such as `-2` as a flag of its own, so a numeric flag
 * and the negative number after it are joined into `--flag=-2`.
 */
function joinNegativeValues(argv: string[]): string[] {
  const joined: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      joined.push(...argv.slice(i));
      break;
    }

    const next = argv[i + 1];
    if (NUMERIC_FLAGS.has(arg) && next !== undefined && /^-\d/.test(next)) {
      joined.push(`${arg}=${next}`);
      i += 1;
    } else {
      joined.push(arg);
    }
  }
  return joined;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'merge'; request: MergeRequest; verbose: boolean };

export function parseCliArgs(argv: string[]): CliCommand {
  const unknownFlags: string[] = [];
  const args = minimist(joinNegativeValues(argv), {
    string: ['_', 'output', 'input-dir', 'pages-per-sheet', 'nup-rows', 'nup-cols', 'orientation'],
    boolean: ['overwrite', 'verbose', 'help'],
    alias: { o: 'output', h: 'help' },
    unknown: (arg) => {
      if (arg.startsWith('-')) {
        unknownFlags.push(arg);
        return false;
      }
      return true;
    },
  });

  if (args.help === true) {
    return { kind: 'help' };
  }

  if (unknownFlags.length > 0) {
    throw new MergeError('InvalidArgument', `Unknown option: ${unknownFlags[0]}`);
  }

  const parsed = cliSchema.safeParse({
    inputs: args._,
    output: args.output,
    inputDir: args['input-dir'],
    pagesPerSheet: args['pages-per-sheet'],
    rows: args['nup-rows'],
    cols: args['nup-cols'],
    orientation: args.orientation,
    overwrite: args.overwrite,
    verbose: args.verbose,
  });

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new MergeError('InvalidArgument', issue?.message ?? 'Invalid arguments.');
  }

  const { verbose, ...request } = parsed.data;
  return { kind: 'merge', request, verbose };
}
