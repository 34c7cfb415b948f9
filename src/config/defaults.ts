/**
 * Defaults for a merge run.
 * Change these here rather than at the call sites.
 */

import type { Orientation } from '../types/merge';

export const DEFAULT_PAGES_PER_SHEET = 1;

export const DEFAULT_ORIENTATION: Orientation = 'portrait';

export const ORIENTATIONS: { value: Orientation; label: string }[] = [
  { value: 'portrait', label: 'Portrait (taller grid, fills column by column)' },
  { value: 'landscape', label: 'Landscape (wider grid, fills row by row)' },
];

export const PDF_EXTENSION = '.pdf';

/**
 * A merge needs at least this many input files, counting directory and explicit inputs together.
 */
export const MIN_INPUT_FILES = 2;
