export type MergeErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InvalidArgument'
  | 'EmptyInput'
  | 'InvalidGeometry';

export class MergeError extends Error {
  readonly kind: MergeErrorKind;

  constructor(kind: MergeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MergeError';
    this.kind = kind;
  }
}

export function isMergeError(error: unknown): error is MergeError {
  return error instanceof MergeError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
