export type ImageErrorKind =
  | 'invalid_input'
  | 'unsupported_format'
  | 'decode_failure'
  | 'encode_failure'
  | 'directory_create'
  | 'invalid_request';

// Kinds the orchestrator answers with the error image instead of throwing
const RECOVERABLE: readonly ImageErrorKind[] = [
  'invalid_input',
  'unsupported_format',
  'decode_failure',
  'encode_failure',
];

export class ImageError extends Error {
  readonly kind: ImageErrorKind;

  constructor(kind: ImageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageError';
    this.kind = kind;
  }

  get recoverable(): boolean {
    return RECOVERABLE.includes(this.kind);
  }
}

export function isImageError(error: unknown): error is ImageError {
  return error instanceof ImageError;
}
