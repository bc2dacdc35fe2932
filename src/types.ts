export const TRANSFORM_MODES = ['crop', 'crop-top', 'crop-bottom', 'fit', 'fit-x', 'fit-y'] as const;
export type TransformMode = (typeof TRANSFORM_MODES)[number];

export const CROP_MODES: readonly TransformMode[] = ['crop', 'crop-top', 'crop-bottom'];

// Formats a derivative can be written as. "jpg" is accepted as an alias of "jpeg".
export const OUTPUT_FORMATS = ['gif', 'jpeg', 'jpg', 'png', 'webp'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const SUPPORTED_MIME_TYPES = ['image/gif', 'image/jpeg', 'image/png', 'image/webp'] as const;
export type SupportedMime = (typeof SUPPORTED_MIME_TYPES)[number];

export interface TransformRequest {
  sourcePath: string;
  width: number;
  height: number;
  mode: TransformMode;
  quality: number;
  // As requested; checked against OUTPUT_FORMATS when the derivative is built
  format: string | null;
}

/**
 * Per-attempt state threaded through path building, codec work and the
 * error fallback. `stage` records whether this is the caller's image or the
 * configured error image.
 */
export interface TransformContext extends TransformRequest {
  stage: 'original' | 'fallback';
}

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TransformSpec {
  renderWidth: number;
  renderHeight: number;
  cropRect?: CropRect;
}

export interface ImageMetadata {
  width: number;
  height: number;
  format: string;
  mime: string;
  size: number;
  orientation: number;
  hasAlpha: boolean;
}

export interface ResolveOutcome {
  path: string | null;
  errors: string[];
}

// Jobs delivered through the QStash webhook
export type DerivativeJob =
  | {
      action: 'resolve';
      path: string;
      width: number;
      height: number;
      mode: string;
      quality?: number;
      format?: string | null;
    }
  | {
      action: 'delete';
      path: string;
    };

export function isTransformMode(value: unknown): value is TransformMode {
  return typeof value === 'string' && TRANSFORM_MODES.some(mode => mode === value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some(format => format === value);
}

export function isSupportedMime(value: string): value is SupportedMime {
  return SUPPORTED_MIME_TYPES.some(mime => mime === value);
}
