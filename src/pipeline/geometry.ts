import { ImageError } from '../errors.js';
import { TransformMode, TransformSpec } from '../types.js';

interface Size {
  width: number;
  height: number;
}

/**
 * Compute the render size (and, for the crop modes, the crop rectangle inside
 * the render) for an image of `origWidth`×`origHeight` requested at
 * `width`×`height`.
 *
 * Candidate sizes round up so a crop box is never under-covered; the
 * no-stretch branches of fit-x and fit-y round to nearest instead.
 */
export function computeTransform(
  origWidth: number,
  origHeight: number,
  width: number,
  height: number,
  mode: TransformMode
): TransformSpec {
  switch (mode) {
    case 'crop':
    case 'crop-top':
    case 'crop-bottom': {
      const cover = coverSize(origWidth, origHeight, width, height);
      return {
        renderWidth: cover.width,
        renderHeight: cover.height,
        cropRect: {
          x: cover.width / 2 - width / 2,
          y: cropOriginY(mode, cover.height, height),
          width,
          height,
        },
      };
    }

    case 'fit': {
      const size = fitSize(origWidth, origHeight, width, height);
      return { renderWidth: size.width, renderHeight: size.height };
    }

    case 'fit-x': {
      const scaledHeight = Math.max(1, scaledSide(origHeight, width, origWidth, Math.round));

      // Don't stretch if smaller
      if (origHeight <= scaledHeight) {
        return { renderWidth: origWidth, renderHeight: origHeight };
      }
      return { renderWidth: width, renderHeight: scaledHeight };
    }

    case 'fit-y': {
      const scaledWidth = Math.max(1, scaledSide(origWidth, height, origHeight, Math.round));

      if (origWidth <= scaledWidth) {
        return { renderWidth: origWidth, renderHeight: origHeight };
      }
      return { renderWidth: scaledWidth, renderHeight: height };
    }

    default:
      return assertNever(mode);
  }
}

// Multiply before dividing so whole-number results stay exact under ceil
function scaledSide(
  side: number,
  target: number,
  base: number,
  round: (value: number) => number = Math.ceil
): number {
  return base > 0 ? round((side * target) / base) : 0;
}

/**
 * Intermediate size that fully covers the `width`×`height` box before the
 * crop is taken.
 */
export function coverSize(origWidth: number, origHeight: number, width: number, height: number): Size {
  let size: Size;
  if (origWidth > origHeight) {
    // Wide
    size = { width: scaledSide(origWidth, height, origHeight), height };
  } else if (origHeight > origWidth) {
    // Tall
    size = { width, height: scaledSide(origHeight, width, origWidth) };
  } else {
    size = { width, height: width };
  }

  // A render narrower than the box would leave empty columns after the crop
  if (size.width < width) {
    size = { width, height: scaledSide(origHeight, width, origWidth) };
  }

  // Same for rows, when the box is taller than the image's aspect
  if (size.height < height) {
    size = { width: scaledSide(origWidth, height, origHeight), height };
  }

  return size;
}

export function fitSize(origWidth: number, origHeight: number, maxWidth: number, maxHeight: number): Size {
  if (origWidth <= maxWidth && origHeight <= maxHeight) {
    return { width: origWidth, height: origHeight };
  }

  // Wider rather than taller
  if (maxWidth * origHeight < maxHeight * origWidth) {
    return { width: maxWidth, height: scaledSide(origHeight, maxWidth, origWidth) };
  }

  return { width: scaledSide(origWidth, maxHeight, origHeight), height: maxHeight };
}

function cropOriginY(mode: 'crop' | 'crop-top' | 'crop-bottom', renderHeight: number, height: number): number {
  switch (mode) {
    case 'crop-top':
      return 0;
    case 'crop-bottom':
      return renderHeight - height;
    case 'crop':
      return renderHeight / 2 - height / 2;
  }
}

function assertNever(mode: never): never {
  throw new ImageError('invalid_request', `Invalid mode: ${String(mode)}`);
}
