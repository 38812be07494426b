import {
  ImageRequest,
  LoadSnapshot,
  PLACEHOLDER_BLUR,
  PLACEHOLDER_EMPTY
} from '@lazy-image/contracts';

export type PaintTarget =
  | { kind: 'placeholder'; placeholder: 'empty' }
  | { kind: 'placeholder'; placeholder: 'blur' | 'image'; src: string }
  | { kind: 'image'; src: string; isFallback: boolean }
  | { kind: 'broken' };

function placeholderFor(request: ImageRequest): PaintTarget {
  if (request.placeholder === PLACEHOLDER_BLUR && request.blurDataUrl) {
    return { kind: 'placeholder', placeholder: 'blur', src: request.blurDataUrl };
  }
  if (request.placeholder === PLACEHOLDER_EMPTY || request.placeholder === PLACEHOLDER_BLUR) {
    return { kind: 'placeholder', placeholder: 'empty' };
  }
  return { kind: 'placeholder', placeholder: 'image', src: request.placeholder };
}

/**
 * What the render layer should paint for the current load state.
 */
export function resolvePaint(
  request: ImageRequest,
  snapshot: Pick<LoadSnapshot, 'state' | 'currentSource'>
): PaintTarget {
  switch (snapshot.state) {
    case 'loaded': {
      const src = snapshot.currentSource ?? request.primarySource;
      return { kind: 'image', src, isFallback: src === request.fallbackSource };
    }
    case 'failed':
      return { kind: 'broken' };
    default:
      return placeholderFor(request);
  }
}
