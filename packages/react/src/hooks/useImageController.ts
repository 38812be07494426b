/**
 * useImageController
 * ==================
 *
 * Binds a rendered `<img>` to the load controller.
 *
 * - Mount initializes the controller with the element behind `ref`
 * - Unmount (or a changed request) tears it down
 * - `src` follows the attempts the controller issues (primary, then fallback)
 * - `handleLoad` / `handleError` go on the `<img>` and report the outcome
 */

import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { RefObject } from 'react';
import { ImageRequestInput, ImageRequestSchema, LoadState } from '@lazy-image/contracts';
import { ControllerHandle, PaintTarget, resolvePaint } from '@lazy-image/controller';
import { getDefaultRuntime, ImageRuntime } from '../runtime';

export interface UseImageControllerOptions {
  runtime?: ImageRuntime;
  onLoad?: () => void;
  onError?: (reason: string) => void;
}

export interface UseImageControllerResult {
  ref: RefObject<HTMLImageElement>;
  state: LoadState;
  src?: string;
  paint?: PaintTarget;
  handleLoad: () => void;
  handleError: () => void;
}

export function useImageController(
  request: ImageRequestInput,
  options: UseImageControllerOptions = {}
): UseImageControllerResult {
  const runtime = options.runtime ?? getDefaultRuntime();
  const { primarySource, fallbackSource, placeholder, blurDataUrl, loading, lazyBoundary } = request;

  const ref = useRef<HTMLImageElement>(null);
  const handleRef = useRef<ControllerHandle<Element>>();
  const [state, setState] = useState<LoadState>('idle');
  const [src, setSrc] = useState<string>();

  // Latest callbacks without re-initializing on every render
  const callbacksRef = useRef(options);
  callbacksRef.current = options;

  useEffect(() => {
    const element = ref.current;
    if (!element) return;

    const { controller, renderer } = runtime;
    setState('idle');
    setSrc(undefined);

    const unbind = renderer.bind(element, setSrc);
    const handle = controller.initialize(
      { primarySource, fallbackSource, placeholder, blurDataUrl, loading, lazyBoundary },
      element,
      {
        onStateChange: next => setState(next),
        onLoad: () => callbacksRef.current.onLoad?.(),
        onError: reason => callbacksRef.current.onError?.(reason)
      }
    );
    handleRef.current = handle;

    return () => {
      controller.teardown(handle);
      unbind();
      handleRef.current = undefined;
    };
  }, [runtime, primarySource, fallbackSource, placeholder, blurDataUrl, loading, lazyBoundary]);

  const handleLoad = useCallback(() => {
    const handle = handleRef.current;
    if (handle && src) {
      runtime.controller.onLoadResult(handle, { kind: 'success', source: src });
    }
  }, [runtime, src]);

  const handleError = useCallback(() => {
    const handle = handleRef.current;
    if (handle && src) {
      runtime.controller.onLoadResult(handle, {
        kind: 'failure',
        reason: `Image element failed to load ${src}`,
        source: src
      });
    }
  }, [runtime, src]);

  // Paint only reads the placeholder fields, so the default lazy boundary does not matter here
  const parsed = useMemo(
    () => ImageRequestSchema.safeParse({ primarySource, fallbackSource, placeholder, blurDataUrl, loading, lazyBoundary }),
    [primarySource, fallbackSource, placeholder, blurDataUrl, loading, lazyBoundary]
  );
  const paint = useMemo(
    () => (parsed.success ? resolvePaint(parsed.data, { state, currentSource: src }) : undefined),
    [parsed, state, src]
  );

  return { ref, state, src, paint, handleLoad, handleError };
}
