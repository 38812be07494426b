/**
 * Visibility source backed by the IntersectionObserver Web API.
 *
 * Each observation gets its own IntersectionObserver because the root margin
 * (the lazy boundary) is per request.
 */

import { createLogger } from '@lazy-image/common';
import { ObserveOptions, VisibilityObserver, VisibilitySubscription } from './types';

const logger = createLogger('intersection-observer');

export interface IntersectionObserverLike {
  observe(target: Element): void;
  disconnect(): void;
}

export type IntersectionObserverFactory = (
  callback: IntersectionObserverCallback,
  init: IntersectionObserverInit
) => IntersectionObserverLike;

function browserFactory(): IntersectionObserverFactory | undefined {
  if (typeof IntersectionObserver === 'undefined') {
    return undefined;
  }
  return (callback, init) => new IntersectionObserver(callback, init);
}

export class IntersectionVisibilityObserver implements VisibilityObserver<Element> {
  private readonly factory?: IntersectionObserverFactory;

  constructor(options: { factory?: IntersectionObserverFactory } = {}) {
    this.factory = options.factory ?? browserFactory();
  }

  observe(
    element: Element,
    options: ObserveOptions,
    onSignal: (isIntersecting: boolean) => void
  ): VisibilitySubscription {
    let released = false;

    if (!this.factory) {
      // No observer support: treat the element as visible and load it
      logger.debug('IntersectionObserver unavailable, signalling visible');
      queueMicrotask(() => {
        if (!released) onSignal(true);
      });
      return { release: () => { released = true; } };
    }

    const observer = this.factory(
      entries => {
        entries.forEach(entry => {
          if (!released && entry.target === element) {
            onSignal(entry.isIntersecting);
          }
        });
      },
      { rootMargin: options.rootMargin, threshold: options.threshold }
    );
    observer.observe(element);

    return {
      release: () => {
        if (released) return;
        released = true;
        observer.disconnect();
      }
    };
  }
}
