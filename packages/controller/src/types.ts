import type { ImageComponentError } from '@lazy-image/common';
import type { ControllerEvent, LoadAttempt, LoadOutcome, LoadState } from '@lazy-image/contracts';

export interface ObserveOptions {
  rootMargin: string;
  threshold: number;
}

/**
 * A live visibility registration. Releasing twice is harmless.
 */
export interface VisibilitySubscription {
  release(): void;
}

/**
 * Host visibility primitive (IntersectionObserver in a browser).
 */
export interface VisibilityObserver<E extends object> {
  observe(
    element: E,
    options: ObserveOptions,
    onSignal: (isIntersecting: boolean) => void
  ): VisibilitySubscription;
}

export type ReportOutcome = (outcome: LoadOutcome) => void;

/**
 * Starts loading a source for an element. The outcome goes back through `report`,
 * exactly once, at any later time.
 */
export interface LoadIssuer<E extends object> {
  issue(attempt: LoadAttempt, element: E, report: ReportOutcome): void;
}

export interface ControllerHandle<E extends object> {
  readonly id: string;
  readonly element: E;
}

export interface ControllerCallbacks {
  onLoad?: () => void;
  onError?: (reason: string, error: ImageComponentError) => void;
  onStateChange?: (state: LoadState) => void;
}

export interface LoadControllerOptions<E extends object> {
  observer: VisibilityObserver<E>;
  issuer: LoadIssuer<E>;
  threshold?: number;
  defaultLazyBoundary?: string;
  onEvent?: (event: ControllerEvent) => void;
}
