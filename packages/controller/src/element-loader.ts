import { LoadAttempt } from '@lazy-image/contracts';
import { LoadIssuer, ReportOutcome } from './types';

// Anything with a writable `src` that fires `load` / `error`, e.g. HTMLImageElement
export interface LoadableImage extends EventTarget {
  src: string;
}

/**
 * Render collaborator: swaps the element's `src` and reports the first
 * `load` or `error` event it fires for that swap.
 */
export class ElementSourceLoader implements LoadIssuer<LoadableImage> {
  issue(attempt: LoadAttempt, element: LoadableImage, report: ReportOutcome): void {
    function cleanup() {
      element.removeEventListener('load', handleLoad);
      element.removeEventListener('error', handleError);
    }

    function handleLoad() {
      cleanup();
      report({ kind: 'success' });
    }

    function handleError() {
      cleanup();
      report({ kind: 'failure', reason: `Image element failed to load ${attempt.source}` });
    }

    element.addEventListener('load', handleLoad);
    element.addEventListener('error', handleError);
    element.src = attempt.source;
  }
}
