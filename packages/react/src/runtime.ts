import { createLogger, env, EnvConfig, validateEnv } from '@lazy-image/common';
import { LoadAttempt } from '@lazy-image/contracts';
import {
  IntersectionVisibilityObserver,
  LoadController,
  LoadIssuer,
  ReportOutcome,
  VisibilityObserver
} from '@lazy-image/controller';

const logger = createLogger('react-runtime');

type SourceListener = (source: string) => void;

/**
 * Issues loads by handing the source to whichever component rendered the element.
 * The component's `<img onLoad/onError>` reports the outcome back to the controller.
 */
export class RenderSourceIssuer implements LoadIssuer<Element> {
  private listeners = new Map<Element, SourceListener>();

  bind(element: Element, listener: SourceListener): () => void {
    this.listeners.set(element, listener);
    return () => {
      if (this.listeners.get(element) === listener) {
        this.listeners.delete(element);
      }
    };
  }

  issue(attempt: LoadAttempt, element: Element, report: ReportOutcome): void {
    const listener = this.listeners.get(element);
    if (!listener) {
      logger.warn('No renderer bound for element', { handleId: attempt.handleId, source: attempt.source });
      report({ kind: 'failure', reason: `No renderer bound to display ${attempt.source}` });
      return;
    }
    listener(attempt.source);
  }
}

export interface ImageRuntime {
  controller: LoadController<Element>;
  renderer: RenderSourceIssuer;
}

export interface ImageRuntimeOptions {
  observer?: VisibilityObserver<Element>;
  threshold?: number;
  config?: EnvConfig;
}

/**
 * Builds a controller over the browser's IntersectionObserver by default.
 * Throws when the configuration is invalid.
 */
export function createImageRuntime(options: ImageRuntimeOptions = {}): ImageRuntime {
  const config = options.config ?? env;
  validateEnv(config);

  const renderer = new RenderSourceIssuer();
  const controller = new LoadController<Element>({
    observer: options.observer ?? new IntersectionVisibilityObserver(),
    issuer: renderer,
    threshold: options.threshold ?? config.IMAGE_VISIBILITY_THRESHOLD,
    defaultLazyBoundary: config.IMAGE_LAZY_BOUNDARY
  });
  return { controller, renderer };
}

let defaultRuntime: ImageRuntime | undefined;

export function getDefaultRuntime(): ImageRuntime {
  if (!defaultRuntime) {
    defaultRuntime = createImageRuntime();
  }
  return defaultRuntime;
}
