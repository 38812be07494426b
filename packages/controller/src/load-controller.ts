/**
 * LoadController
 * ==============
 *
 * Decides when an element's image source starts loading, and swaps to the
 * fallback source when the primary fails.
 *
 *   idle -> pending -> loading -> loaded
 *                        |  \
 *                        |   -> loading (fallback, once) -> loaded | failed
 *                        -> failed
 *
 * Eager requests skip `pending`. Terminal states never change again, and a
 * torn-down handle ignores every further signal and result.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createLogger,
  env,
  toError,
  DuplicateRegistrationError,
  FallbackLoadFailure,
  ImageComponentError,
  InvalidRequestError,
  SourceLoadFailure
} from '@lazy-image/common';
import {
  createImageRequestSchema,
  isEager,
  isTerminal,
  AttemptKind,
  AttemptRecord,
  ControllerEvent,
  ImageRequest,
  ImageRequestInput,
  LoadAttempt,
  LoadOutcome,
  LoadSnapshot,
  LoadState
} from '@lazy-image/contracts';
import {
  ControllerCallbacks,
  ControllerHandle,
  LoadControllerOptions,
  LoadIssuer,
  VisibilityObserver,
  VisibilitySubscription
} from './types';

const logger = createLogger('load-controller');

interface InFlight {
  attempt: LoadAttempt;
  record: AttemptRecord;
}

interface Session<E extends object> {
  handle: ControllerHandle<E>;
  callbacks: ControllerCallbacks;
  request?: ImageRequest;
  state: LoadState;
  attempts: AttemptRecord[];
  currentSource?: string;
  inFlight?: InFlight;
  subscription?: VisibilitySubscription;
  disposed: boolean;
}

function failureReason(record: AttemptRecord | undefined): string {
  return record?.outcome?.kind === 'failure' ? record.outcome.reason : 'unknown error';
}

export class LoadController<E extends object> {
  private readonly observer: VisibilityObserver<E>;
  private readonly issuer: LoadIssuer<E>;
  private readonly threshold: number;
  private readonly requestSchema: ReturnType<typeof createImageRequestSchema>;
  private readonly onEvent?: (event: ControllerEvent) => void;

  private sessions = new WeakMap<ControllerHandle<E>, Session<E>>();
  private registrations = new Map<E, ControllerHandle<E>>();

  constructor(options: LoadControllerOptions<E>) {
    this.observer = options.observer;
    this.issuer = options.issuer;
    this.threshold = options.threshold ?? env.IMAGE_VISIBILITY_THRESHOLD;
    this.requestSchema = createImageRequestSchema(options.defaultLazyBoundary ?? env.IMAGE_LAZY_BOUNDARY);
    this.onEvent = options.onEvent;
  }

  initialize(input: ImageRequestInput, element: E, callbacks: ControllerCallbacks = {}): ControllerHandle<E> {
    const existing = this.registrations.get(element);
    if (existing) {
      const error = new DuplicateRegistrationError(existing.id);
      logger.warn(error.message, { handleId: existing.id, code: error.code });
      return existing;
    }

    const handle: ControllerHandle<E> = { id: uuidv4(), element };
    const session: Session<E> = {
      handle,
      callbacks,
      state: 'idle',
      attempts: [],
      disposed: false
    };
    this.sessions.set(handle, session);
    this.registrations.set(element, handle);

    const parsed = this.requestSchema.safeParse(input);
    if (!parsed.success) {
      // Stays idle: nothing was attempted, so it cannot be `failed`
      this.report(session, new InvalidRequestError(
        parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
        { handleId: handle.id }
      ));
      return handle;
    }

    const request = parsed.data;
    session.request = request;

    if (isEager(request)) {
      this.issue(session, request, 'primary');
      return handle;
    }

    this.transition(session, 'pending');
    this.observe(session, request);
    return handle;
  }

  onVisibilitySignal(handle: ControllerHandle<E>, isIntersecting: boolean): void {
    const session = this.sessions.get(handle);
    if (!session || session.disposed) {
      logger.debug('Visibility signal after teardown ignored', { handleId: handle.id, isIntersecting });
      return;
    }
    if (!isIntersecting || session.state !== 'pending' || !session.request) {
      return;
    }

    // One-shot: a revealed image is never observed again
    this.releaseObservation(session);
    this.issue(session, session.request, 'primary');
  }

  onLoadResult(handle: ControllerHandle<E>, outcome: LoadOutcome): void {
    const session = this.sessions.get(handle);
    if (!session || session.disposed) {
      logger.debug('Load result after teardown ignored', { handleId: handle.id, outcome: outcome.kind });
      return;
    }

    const { inFlight, request } = session;
    if (session.state !== 'loading' || !inFlight || !request) {
      logger.debug('Load result outside of loading ignored', { handleId: handle.id, state: session.state });
      return;
    }
    if (outcome.source !== undefined && outcome.source !== inFlight.attempt.source) {
      logger.debug('Stale load result ignored', {
        handleId: handle.id,
        source: outcome.source,
        expected: inFlight.attempt.source
      });
      return;
    }

    inFlight.record.outcome = outcome;
    session.inFlight = undefined;
    const { attempt } = inFlight;

    if (outcome.kind === 'success') {
      this.transition(session, 'loaded');
      this.emit({
        type: 'LOADED',
        data: { handleId: handle.id, source: attempt.source, usedFallback: attempt.kind === 'fallback', ts: new Date().toISOString() }
      });
      logger.info('Image loaded', { handleId: handle.id, source: attempt.source, attempt: attempt.attempt });
      this.invoke(session, 'onLoad', () => session.callbacks.onLoad?.());
      return;
    }

    if (attempt.kind === 'primary' && request.fallbackSource) {
      logger.warn('Primary source failed, trying fallback', {
        handleId: handle.id,
        source: attempt.source,
        fallback: request.fallbackSource,
        reason: outcome.reason
      });
      this.issue(session, request, 'fallback');
      return;
    }

    const failed = { source: attempt.source, reason: outcome.reason };
    const error = attempt.kind === 'primary'
      ? new SourceLoadFailure(failed, { handleId: handle.id })
      : new FallbackLoadFailure(
          { source: request.primarySource, reason: failureReason(session.attempts[0]) },
          failed,
          { handleId: handle.id }
        );

    this.transition(session, 'failed');
    this.report(session, error);
  }

  teardown(handle: ControllerHandle<E>): void {
    const session = this.sessions.get(handle);
    if (!session || session.disposed) {
      return;
    }

    session.disposed = true;
    this.releaseObservation(session);
    if (this.registrations.get(handle.element) === handle) {
      this.registrations.delete(handle.element);
    }
    logger.debug('Controller torn down', { handleId: handle.id, state: session.state });
  }

  getSnapshot(handle: ControllerHandle<E>): LoadSnapshot | undefined {
    const session = this.sessions.get(handle);
    if (!session) {
      return undefined;
    }
    return {
      state: session.state,
      currentSource: session.currentSource,
      attempts: session.attempts.map(record => ({ ...record })),
      disposed: session.disposed
    };
  }

  getRequest(handle: ControllerHandle<E>): ImageRequest | undefined {
    return this.sessions.get(handle)?.request;
  }

  private observe(session: Session<E>, request: ImageRequest): void {
    const { handle } = session;
    let subscription: VisibilitySubscription;
    try {
      subscription = this.observer.observe(
        handle.element,
        { rootMargin: request.lazyBoundary, threshold: this.threshold },
        isIntersecting => this.onVisibilitySignal(handle, isIntersecting)
      );
    } catch (error) {
      logger.error('Visibility observation failed, loading immediately', toError(error), { handleId: handle.id });
      this.onVisibilitySignal(handle, true);
      return;
    }

    // The observer may have signalled synchronously from inside observe()
    if (session.state === 'pending' && !session.disposed) {
      session.subscription = subscription;
    } else {
      this.release(session, subscription);
    }
  }

  private issue(session: Session<E>, request: ImageRequest, kind: AttemptKind): void {
    const { handle } = session;
    const source = kind === 'fallback' && request.fallbackSource ? request.fallbackSource : request.primarySource;
    const attempt: LoadAttempt = {
      handleId: handle.id,
      source,
      attempt: kind === 'primary' ? 1 : 2,
      kind
    };
    const record: AttemptRecord = { source, kind };

    session.attempts.push(record);
    session.inFlight = { attempt, record };
    session.currentSource = source;
    if (session.state !== 'loading') {
      this.transition(session, 'loading');
    }
    this.emit({ type: 'LOAD_ISSUED', data: { ...attempt, ts: new Date().toISOString() } });

    try {
      this.issuer.issue(attempt, handle.element, outcome => this.onLoadResult(handle, { ...outcome, source }));
    } catch (error) {
      this.onLoadResult(handle, { kind: 'failure', reason: toError(error).message, source });
    }
  }

  private transition(session: Session<E>, to: LoadState): void {
    const from = session.state;
    if (from === to || isTerminal(from)) {
      return;
    }
    session.state = to;
    logger.logTransition(session.handle.id, from, to);
    this.emit({
      type: 'STATE_CHANGED',
      data: { handleId: session.handle.id, from, to, ts: new Date().toISOString() }
    });
    this.invoke(session, 'onStateChange', () => session.callbacks.onStateChange?.(to));
  }

  private report(session: Session<E>, error: ImageComponentError): void {
    logger.warn(error.message, { handleId: session.handle.id, code: error.code });
    this.emit({
      type: 'FAILED',
      data: {
        handleId: session.handle.id,
        code: error.code,
        reason: error.message,
        attempts: session.attempts.length,
        ts: new Date().toISOString()
      }
    });
    this.invoke(session, 'onError', () => session.callbacks.onError?.(error.message, error));
  }

  private releaseObservation(session: Session<E>): void {
    const { subscription } = session;
    session.subscription = undefined;
    if (subscription) {
      this.release(session, subscription);
    }
  }

  private release(session: Session<E>, subscription: VisibilitySubscription): void {
    try {
      subscription.release();
    } catch (error) {
      logger.error('Failed to release visibility observation', toError(error), { handleId: session.handle.id });
    }
  }

  private emit(event: ControllerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      logger.error('Controller event listener threw', toError(error), { event: event.type });
    }
  }

  // Caller callbacks must never break a transition or reach the host
  private invoke(session: Session<E>, name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      logger.error(`${name} callback threw`, toError(error), { handleId: session.handle.id });
    }
  }
}
