import { createLogger, env, toError } from '@lazy-image/common';
import { LoadAttempt, LoadOutcome } from '@lazy-image/contracts';
import { LoadIssuer, ReportOutcome } from './types';

const logger = createLogger('fetch-loader');

export const UNREADABLE_BODY = 'Failed to retrieve response body';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchSourceLoaderOptions {
  fetch?: FetchLike;
  cache?: RequestCache;
}

/**
 * Network collaborator: validates a source with a GET before it is swapped in.
 * The cache is bypassed by default so a previously failed URL is really re-fetched.
 */
export class FetchSourceLoader implements LoadIssuer<object> {
  private readonly fetchImpl: FetchLike;
  private readonly cache: RequestCache;

  constructor(options: FetchSourceLoaderOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init));
    this.cache = options.cache ?? env.IMAGE_FETCH_CACHE;
  }

  issue(attempt: LoadAttempt, _element: object, report: ReportOutcome): void {
    this.probe(attempt.source)
      .then(report)
      .catch((error: unknown) => {
        logger.error('Failed to deliver load outcome', toError(error), {
          handleId: attempt.handleId,
          source: attempt.source
        });
      });
  }

  async probe(source: string): Promise<LoadOutcome> {
    try {
      const response = await this.fetchImpl(source, {
        method: 'GET',
        cache: this.cache
      });

      if (response.ok) {
        logger.debug('Source reachable', { source, status: response.status });
        return { kind: 'success' };
      }

      let body: string;
      try {
        body = await response.text();
      } catch {
        body = UNREADABLE_BODY;
      }
      logger.warn('Source responded with an error', { source, status: response.status });
      return {
        kind: 'failure',
        reason: `Failed to load image. Status: ${response.status}, Body: ${body}`
      };
    } catch (error) {
      logger.warn('Source unreachable', { source, error: toError(error).message });
      return { kind: 'failure', reason: `Network error: ${toError(error).message}` };
    }
  }
}
