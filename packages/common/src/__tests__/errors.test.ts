import {
  FallbackLoadFailure,
  ImageComponentError,
  InvalidRequestError,
  SourceLoadFailure,
  toError
} from '../errors';

describe('errors', () => {
  describe('SourceLoadFailure', () => {
    it('should describe the failed source', () => {
      const error = new SourceLoadFailure({ source: 'a.jpg', reason: 'Network error: offline' });

      expect(error).toBeInstanceOf(ImageComponentError);
      expect(error.name).toBe('SourceLoadFailure');
      expect(error.code).toBe('SOURCE_LOAD_FAILURE');
      expect(error.message).toBe('Failed to load image "a.jpg" (Network error: offline) and no fallback provided.');
    });
  });

  describe('FallbackLoadFailure', () => {
    it('should account for both attempts', () => {
      const error = new FallbackLoadFailure(
        { source: 'a.jpg', reason: '404' },
        { source: 'b.jpg', reason: '500' },
        { handleId: 'h-1' }
      );

      expect(error.code).toBe('FALLBACK_LOAD_FAILURE');
      expect(error.attempts).toEqual([
        { source: 'a.jpg', reason: '404' },
        { source: 'b.jpg', reason: '500' }
      ]);
      expect(error.context).toEqual({ handleId: 'h-1' });
    });
  });

  describe('InvalidRequestError', () => {
    it('should list every issue', () => {
      const error = new InvalidRequestError([
        { path: 'primarySource', message: 'Required' },
        { path: '', message: 'Bad shape' }
      ]);

      expect(error.message).toBe('Invalid image request: primarySource: Required; (root): Bad shape');
    });
  });

  describe('toError', () => {
    it('should keep errors and wrap other values', () => {
      const original = new Error('boom');

      expect(toError(original)).toBe(original);
      expect(toError('plain').message).toBe('plain');
      expect(toError({ code: 7 }).message).toBe('{"code":7}');
    });
  });
});
