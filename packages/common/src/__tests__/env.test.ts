import { env, processEnv, readEnv, validateEnv, EnvConfig } from '../env';

describe('env', () => {
  const base: EnvConfig = {
    NODE_ENV: 'test',
    LOG_LEVEL: 'info',
    IMAGE_LAZY_BOUNDARY: '100px',
    IMAGE_VISIBILITY_THRESHOLD: 0.1,
    IMAGE_FETCH_CACHE: 'reload'
  };

  it('should load under jest with the test environment', () => {
    expect(env.NODE_ENV).toBe('test');
  });

  it('should read from process.env when it exists', () => {
    expect(processEnv()).toBe(process.env);
  });

  it('should fall back to defaults for an empty source', () => {
    expect(readEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      IMAGE_LAZY_BOUNDARY: '100px',
      IMAGE_VISIBILITY_THRESHOLD: 0.1,
      IMAGE_FETCH_CACHE: 'reload'
    });
  });

  it('should read values from the given source', () => {
    const config = readEnv({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      IMAGE_LAZY_BOUNDARY: '0px 0px 200px 0px',
      IMAGE_VISIBILITY_THRESHOLD: '0.5',
      IMAGE_FETCH_CACHE: 'no-store'
    });

    expect(config).toEqual({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      IMAGE_LAZY_BOUNDARY: '0px 0px 200px 0px',
      IMAGE_VISIBILITY_THRESHOLD: 0.5,
      IMAGE_FETCH_CACHE: 'no-store'
    });
  });

  it('should ignore unknown choices and empty values', () => {
    const config = readEnv({ NODE_ENV: 'staging', IMAGE_FETCH_CACHE: 'sometimes', IMAGE_LAZY_BOUNDARY: '' });

    expect(config.NODE_ENV).toBe('development');
    expect(config.IMAGE_FETCH_CACHE).toBe('reload');
    expect(config.IMAGE_LAZY_BOUNDARY).toBe('100px');
  });

  it('should reject a threshold that is not a number', () => {
    expect(() => readEnv({ IMAGE_VISIBILITY_THRESHOLD: 'half' })).toThrow(
      'Environment variable IMAGE_VISIBILITY_THRESHOLD must be a number, got "half"'
    );
  });

  it('should accept a valid configuration', () => {
    expect(() => validateEnv(base)).not.toThrow();
    expect(() => validateEnv({ ...base, IMAGE_LAZY_BOUNDARY: '10px 20% 0px -5px' })).not.toThrow();
  });

  it('should reject a threshold outside 0..1', () => {
    expect(() => validateEnv({ ...base, IMAGE_VISIBILITY_THRESHOLD: 1.5 })).toThrow(
      'Environment validation failed: IMAGE_VISIBILITY_THRESHOLD must be within 0..1, got 1.5'
    );
  });

  it('should reject a lazy boundary that is not a margin', () => {
    expect(() => validateEnv({ ...base, IMAGE_LAZY_BOUNDARY: 'soon' })).toThrow(
      'Environment validation failed: IMAGE_LAZY_BOUNDARY "soon" is not a margin'
    );
  });
});
