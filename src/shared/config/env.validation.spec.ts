import { validationSchema } from './env.validation';

describe('validationSchema', () => {
  it('fills in defaults for an empty environment', () => {
    const { error, value } = validationSchema.validate({});

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8000,
      PROXY_WINDOW_MS: 60_000,
      PROXY_MAX_REQUESTS_PER_WINDOW: 10,
      RETRIEVAL_MAX_ATTEMPTS: 20,
      RETRIEVAL_BACKOFF_MIN_MS: 1000,
      RETRIEVAL_BACKOFF_MAX_MS: 3000,
      ARTIFACT_ROOT: 'downloads',
      ARTIFACT_TTL_MINUTES: 60,
      FFMPEG_PATH: 'ffmpeg',
    });
    expect(value.PROXIES_URL).toBeUndefined();
  });

  it('converts numeric strings from the environment', () => {
    const { value } = validationSchema.validate({
      PORT: '9000',
      RETRIEVAL_MAX_ATTEMPTS: '5',
    });

    expect(value.PORT).toBe(9000);
    expect(value.RETRIEVAL_MAX_ATTEMPTS).toBe(5);
  });

  it('only accepts http(s) proxy list locations', () => {
    expect(
      validationSchema.validate({ PROXIES_URL: 'ftp://lists.example/p.txt' })
        .error,
    ).toBeDefined();
    expect(
      validationSchema.validate({ PROXIES_URL: 'https://lists.example/p.txt' })
        .error,
    ).toBeUndefined();
  });

  it('rejects a backoff range that ends before it starts', () => {
    expect(
      validationSchema.validate({
        RETRIEVAL_BACKOFF_MIN_MS: '2000',
        RETRIEVAL_BACKOFF_MAX_MS: '500',
      }).error,
    ).toBeDefined();
  });
});
