import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('문자열 값을 숫자/불리언으로 변환', () => {
    const env = validateEnv({
      PORT: '8080',
      TMDB_API_KEY: 'test-key',
      RATE_LIMIT_ENABLED: 'false',
      EMERGENCY_STOP: '1',
      OPENAI_MONTHLY_LIMIT: '7.5',
    });

    expect(env.PORT).toBe(8080);
    expect(env.TMDB_API_KEY).toBe('test-key');
    expect(env.RATE_LIMIT_ENABLED).toBe(false);
    expect(env.EMERGENCY_STOP).toBe(true);
    expect(env.OPENAI_MONTHLY_LIMIT).toBe(7.5);
  });

  it('빈 값은 미설정으로 취급', () => {
    const env = validateEnv({ PORT: '', TMDB_BASE_URL: '', OPENAI_API_KEY: '' });

    expect(env.PORT).toBeUndefined();
    expect(env.TMDB_BASE_URL).toBeUndefined();
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it('모르는 키는 그대로 통과', () => {
    expect(() => validateEnv({ HOME: '/root', NODE_ENV: 'test' })).not.toThrow();
  });

  it.each([
    ['PORT', 'abc'],
    ['PORT', '70000'],
    ['RATE_LIMIT_PER_MINUTE', '0'],
    ['EMERGENCY_STOP', 'maybe'],
    ['TMDB_BASE_URL', 'not a url'],
  ])('%s=%s 는 거부', (key, value) => {
    expect(() => validateEnv({ [key]: value })).toThrow(/^Invalid environment/);
  });
});
