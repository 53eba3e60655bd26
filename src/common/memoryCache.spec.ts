import { MemoryCache } from './memoryCache';

describe('MemoryCache', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('TTL 이 지나면 undefined', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new MemoryCache<string>({ defaultTtlMs: 1000 });

    cache.set('a', 'x');
    expect(cache.get('a')).toBe('x');

    jest.setSystemTime(new Date('2026-01-01T00:00:01Z'));
    expect(cache.get('a')).toBeUndefined();
  });

  it('개별 ttl 이 기본값보다 우선', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new MemoryCache<number>({ defaultTtlMs: 1000 });

    cache.set('a', 1, 5000);
    jest.setSystemTime(new Date('2026-01-01T00:00:02Z'));

    expect(cache.get('a')).toBe(1);
  });

  it('maxEntries 를 넘으면 오래된 것부터 제거', () => {
    const cache = new MemoryCache<number>({ maxEntries: 2 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(10);
    expect(cache.get('c')).toBe(3);
  });
});
