import { RateLimitStore } from './rate-limit.store';

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

describe('RateLimitStore', () => {
  it('윈도우 안의 요청 수를 셈', () => {
    const store = new RateLimitStore();

    expect(store.hit('k', MINUTE, 0)).toBe(1);
    expect(store.hit('k', MINUTE, 30_000)).toBe(2);
    expect(store.hit('k', MINUTE, 61_000)).toBe(2);
  });

  it('sweep: 윈도우가 다 지난 키만 삭제', () => {
    const store = new RateLimitStore();
    for (let i = 0; i < 1000; i++) store.hit(`client-${i}:m`, MINUTE, 0);
    store.hit('client-0:d', DAY, 0);

    const later = 10 * DAY;
    store.hit('fresh', MINUTE, later);

    expect(store.sweep(later)).toBe(1001);
    expect(store.sweep(later)).toBe(0);
    // 지워진 키는 처음부터 다시 셈
    expect(store.hit('client-0:m', MINUTE, later)).toBe(1);
    expect(store.hit('fresh', MINUTE, later + 1)).toBe(2);
  });

  it('sweep: 아직 윈도우 안인 키는 유지', () => {
    const store = new RateLimitStore();
    store.hit('day', DAY, 0);
    store.hit('minute', MINUTE, 0);

    expect(store.sweep(2 * MINUTE)).toBe(1);
    expect(store.hit('day', DAY, 3 * MINUTE)).toBe(2);
  });
});
