import { makeMovie } from '../testing/movie.fixture';
import {
  buildMetadata,
  resolveCount,
  toRecommendationItem,
} from './recommend.presenter';

describe('recommend.presenter', () => {
  it.each<[number | undefined, number]>([
    [undefined, 8],
    [5, 5],
    [0, 1],
    [-3, 1],
    [50, 20],
    [3.9, 3],
  ])('resolveCount(%s) → %d', (n, expected) => {
    expect(resolveCount(n)).toBe(expected);
  });

  it('toRecommendationItem: 점수는 0~100 정수', () => {
    const item = toRecommendationItem(
      {
        movie: makeMovie({ id: 9, posterPath: '/x.jpg' }),
        score: 0.8476,
        matchReasons: ['Great action film'],
        moodMatches: { action: 0.8 },
        emotionMatches: {},
      },
      'https://image.tmdb.org/t/p',
    );

    expect(item.score).toBe(85);
    expect(item.movie.posterUrl).toBe('https://image.tmdb.org/t/p/w500/x.jpg');
    expect(item.matchReasons).toEqual(['Great action film']);
    expect(item.moodMatches).toEqual({ action: 0.8 });
  });

  it('buildMetadata', () => {
    expect(
      buildMetadata(3, 'text_search', new Date('2026-02-03T04:05:06.000Z')),
    ).toEqual({
      totalFound: 3,
      timestamp: '2026-02-03T04:05:06.000Z',
      method: 'text_search',
    });
  });
});
