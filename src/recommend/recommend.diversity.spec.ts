import { makeMovie } from '../testing/movie.fixture';
import { genreOverlapRatio, selectDiverse } from './recommend.diversity';
import type { RankedCandidate } from './recommend.types';

function candidate(
  id: number,
  genres: string[],
  director: string | null,
): RankedCandidate {
  return {
    movie: makeMovie({ id, genres, director }),
    score: 1 - id / 100,
    matchReasons: [],
    moodMatches: {},
    emotionMatches: {},
  };
}

const ids = (items: RankedCandidate[]) => items.map((c) => c.movie.id);

describe('recommend.diversity', () => {
  it('genreOverlapRatio: 고유 장르 기준', () => {
    const used = new Set(['Action']);

    expect(genreOverlapRatio(['Action', 'Comedy'], used)).toBe(0.5);
    expect(genreOverlapRatio(['Action', 'Action', 'Comedy'], used)).toBe(0.5);
    expect(genreOverlapRatio([], used)).toBe(0);
  });

  it('같은 장르/감독 5편에서 3편 → 앞의 3편 그대로', () => {
    const items = [1, 2, 3, 4, 5].map((id) => candidate(id, ['Action'], 'D'));

    expect(ids(selectDiverse(items, 3))).toEqual([1, 2, 3]);
  });

  it('보류된 후보로 점수순 채움', () => {
    const items = [1, 2, 3, 4, 5].map((id) => candidate(id, ['Action'], 'D'));

    expect(ids(selectDiverse(items, 5))).toEqual([1, 2, 3, 4, 5]);
  });

  it('장르가 겹치는 후보를 건너뛰고 새 장르를 먼저', () => {
    const items = [
      candidate(1, ['Action'], 'D1'),
      candidate(2, ['Action'], 'D1'),
      candidate(3, ['Action'], 'D1'),
      candidate(4, ['Action'], 'D2'),
      candidate(5, ['Comedy'], 'D1'),
      candidate(6, ['Drama'], 'D3'),
    ];

    expect(ids(selectDiverse(items, 5))).toEqual([1, 2, 3, 5, 6]);
  });

  it('5편 이후에는 같은 감독 보류, 감독 정보 없음은 중복 아님', () => {
    const items = [
      candidate(1, ['G1'], 'D1'),
      candidate(2, ['G2'], 'D2'),
      candidate(3, ['G3'], 'D3'),
      candidate(4, ['G4'], 'D4'),
      candidate(5, ['G5'], 'D5'),
      candidate(6, ['G6'], 'D1'),
      candidate(7, ['G7'], null),
    ];

    expect(ids(selectDiverse(items, 7))).toEqual([1, 2, 3, 4, 5, 7, 6]);
  });

  it('n 을 넘지 않음', () => {
    const items = [1, 2].map((id) => candidate(id, ['Action'], null));

    expect(selectDiverse(items, 0)).toEqual([]);
    expect(ids(selectDiverse(items, 10))).toEqual([1, 2]);
  });
});
