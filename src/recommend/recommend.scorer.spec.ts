import { makeMovie } from '../testing/movie.fixture';
import { inferMovieMoods } from './recommend.lexicon';
import {
  buildMatchReasons,
  buildTextMatchReasons,
  scoreEmotion,
  scoreForMood,
  scoreForText,
  scoreMood,
  scoreQuality,
  scoreTextRelevance,
  sortByScore,
} from './recommend.scorer';
import type { SearchCriteria } from './recommend.types';

const noCriteria: SearchCriteria = {
  keywords: [],
  genreIds: [],
  year: null,
  runtime: null,
};

const actionMovie = makeMovie({
  id: 10,
  title: 'Crash Course',
  genres: ['Action'],
  voteAverage: 8,
  popularity: 20,
  voteCount: 500,
});

describe('recommend.scorer', () => {
  describe('scoreMood', () => {
    it('단일 무드 완전 일치', () => {
      const { score, matches } = scoreMood(actionMovie, { action: 0.8 });

      expect(score).toBeCloseTo(0.8);
      expect(matches).toEqual({ action: 0.8 });
    });

    it('영화에 없는 무드는 0이지만 분모에 포함', () => {
      const { score, matches } = scoreMood(actionMovie, {
        action: 0.8,
        romance: 0.5,
      });

      expect(score).toBeCloseTo(0.64 / 1.3);
      expect(matches).toEqual({ action: 0.8, romance: 0 });
    });

    it('빈 타깃은 0', () => {
      expect(scoreMood(actionMovie, {}).score).toBe(0);
    });

    it('장르가 없으면 무드 프로필이 비고 0점', () => {
      const noGenres = makeMovie({ genres: [] });

      expect(inferMovieMoods(noGenres.genres)).toEqual({});
      expect(scoreMood(noGenres, { action: 0.8, drama: 0.4 })).toEqual({
        score: 0,
        matches: { action: 0, drama: 0 },
      });
    });

    it('0~1 가중치면 점수도 0~1', () => {
      const targets = [
        { action: 1, intense: 1, energetic: 1, adventure: 1 },
        { action: 0.1 },
        { romance: 1, comedy: 0 },
        { thriller: 0.6, 'sci-fi': 0.9, scary: 0.2 },
      ];
      const movies = [
        actionMovie,
        makeMovie({ genres: ['Action', 'Thriller', 'Science Fiction'] }),
        makeMovie({ genres: ['Horror', 'Romance', 'Comedy'] }),
      ];

      for (const target of targets) {
        for (const movie of movies) {
          const { score } = scoreMood(movie, target);
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      }
    });
  });

  describe('scoreEmotion', () => {
    it('장르무드 × 감정무드 최댓값', () => {
      const { score, matches } = scoreEmotion(actionMovie, { excitement: 1 });

      // Action.action 0.9 × excitement.action 0.8
      expect(score).toBeCloseTo(0.72);
      expect(matches.excitement).toBeCloseTo(0.72);
    });

    it('여러 감정은 가중 평균', () => {
      const { score } = scoreEmotion(actionMovie, { excitement: 1, fear: 1 });

      // fear: Action.intense 0.8 × fear.intense 0.7 = 0.56
      expect(score).toBeCloseTo((0.72 + 0.56) / 2);
    });

    it('장르가 없으면 0', () => {
      expect(scoreEmotion(makeMovie(), { joy: 1 }).score).toBe(0);
    });
  });

  describe('scoreQuality', () => {
    it('보너스 상한 포함 최대 1.5', () => {
      const movie = makeMovie({
        voteAverage: 10,
        popularity: 200,
        voteCount: 5000,
      });
      expect(scoreQuality(movie)).toBeCloseTo(1.5);
    });

    it('평점 + 인기도 + 투표수', () => {
      // 0.8 + min(0.2, 0.3) + min(0.5, 0.2)
      expect(scoreQuality(actionMovie)).toBeCloseTo(1.2);
    });
  });

  describe('scoreForMood', () => {
    it('0.4·mood + 0.4·emotion + 0.2·quality, 이유 4개', () => {
      const ranked = scoreForMood(
        actionMovie,
        { action: 0.8 },
        { excitement: 1 },
      );

      expect(ranked.score).toBeCloseTo(0.32 + 0.288 + 0.24);
      expect(ranked.matchReasons).toEqual([
        'Matches your action mood',
        'Suits your excitement feeling',
        'Great action film',
        'Highly rated film',
      ]);
      expect(ranked.moodMatches).toEqual({ action: 0.8 });
    });
  });

  describe('buildMatchReasons', () => {
    it('하이픈 무드는 공백으로', () => {
      const comedy = makeMovie({ genres: ['Comedy'], voteAverage: 5 });
      const { matches } = scoreMood(comedy, { 'feel-good': 0.9 });

      expect(
        buildMatchReasons(comedy, matches, {}, { 'feel-good': 0.9 }, {}),
      ).toEqual(['Matches your feel good mood', 'Great comedy film']);
    });

    it('최대 4개', () => {
      const comedy = makeMovie({
        genres: ['Comedy'],
        voteAverage: 8,
        popularity: 60,
      });
      const moods = { comedy: 0.9, 'feel-good': 0.9, uplifting: 0.9 };
      const ranked = scoreForMood(comedy, moods, { joy: 1 });

      expect(ranked.matchReasons).toEqual([
        'Matches your comedy mood',
        'Matches your feel good mood',
        'Matches your uplifting mood',
        'Suits your joy feeling',
      ]);
    });

    it('평가가 괜찮은 영화 / 인기작', () => {
      const movie = makeMovie({ voteAverage: 7, popularity: 51 });

      expect(buildMatchReasons(movie, {}, {}, {}, {})).toEqual([
        'Well-reviewed movie',
        'Popular choice',
      ]);
    });

    it('아무 이유도 없으면 기본 문구', () => {
      const movie = makeMovie({ voteAverage: 5, popularity: 10 });

      expect(buildMatchReasons(movie, {}, {}, {}, {})).toEqual([
        'Recommended for you',
      ]);
    });
  });

  describe('text path', () => {
    it('관련도는 1로 상한', () => {
      const movie = makeMovie({
        title: 'The Heat Wave',
        originalTitle: 'The Heat Wave',
        overview: 'a heat wave hits the city',
        genres: ['Action'],
        releaseDate: '2010-05-01',
      });

      const relevance = scoreTextRelevance(movie, 'heat wave', {
        ...noCriteria,
        keywords: ['action'],
        year: 2011,
      });
      expect(relevance).toBe(1);
    });

    it('줄거리 단어 겹침 비율 × 0.4', () => {
      const movie = makeMovie({
        title: 'Other',
        originalTitle: 'Other',
        overview: 'a dog and a cat',
        voteAverage: 6,
      });

      expect(scoreTextRelevance(movie, 'dog bird', noCriteria)).toBeCloseTo(
        0.2,
      );
      // 0.7·0.2 + 0.3·0.6
      expect(scoreForText(movie, 'dog bird', noCriteria).score).toBeCloseTo(
        0.32,
      );
    });

    it('연도: 정확히 +0.5, 2년 이내 +0.2', () => {
      const movie = makeMovie({ releaseDate: '2000-01-01' });

      expect(
        scoreTextRelevance(movie, 'zzz', { ...noCriteria, year: 2000 }),
      ).toBeCloseTo(0.5);
      expect(
        scoreTextRelevance(movie, 'zzz', { ...noCriteria, year: 2002 }),
      ).toBeCloseTo(0.2);
      expect(
        scoreTextRelevance(movie, 'zzz', { ...noCriteria, year: 2003 }),
      ).toBe(0);
    });

    it('텍스트 매치 이유 (최대 4개)', () => {
      const movie = makeMovie({
        title: 'Heat',
        genres: ['Action', 'Crime'],
        releaseDate: '1995-12-15',
        voteAverage: 8.3,
      });

      expect(
        buildTextMatchReasons(movie, 'heat', {
          ...noCriteria,
          keywords: ['action', 'crime', 'heat'],
          year: 1995,
        }),
      ).toEqual([
        'Title matches your search',
        'Matches Action genre',
        'Matches Crime genre',
        'From 1995',
      ]);
    });

    it('매치가 없으면 기본 문구', () => {
      expect(buildTextMatchReasons(makeMovie(), 'zzz', noCriteria)).toEqual([
        'Recommended based on your search',
      ]);
      expect(scoreForText(makeMovie(), 'zzz', noCriteria).moodMatches).toEqual(
        {},
      );
    });
  });

  it('sortByScore: 내림차순, 동점은 원래 순서', () => {
    const items = [0.5, 0.9, 0.5].map((score, i) => ({
      ...scoreForMood(makeMovie({ id: i + 1 }), {}, {}),
      score,
    }));

    expect(sortByScore(items).map((c) => c.movie.id)).toEqual([2, 1, 3]);
  });
});
