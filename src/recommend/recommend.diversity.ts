// src/recommend/recommend.diversity.ts
import type { RankedCandidate } from './recommend.types';

const GENRE_OVERLAP_LIMIT = 0.7;
/** 이 개수 전까지는 장르 중복을 보지 않음 */
const GENRE_FREE_SLOTS = 3;
/** 이 개수 전까지는 감독 중복을 보지 않음 */
const DIRECTOR_FREE_SLOTS = 5;

export function genreOverlapRatio(
  genres: readonly string[],
  usedGenres: ReadonlySet<string>,
): number {
  const unique = new Set(genres);
  if (unique.size === 0) return 0;

  let shared = 0;
  for (const g of unique) if (usedGenres.has(g)) shared += 1;
  return shared / unique.size;
}

/**
 * 점수순으로 정렬된 후보에서 최대 n개 선택
 * - 장르가 70% 이상 겹치면 보류 (앞의 3개는 예외)
 * - 이미 쓴 감독이면 보류 (앞의 5개는 예외). 감독 정보가 없으면 중복으로 보지 않음
 * - 모자라면 보류된 것들로 점수순 채움
 */
export function selectDiverse(
  candidates: readonly RankedCandidate[],
  n: number,
): RankedCandidate[] {
  const limit = Math.max(0, Math.trunc(n));
  if (limit === 0) return [];

  const selected: RankedCandidate[] = [];
  const picked = new Set<number>();
  const usedGenres = new Set<string>();
  const usedDirectors = new Set<string>();

  candidates.forEach((item, idx) => {
    if (selected.length >= limit) return;

    const { genres, director } = item.movie;
    const genreOk =
      genreOverlapRatio(genres, usedGenres) < GENRE_OVERLAP_LIMIT ||
      selected.length < GENRE_FREE_SLOTS;
    const directorOk =
      !director ||
      !usedDirectors.has(director) ||
      selected.length < DIRECTOR_FREE_SLOTS;

    if (!genreOk || !directorOk) return;

    selected.push(item);
    picked.add(idx);
    for (const g of genres) usedGenres.add(g);
    if (director) usedDirectors.add(director);
  });

  for (let i = 0; i < candidates.length && selected.length < limit; i++) {
    if (!picked.has(i)) selected.push(candidates[i]);
  }

  return selected;
}
