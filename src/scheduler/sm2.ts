import { Card, Difficulty, Rating } from '../types';
import { addDaysIso, wholeDaysBetween } from '../utils/time';
import {
  BASE_EASE,
  EASE_STEP,
  EASY_RECALL_MULTIPLIER,
  FIRST_REVIEW_GOOD_INTERVAL_DAYS,
  MIN_EASE,
  MIN_INTERVAL_DAYS,
  POOR_RECALL_MULTIPLIER,
  RATINGS,
} from './constants';

export type SchedulingCard = Pick<Card, 'difficulty' | 'reviewCount' | 'lastReviewed'>;

export type RatingIntervalPreview = Record<Rating, number>;

/**
 * SuperMemo-2 style ease. Easier cards and better recall grow intervals faster;
 * the result never drops below {@link MIN_EASE}.
 */
export function easeFactor(difficulty: number, rating: Rating): number {
  const difficultyAdjustment = (3 - difficulty) * EASE_STEP;
  const performanceAdjustment = (rating - 3) * EASE_STEP;
  return Math.max(MIN_EASE, BASE_EASE + difficultyAdjustment + performanceAdjustment);
}

function elapsedDaysSince(lastReviewed: string | undefined, nowIso: string): number {
  if (!lastReviewed) {
    return MIN_INTERVAL_DAYS;
  }
  return Math.max(MIN_INTERVAL_DAYS, wholeDaysBetween(lastReviewed, nowIso));
}

export function intervalDays(card: SchedulingCard, rating: Rating, nowIso: string): number {
  if (card.reviewCount === 0) {
    return rating <= 2 ? MIN_INTERVAL_DAYS : FIRST_REVIEW_GOOD_INTERVAL_DAYS;
  }
  if (rating <= 1) {
    return MIN_INTERVAL_DAYS;
  }

  const elapsed = elapsedDaysSince(card.lastReviewed, nowIso);
  const base = Math.floor(elapsed * easeFactor(card.difficulty, rating));
  let interval = base;
  if (rating <= 2) {
    interval = Math.floor(base * POOR_RECALL_MULTIPLIER);
  } else if (rating >= 4) {
    interval = Math.floor(base * EASY_RECALL_MULTIPLIER);
  }
  return Math.max(MIN_INTERVAL_DAYS, interval);
}

export function computeNextReview(card: SchedulingCard, rating: Rating, nowIso: string): string {
  return addDaysIso(nowIso, intervalDays(card, rating, nowIso));
}

export type DifficultyAdjuster = (difficulty: Difficulty, rating: Rating) => Difficulty;

const keepDifficulty: DifficultyAdjuster = (difficulty) => difficulty;

/** Interval each rating would produce, after `adjust` has applied any difficulty drift. */
export function previewIntervals(
  card: SchedulingCard,
  nowIso: string,
  adjust: DifficultyAdjuster = keepDifficulty,
): RatingIntervalPreview {
  const preview: RatingIntervalPreview = { 0: 1, 1: 1, 2: 1, 3: 1, 4: 1, 5: 1 };
  for (const rating of RATINGS) {
    preview[rating] = intervalDays({ ...card, difficulty: adjust(card.difficulty, rating) }, rating, nowIso);
  }
  return preview;
}
