import { computeNextReview, easeFactor, intervalDays, previewIntervals, SchedulingCard } from './sm2';
import { MIN_EASE, RATINGS } from './constants';
import { Difficulty } from '../types';
import { addDaysIso } from '../utils/time';

const NOW = '2026-02-23T12:00:00.000Z';

function reviewedCard(overrides: Partial<SchedulingCard> = {}): SchedulingCard {
  return {
    difficulty: 3,
    reviewCount: 2,
    lastReviewed: '2026-02-20T12:00:00.000Z',
    ...overrides,
  };
}

describe('easeFactor', () => {
  it('never drops below the minimum ease for any rating and difficulty', () => {
    const difficulties: Difficulty[] = [1, 2, 3, 4, 5];
    for (const difficulty of difficulties) {
      for (const rating of RATINGS) {
        expect(easeFactor(difficulty, rating)).toBeGreaterThanOrEqual(MIN_EASE);
      }
    }
  });

  it('starts from 2.5 for an average card and average recall', () => {
    expect(easeFactor(3, 3)).toBe(2.5);
  });

  it('grows with easier cards and better recall', () => {
    expect(easeFactor(1, 5)).toBeCloseTo(2.9);
    expect(easeFactor(5, 0)).toBeCloseTo(2.0);
    expect(easeFactor(2, 3)).toBeGreaterThan(easeFactor(4, 3));
  });

  it('clamps to the floor when adjustments push below it', () => {
    expect(easeFactor(15, 0)).toBe(MIN_EASE);
  });
});

describe('intervalDays', () => {
  it('schedules a first review one day out after a poor recall', () => {
    const card = reviewedCard({ reviewCount: 0, lastReviewed: undefined });
    expect(intervalDays(card, 0, NOW)).toBe(1);
    expect(intervalDays(card, 1, NOW)).toBe(1);
    expect(intervalDays(card, 2, NOW)).toBe(1);
  });

  it('schedules a first review two days out after a good recall', () => {
    const card = reviewedCard({ reviewCount: 0, lastReviewed: undefined });
    expect(intervalDays(card, 3, NOW)).toBe(2);
    expect(intervalDays(card, 4, NOW)).toBe(2);
    expect(intervalDays(card, 5, NOW)).toBe(2);
  });

  it('resets to one day when the card was forgotten, whatever its history', () => {
    const veteran = reviewedCard({ reviewCount: 12, difficulty: 1, lastReviewed: '2026-01-01T12:00:00.000Z' });
    expect(intervalDays(veteran, 0, NOW)).toBe(1);
    expect(intervalDays(veteran, 1, NOW)).toBe(1);
  });

  it('multiplies the elapsed days by the ease and adjusts for recall quality', () => {
    expect(previewIntervals(reviewedCard(), NOW)).toEqual({ 0: 1, 1: 1, 2: 3, 3: 7, 4: 9, 5: 10 });
  });

  it('ignores partial days when measuring the elapsed gap', () => {
    const card = reviewedCard({ lastReviewed: '2026-02-20T00:00:00.000Z' });
    expect(intervalDays(card, 3, NOW)).toBe(7);
  });

  it('counts a same-day repeat as one elapsed day', () => {
    const card = reviewedCard({ lastReviewed: '2026-02-23T08:00:00.000Z' });
    expect(intervalDays(card, 2, NOW)).toBe(1);
    expect(intervalDays(card, 3, NOW)).toBe(2);
    expect(intervalDays(card, 4, NOW)).toBe(2);
  });

  it('treats a reviewed card without lastReviewed as one elapsed day', () => {
    const card = reviewedCard({ lastReviewed: undefined });
    expect(intervalDays(card, 3, NOW)).toBe(2);
  });
});

describe('computeNextReview', () => {
  it('adds the interval to the review time', () => {
    expect(computeNextReview(reviewedCard(), 3, NOW)).toBe(addDaysIso(NOW, 7));
    expect(computeNextReview(reviewedCard(), 3, NOW)).toBe('2026-03-02T12:00:00.000Z');
  });

  it('does not mutate the card', () => {
    const card = Object.freeze(reviewedCard());
    computeNextReview(card, 5, NOW);
    expect(card).toEqual(reviewedCard());
  });
});
