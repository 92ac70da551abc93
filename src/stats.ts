import { DIFFICULTY_LEVELS, MASTERY_STREAK } from './scheduler/constants';
import { dueCardCount } from './deck';
import { Card, Deck, DeckStats } from './types';

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

export function isMastered(card: Card): boolean {
  return card.consecutiveCorrect >= MASTERY_STREAK;
}

export function computeDeckStats(deck: Deck, nowIso: string): DeckStats {
  const total = deck.cards.length;
  const mastered = deck.cards.filter(isMastered).length;
  return {
    total,
    due: dueCardCount(deck, nowIso),
    newCards: deck.cards.filter((card) => card.reviewCount === 0).length,
    mastered,
    masteryPercentage: percentage(mastered, total),
    difficultyDistribution: DIFFICULTY_LEVELS.map((level) => {
      const count = deck.cards.filter((card) => card.difficulty === level).length;
      return { level, count, percentage: percentage(count, total) };
    }),
  };
}
