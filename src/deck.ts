import { randomUUID } from 'crypto';
import {
  BACK_MAX_LENGTH,
  DECK_NAME_MAX_LENGTH,
  DIFFICULTY_DEFAULT,
  DIFFICULTY_LEVELS,
  DIFFICULTY_MAX,
  DIFFICULTY_MIN,
  FRONT_MAX_LENGTH,
  LANGUAGE_MAX_LENGTH,
  NOTES_MAX_LENGTH,
} from './scheduler/constants';
import { computeNextReview, previewIntervals, RatingIntervalPreview } from './scheduler/sm2';
import { NotFoundError, ValidationError } from './errors';
import { Card, Deck, Difficulty, Rating } from './types';
import { isDifficulty, isRating } from './utils/rating';
import { isDue } from './utils/time';
import { normalizeBoundedText, normalizeOptionalBoundedText } from './utils/text';

export type IdFactory = () => string;

export interface NewDeckInput {
  name: string;
  targetLanguage: string;
  nativeLanguage: string;
}

export interface NewCardInput {
  front: string;
  back: string;
  difficulty?: number;
  notes?: string;
}

const defaultIdFactory: IdFactory = () => randomUUID();

function requireText(value: string, maxLength: number, field: string, label: string): string {
  const normalized = normalizeBoundedText(value, maxLength);
  if (!normalized) {
    throw new ValidationError(`${label} cannot be empty.`, field);
  }
  return normalized;
}

export function requireDifficulty(value: number): Difficulty {
  if (!isDifficulty(value)) {
    throw new ValidationError(
      `Difficulty must be a whole number from ${DIFFICULTY_MIN} to ${DIFFICULTY_MAX}.`,
      'difficulty',
    );
  }
  return value;
}

export function requireRating(value: number): Rating {
  if (!isRating(value)) {
    throw new ValidationError('Rating must be a whole number from 0 to 5.', 'rating');
  }
  return value;
}

export function createDeck(input: NewDeckInput, nowIso: string, nextId: IdFactory = defaultIdFactory): Deck {
  const name = requireText(input.name, DECK_NAME_MAX_LENGTH, 'name', 'Deck name');
  const targetLanguage = requireText(input.targetLanguage, LANGUAGE_MAX_LENGTH, 'targetLanguage', 'Target language');
  const nativeLanguage = requireText(input.nativeLanguage, LANGUAGE_MAX_LENGTH, 'nativeLanguage', 'Native language');

  return {
    id: nextId(),
    name,
    targetLanguage,
    nativeLanguage,
    cards: [],
    createdAt: nowIso,
  };
}

export function createCard(input: NewCardInput, nowIso: string, nextId: IdFactory = defaultIdFactory): Card {
  const front = requireText(input.front, FRONT_MAX_LENGTH, 'front', 'Word or phrase');
  const back = requireText(input.back, BACK_MAX_LENGTH, 'back', 'Translation');
  const difficulty = requireDifficulty(input.difficulty ?? DIFFICULTY_DEFAULT);
  const notes = normalizeOptionalBoundedText(input.notes, NOTES_MAX_LENGTH);

  return {
    id: nextId(),
    front,
    back,
    difficulty,
    nextReviewDate: nowIso,
    reviewCount: 0,
    consecutiveCorrect: 0,
    ...(notes ? { notes } : {}),
  };
}

function shiftDifficulty(difficulty: Difficulty, step: number): Difficulty {
  const index = Math.min(DIFFICULTY_LEVELS.length - 1, Math.max(0, DIFFICULTY_LEVELS.indexOf(difficulty) + step));
  return DIFFICULTY_LEVELS[index];
}

export function nextDifficulty(difficulty: Difficulty, rating: Rating): Difficulty {
  if (rating <= 1) {
    return shiftDifficulty(difficulty, 1);
  }
  if (rating >= 4) {
    return shiftDifficulty(difficulty, -1);
  }
  return difficulty;
}

/**
 * Returns the card as it stands after one review at `nowIso`.
 *
 * The schedule uses the drifted difficulty together with the history the card had
 * before this review, so the first review of a card takes the first-review branch
 * and the elapsed gap is measured from the previous review.
 */
export function applyReview(card: Card, rating: Rating, isCorrect: boolean, nowIso: string): Card {
  const difficulty = nextDifficulty(card.difficulty, rating);
  const nextReviewDate = computeNextReview(
    { difficulty, reviewCount: card.reviewCount, lastReviewed: card.lastReviewed },
    rating,
    nowIso,
  );

  return {
    ...card,
    difficulty,
    nextReviewDate,
    reviewCount: card.reviewCount + 1,
    consecutiveCorrect: isCorrect ? card.consecutiveCorrect + 1 : 0,
    lastReviewed: nowIso,
  };
}

export function previewReview(card: Card, nowIso: string): RatingIntervalPreview {
  return previewIntervals(card, nowIso, nextDifficulty);
}

export function isCardDue(card: Card, nowIso: string): boolean {
  return isDue(card.nextReviewDate, nowIso);
}

export function dueCards(deck: Deck, nowIso: string): Card[] {
  return deck.cards.filter((card) => isCardDue(card, nowIso));
}

export function dueCardCount(deck: Deck, nowIso: string): number {
  return dueCards(deck, nowIso).length;
}

export function newCards(deck: Deck): Card[] {
  return deck.cards.filter((card) => card.reviewCount === 0);
}

export function requireCardIndex(deck: Deck, cardId: string): number {
  const index = deck.cards.findIndex((card) => card.id === cardId);
  if (index < 0) {
    throw new NotFoundError('card', cardId);
  }
  return index;
}

export function cloneCard(card: Card): Card {
  return { ...card };
}

export function cloneDeck(deck: Deck): Deck {
  return { ...deck, cards: deck.cards.map(cloneCard) };
}
