import { DIFFICULTY_MAX, DIFFICULTY_MIN, RATING_MAX, RATING_MIN } from '../scheduler/constants';
import { Difficulty, Rating } from '../types';

const NUMERIC_INPUT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

export function parseRuntimeNumber(input: unknown): number {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : Number.NaN;
  }
  if (typeof input !== 'string') {
    return Number.NaN;
  }
  const trimmed = input.trim();
  if (!NUMERIC_INPUT_RE.test(trimmed)) {
    return Number.NaN;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

export function isRating(value: unknown): value is Rating {
  return isIntegerInRange(value, RATING_MIN, RATING_MAX);
}

export function isDifficulty(value: unknown): value is Difficulty {
  return isIntegerInRange(value, DIFFICULTY_MIN, DIFFICULTY_MAX);
}

export function parseRatingInput(input: unknown): Rating | null {
  const parsed = parseRuntimeNumber(input);
  return isRating(parsed) ? parsed : null;
}

export function parseDifficultyInput(input: unknown): Difficulty | null {
  const parsed = parseRuntimeNumber(input);
  return isDifficulty(parsed) ? parsed : null;
}
