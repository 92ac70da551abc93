import { Difficulty, Rating } from '../types';

export const DIFFICULTY_MIN = 1;
export const DIFFICULTY_MAX = 5;
export const DIFFICULTY_DEFAULT: Difficulty = 3;
export const DIFFICULTY_LEVELS: readonly Difficulty[] = [1, 2, 3, 4, 5];

export const RATING_MIN = 0;
export const RATING_MAX = 5;
export const RATINGS: readonly Rating[] = [0, 1, 2, 3, 4, 5];
export const CORRECT_RATING_THRESHOLD = 3;
export const RATING_DEFAULT: Rating = 3;

export const BASE_EASE = 2.5;
export const MIN_EASE = 1.3;
export const EASE_STEP = 0.1;
export const POOR_RECALL_MULTIPLIER = 0.5;
export const EASY_RECALL_MULTIPLIER = 1.3;
export const MIN_INTERVAL_DAYS = 1;
export const FIRST_REVIEW_GOOD_INTERVAL_DAYS = 2;

export const MASTERY_STREAK = 3;

export const DECK_NAME_MAX_LENGTH = 80;
export const LANGUAGE_MAX_LENGTH = 40;
export const FRONT_MAX_LENGTH = 200;
export const BACK_MAX_LENGTH = 200;
export const NOTES_MAX_LENGTH = 500;
