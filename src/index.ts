export * from './types';
export * from './errors';
export { AppConfig, loadConfig } from './config';
export { createLogger, Logger, LogLevel, LogSink, silentLogger } from './logger';
export { easeFactor, intervalDays, computeNextReview, previewIntervals, RatingIntervalPreview } from './scheduler/sm2';
export { applyReview, createCard, createDeck, dueCardCount, dueCards, newCards, nextDifficulty, previewReview } from './deck';
export { DeckRepository, parseDeckCollection } from './storage/deckRepository';
export { DeckLibrary, DeckLibraryOptions, DeckStore } from './library';
export {
  accuracyPercentage,
  finishStudySession,
  isAnswerMatch,
  recordResponse,
  runStudySession,
  sessionDurationMs,
  startStudySession,
  StudyPrompter,
  StudySessionResult,
} from './session';
export { computeDeckStats, isMastered } from './stats';
