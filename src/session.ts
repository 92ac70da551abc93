import { previewReview } from './deck';
import { DeckLibrary } from './library';
import { CORRECT_RATING_THRESHOLD } from './scheduler/constants';
import { RatingIntervalPreview } from './scheduler/sm2';
import { Card, Deck, Rating, StudySession } from './types';
import { answerKey } from './utils/text';

export function startStudySession(deck: Deck, nowIso: string): StudySession {
  return { deck, startTime: nowIso, cardsReviewed: 0, correctResponses: 0 };
}

export function recordResponse(session: StudySession, isCorrect: boolean): StudySession {
  return {
    ...session,
    cardsReviewed: session.cardsReviewed + 1,
    correctResponses: session.correctResponses + (isCorrect ? 1 : 0),
  };
}

export function finishStudySession(session: StudySession, nowIso: string): StudySession {
  return { ...session, endTime: nowIso };
}

/**
 * Elapsed time, measured to `endTime`, or to `nowIso` while the session is running.
 * Undefined for an unfinished session when no `nowIso` is given.
 */
export function sessionDurationMs(session: StudySession, nowIso?: string): number | undefined {
  const end = session.endTime ?? nowIso;
  if (!end) {
    return undefined;
  }
  const elapsed = Date.parse(end) - Date.parse(session.startTime);
  return Number.isFinite(elapsed) ? Math.max(0, elapsed) : 0;
}

export function accuracyPercentage(session: StudySession): number {
  if (session.cardsReviewed === 0) {
    return 0;
  }
  return (session.correctResponses / session.cardsReviewed) * 100;
}

export function isAnswerMatch(answer: string, front: string): boolean {
  const expected = answerKey(front);
  return expected.length > 0 && answerKey(answer) === expected;
}

export interface RatingContext {
  answer: string;
  matched: boolean;
  preview: RatingIntervalPreview;
  position: number;
  total: number;
}

export type CardSelection = 'due' | 'new';

/** The interactive side of a study session. The CLI implements it over readline. */
export interface StudyPrompter {
  confirmNewCards(deck: Deck): Promise<boolean>;
  onStart?(deck: Deck, selection: CardSelection, total: number): Promise<void>;
  askAnswer(card: Card, deck: Deck): Promise<string>;
  askRating(card: Card, context: RatingContext): Promise<Rating>;
  judgeCorrect?(rating: Rating, context: RatingContext): boolean;
  onProgress?(session: StudySession, reviewed: Card, total: number): void;
}

export type RandomSource = () => number;

export interface StudySessionOptions {
  random?: RandomSource;
}

export type StudyEndReason = 'nothing-due' | 'no-new-cards';

export type StudySessionResult =
  | {
      status: 'completed';
      selection: CardSelection;
      session: StudySession;
      reviewed: Card[];
      accuracy: number;
      durationMs: number | undefined;
    }
  | { status: 'ended'; reason: StudyEndReason };

/** Fisher-Yates over a copy of `items`. */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

async function selectCards(
  library: DeckLibrary,
  deck: Deck,
  prompter: StudyPrompter,
): Promise<{ selection: CardSelection; cards: Card[] } | StudyEndReason> {
  const due = library.getDueCards(deck.id);
  if (due.length > 0) {
    return { selection: 'due', cards: due };
  }
  if (!(await prompter.confirmNewCards(deck))) {
    return 'nothing-due';
  }
  const fresh = library.getNewCards(deck.id);
  return fresh.length > 0 ? { selection: 'new', cards: fresh } : 'no-new-cards';
}

/**
 * Runs one study pass over a deck: due cards first, or never-reviewed cards when the
 * learner opts in. Each answer is reviewed and saved before the next card is shown.
 */
export async function runStudySession(
  library: DeckLibrary,
  deckId: string,
  prompter: StudyPrompter,
  options: StudySessionOptions = {},
): Promise<StudySessionResult> {
  const deck = library.getDeck(deckId);
  const picked = await selectCards(library, deck, prompter);
  if (typeof picked === 'string') {
    return { status: 'ended', reason: picked };
  }

  await prompter.onStart?.(deck, picked.selection, picked.cards.length);
  const cards = shuffle(picked.cards, options.random);
  let session = startStudySession(deck, library.now());
  const reviewed: Card[] = [];

  for (const [index, card] of cards.entries()) {
    const answer = await prompter.askAnswer(card, deck);
    const context: RatingContext = {
      answer,
      matched: isAnswerMatch(answer, card.front),
      preview: previewReview(card, library.now()),
      position: index + 1,
      total: cards.length,
    };
    const rating = await prompter.askRating(card, context);
    const isCorrect = prompter.judgeCorrect
      ? prompter.judgeCorrect(rating, context)
      : rating >= CORRECT_RATING_THRESHOLD;

    const updated = library.reviewCard(deck.id, card.id, rating, isCorrect);
    reviewed.push(updated);
    session = recordResponse(session, isCorrect);
    prompter.onProgress?.(session, updated, cards.length);
  }

  session = finishStudySession(session, library.now());
  return {
    status: 'completed',
    selection: picked.selection,
    session,
    reviewed,
    accuracy: accuracyPercentage(session),
    durationMs: sessionDurationMs(session),
  };
}
