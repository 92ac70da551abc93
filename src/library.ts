import {
  applyReview,
  cloneCard,
  cloneDeck,
  createCard,
  createDeck,
  dueCards,
  IdFactory,
  NewCardInput,
  NewDeckInput,
  newCards,
  requireCardIndex,
  requireRating,
} from './deck';
import { CorruptDataError, describeError, NotFoundError, PersistenceWriteError, ValidationError } from './errors';
import { Logger, silentLogger } from './logger';
import { DeckRepository } from './storage/deckRepository';
import { Card, Deck } from './types';
import { Clock, nowIso } from './utils/time';

export interface DeckStore {
  load(): Deck[] | null;
  save(decks: readonly Deck[]): void;
  quarantine?(nowIso: string): string | null;
}

export interface DeckLibraryOptions {
  store: DeckStore;
  logger?: Logger;
  clock?: Clock;
  nextId?: IdFactory;
}

const LOG_TAG = '[DeckLibrary]';

/**
 * Owns the deck collection for the running process.
 *
 * Every mutation goes through this class and is followed by a whole-collection save.
 * Callers receive snapshots; editing them has no effect on stored state.
 */
export class DeckLibrary {
  private readonly decks: Deck[];
  private readonly store: DeckStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly nextId: IdFactory | undefined;

  /** Set when the persisted document could not be loaded at start-up. */
  readonly startupError: CorruptDataError | undefined;
  /** The most recent failed save, cleared by the next successful one. */
  lastSaveError: PersistenceWriteError | undefined;

  private constructor(options: DeckLibraryOptions, decks: Deck[], startupError?: CorruptDataError) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? nowIso;
    this.nextId = options.nextId;
    this.decks = decks;
    this.startupError = startupError;
  }

  static open(options: DeckLibraryOptions): DeckLibrary {
    const logger = options.logger ?? silentLogger;
    try {
      const decks = options.store.load();
      logger.debug(`${LOG_TAG} Loaded ${decks?.length ?? 0} deck(s)`);
      return new DeckLibrary(options, decks ?? []);
    } catch (error) {
      if (!(error instanceof CorruptDataError)) {
        throw error;
      }
      logger.error(`${LOG_TAG} Error loading decks, starting empty:`, describeError(error));
      DeckLibrary.quarantineCorruptDocument(options, logger);
      return new DeckLibrary(options, [], error);
    }
  }

  static fromFile(filePath: string, options: Omit<DeckLibraryOptions, 'store'> = {}): DeckLibrary {
    return DeckLibrary.open({ ...options, store: new DeckRepository(filePath) });
  }

  private static quarantineCorruptDocument(options: DeckLibraryOptions, logger: Logger): void {
    if (!options.store.quarantine) {
      return;
    }
    try {
      const moved = options.store.quarantine((options.clock ?? nowIso)());
      if (moved) {
        logger.warn(`${LOG_TAG} Unreadable data kept at ${moved}`);
      }
    } catch (error) {
      logger.error(`${LOG_TAG} Could not move unreadable data aside:`, describeError(error));
    }
  }

  get deckCount(): number {
    return this.decks.length;
  }

  now(): string {
    return this.clock();
  }

  listDecks(): Deck[] {
    return this.decks.map(cloneDeck);
  }

  getDeck(deckId: string): Deck {
    return cloneDeck(this.requireDeck(deckId));
  }

  deckAt(index: number): Deck {
    if (!Number.isInteger(index) || index < 0 || index >= this.decks.length) {
      throw new ValidationError('Invalid deck selection.', 'deckIndex');
    }
    return cloneDeck(this.decks[index]);
  }

  getDueCards(deckId: string): Card[] {
    return dueCards(this.requireDeck(deckId), this.clock()).map(cloneCard);
  }

  getNewCards(deckId: string): Card[] {
    return newCards(this.requireDeck(deckId)).map(cloneCard);
  }

  createDeck(name: string, targetLanguage: string, nativeLanguage: string): Deck {
    const input: NewDeckInput = { name, targetLanguage, nativeLanguage };
    const deck = createDeck(input, this.clock(), this.nextId);
    this.decks.push(deck);
    this.logger.info(`${LOG_TAG} Created deck ${deck.id} (${deck.name})`);
    this.persist();
    return cloneDeck(deck);
  }

  addCard(deckId: string, front: string, back: string, difficulty?: number, notes?: string): Card {
    const deck = this.requireDeck(deckId);
    const input: NewCardInput = { front, back, difficulty, notes };
    const card = createCard(input, this.clock(), this.nextId);
    deck.cards.push(card);
    this.logger.debug(`${LOG_TAG} Added card ${card.id} to deck ${deck.id}`);
    this.persist();
    return cloneCard(card);
  }

  /**
   * Records one review of a card. `rating` drives scheduling and difficulty;
   * `isCorrect` only drives the correct-answer streak.
   */
  reviewCard(deckId: string, cardId: string, rating: number, isCorrect: boolean): Card {
    const validRating = requireRating(rating);
    const deck = this.requireDeck(deckId);
    const index = requireCardIndex(deck, cardId);
    const reviewedAt = this.clock();
    const updated = applyReview(deck.cards[index], validRating, isCorrect, reviewedAt);
    deck.cards[index] = updated;
    deck.lastStudied = reviewedAt;
    this.logger.debug(`${LOG_TAG} Reviewed card ${cardId} (rating ${validRating}), next ${updated.nextReviewDate}`);
    this.persist();
    return cloneCard(updated);
  }

  /** Saves the collection. Returns false when the write failed; the failure is logged and kept. */
  persist(): boolean {
    try {
      this.store.save(this.decks);
      this.lastSaveError = undefined;
      return true;
    } catch (error) {
      if (!(error instanceof PersistenceWriteError)) {
        throw error;
      }
      this.lastSaveError = error;
      this.logger.error(`${LOG_TAG} Error saving decks:`, describeError(error));
      return false;
    }
  }

  private requireDeck(deckId: string): Deck {
    const deck = this.decks.find((candidate) => candidate.id === deckId);
    if (!deck) {
      throw new NotFoundError('deck', deckId);
    }
    return deck;
  }
}
