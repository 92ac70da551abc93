import { describeError, ValidationError } from '../errors';
import { DeckLibrary } from '../library';
import { DIFFICULTY_DEFAULT, RATING_DEFAULT, RATINGS } from '../scheduler/constants';
import { RandomSource, runStudySession, StudyPrompter } from '../session';
import { computeDeckStats } from '../stats';
import { Deck, Rating } from '../types';
import { formatIntervalLabel } from '../utils/interval';
import { parseDifficultyInput, parseRatingInput, parseRuntimeNumber } from '../utils/rating';
import { formatDuration, formatTimestamp } from '../utils/time';
import { askLine, InputClosedError, PromptIO } from './io';

const RULE = '================================================';
const CARD_DIVIDER = '------------------------------------------------';

const MAIN_MENU = [
  '',
  'MAIN MENU:',
  '1. Create a new deck',
  '2. View all decks',
  '3. Add cards to a deck',
  '4. Study a deck',
  '5. View statistics',
  '6. Exit',
  '',
];

const RATING_LABELS: Record<Rating, string> = {
  0: 'Completely wrong',
  1: 'Mostly wrong',
  2: 'Partially correct',
  3: 'Mostly correct with mistakes',
  4: 'Almost perfect',
  5: 'Perfect',
};

export interface MenuOptions {
  random?: RandomSource;
}

function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function reportSaveFailure(library: DeckLibrary, io: PromptIO): void {
  if (library.lastSaveError) {
    io.print(`Warning: ${describeError(library.lastSaveError)}. Changes are kept until the next successful save.`);
  }
}

async function selectDeck(library: DeckLibrary, io: PromptIO, question: string): Promise<Deck | null> {
  const input = await askLine(io, question);
  const deckNumber = parseRuntimeNumber(input);
  try {
    return library.deckAt(deckNumber - 1);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }
    io.print('Invalid deck selection.');
    return null;
  }
}

async function createDeckStep(library: DeckLibrary, io: PromptIO): Promise<void> {
  io.print('\n=== CREATE NEW DECK ===');

  const name = await askLine(io, 'Enter deck name: ');
  if (!name.trim()) {
    io.print('Deck name cannot be empty.');
    return;
  }
  const targetLanguage = await askLine(io, 'Enter target language: ');
  if (!targetLanguage.trim()) {
    io.print('Target language cannot be empty.');
    return;
  }
  const nativeLanguage = await askLine(io, 'Enter your native language: ');
  if (!nativeLanguage.trim()) {
    io.print('Native language cannot be empty.');
    return;
  }

  try {
    const deck = library.createDeck(name, targetLanguage, nativeLanguage);
    io.print(`\nDeck '${deck.name}' has been created!`);
    reportSaveFailure(library, io);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }
    io.print(error.message);
  }
}

function viewDecks(library: DeckLibrary, io: PromptIO): void {
  io.print('\n=== YOUR DECKS ===');

  const decks = library.listDecks();
  if (decks.length === 0) {
    io.print("You don't have any decks yet. Create one to get started!");
    return;
  }

  const now = library.now();
  decks.forEach((deck, index) => {
    const stats = computeDeckStats(deck, now);
    io.print(`${index + 1}. ${deck.name} (${deck.targetLanguage} / ${deck.nativeLanguage})`);
    io.print(`   Total cards: ${stats.total}, Due for review: ${stats.due}`);
    io.print(deck.lastStudied ? `   Last studied: ${formatTimestamp(deck.lastStudied)}` : '   Not studied yet');
    io.print();
  });
}

async function addCardsStep(library: DeckLibrary, io: PromptIO): Promise<void> {
  if (library.deckCount === 0) {
    io.print('\nYou need to create a deck first!');
    return;
  }

  io.print('\n=== ADD CARDS TO DECK ===');
  viewDecks(library, io);
  const deck = await selectDeck(library, io, 'Select deck (enter number): ');
  if (!deck) {
    return;
  }
  io.print(`\nAdding cards to '${deck.name}'`);

  let adding = true;
  while (adding) {
    const front = await askLine(io, `\nEnter word or phrase in ${deck.targetLanguage}: `);
    if (!front.trim()) {
      io.print('Word/phrase cannot be empty.');
      continue;
    }
    const back = await askLine(io, `Enter translation in ${deck.nativeLanguage}: `);
    if (!back.trim()) {
      io.print('Translation cannot be empty.');
      continue;
    }
    const difficultyInput = await askLine(io, 'Enter difficulty level (1-5, where 1 is easiest, default is 3): ');
    const difficulty = parseDifficultyInput(difficultyInput) ?? DIFFICULTY_DEFAULT;
    const notes = await askLine(io, 'Enter any notes (optional): ');

    try {
      library.addCard(deck.id, front, back, difficulty, notes);
      io.print('Card has been added!');
      reportSaveFailure(library, io);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      io.print(error.message);
      continue;
    }

    adding = isYes(await askLine(io, '\nAdd another card? (y/n): '));
  }
}

export function createCliPrompter(io: PromptIO): StudyPrompter {
  return {
    async confirmNewCards() {
      io.print('\nNo cards are due for review in this deck!');
      return isYes(await askLine(io, 'Would you like to study new cards? (y/n): '));
    },

    async onStart(deck, selection, total) {
      if (selection === 'due') {
        io.print(`\nYou have ${total} cards due for review!`);
      }
      io.print(`\nStudy session started for '${deck.name}'`);
      io.print(`Cards to review: ${total}`);
      await askLine(io, 'Press Enter to begin...');
    },

    async askAnswer(card, deck) {
      io.print(`\n${CARD_DIVIDER}`);
      io.print(`${deck.nativeLanguage}: ${card.back}`);
      return askLine(io, `\nWrite the word in ${deck.targetLanguage}: `);
    },

    async askRating(card, context) {
      io.print(`\nCorrect answer: ${card.front}`);
      io.print(context.matched ? 'Correct!' : 'Not quite right.');
      if (card.notes) {
        io.print(`Notes: ${card.notes}`);
      }

      io.print('\nHow well did you do? (0-5)');
      for (const rating of RATINGS) {
        io.print(`${rating}: ${RATING_LABELS[rating]} (next in ${formatIntervalLabel(context.preview[rating])})`);
      }
      return parseRatingInput(await askLine(io, 'Your rating: ')) ?? RATING_DEFAULT;
    },

    onProgress(session, _card, total) {
      io.print(`\nProgress: ${session.cardsReviewed}/${total} cards reviewed`);
    },
  };
}

async function studyStep(library: DeckLibrary, io: PromptIO, options: MenuOptions): Promise<void> {
  if (library.deckCount === 0) {
    io.print('\nYou need to create a deck first!');
    return;
  }

  io.print('\n=== STUDY DECK ===');
  viewDecks(library, io);
  const deck = await selectDeck(library, io, 'Select deck to study (enter number): ');
  if (!deck) {
    return;
  }

  const result = await runStudySession(library, deck.id, createCliPrompter(io), { random: options.random });
  if (result.status === 'ended') {
    if (result.reason === 'no-new-cards') {
      io.print('\nNo new cards available. Add some cards first!');
    }
    return;
  }

  io.print('\n=== SESSION SUMMARY ===');
  io.print(`Cards reviewed: ${result.session.cardsReviewed}`);
  io.print(`Correct responses: ${result.session.correctResponses}`);
  io.print(`Accuracy: ${percent(result.accuracy)}`);
  if (result.durationMs !== undefined) {
    io.print(`Time spent: ${formatDuration(result.durationMs)}`);
  }
  reportSaveFailure(library, io);
  io.print('\nGreat job! Keep it up!');
}

function viewStatistics(library: DeckLibrary, io: PromptIO): void {
  const decks = library.listDecks();
  if (decks.length === 0) {
    io.print("\nYou don't have any decks yet!");
    return;
  }

  io.print('\n=== YOUR LEARNING STATISTICS ===');
  const now = library.now();
  decks.forEach((deck, index) => {
    const stats = computeDeckStats(deck, now);
    io.print(`\n${index + 1}. ${deck.name} (${deck.targetLanguage})`);
    io.print(`   Total cards: ${stats.total}`);
    io.print('   Difficulty distribution:');
    for (const bucket of stats.difficultyDistribution) {
      io.print(`     Level ${bucket.level}: ${bucket.count} cards (${percent(bucket.percentage)})`);
    }
    io.print(`   Mastery progress: ${stats.mastered}/${stats.total} cards (${percent(stats.masteryPercentage)})`);
    io.print(`   Cards due for review: ${stats.due}`);
    if (deck.lastStudied) {
      io.print(`   Last studied: ${formatTimestamp(deck.lastStudied)}`);
    }
  });
}

/** Interactive main loop. Resolves when the user exits or input ends. */
export async function runMenu(library: DeckLibrary, io: PromptIO, options: MenuOptions = {}): Promise<void> {
  io.print(RULE);
  io.print('           LANGUAGE LEARNING TOOL');
  io.print(RULE);
  if (library.startupError) {
    io.print(`Saved decks could not be read (${describeError(library.startupError)}). Starting with no decks.`);
  }

  try {
    for (;;) {
      MAIN_MENU.forEach((line) => io.print(line));
      const choice = await askLine(io, 'Choose an option: ');
      switch (choice.trim()) {
        case '1':
          await createDeckStep(library, io);
          break;
        case '2':
          viewDecks(library, io);
          break;
        case '3':
          await addCardsStep(library, io);
          break;
        case '4':
          await studyStep(library, io, options);
          break;
        case '5':
          viewStatistics(library, io);
          break;
        case '6':
          io.print('Goodbye! Good luck with your learning!');
          return;
        default:
          io.print('Invalid choice. Please try again.');
      }
    }
  } catch (error) {
    if (!(error instanceof InputClosedError)) {
      throw error;
    }
  }
}
