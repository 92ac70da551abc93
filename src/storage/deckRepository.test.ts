import fs from 'fs';
import os from 'os';
import path from 'path';
import { DeckRepository } from './deckRepository';
import { CorruptDataError, PersistenceWriteError } from '../errors';
import { Deck } from '../types';

const SPANISH: Deck = {
  id: '5f0c2b1e-8d1a-4c7e-9b1f-2a3b4c5d6e7f',
  name: 'Spanish Basics',
  targetLanguage: 'Spanish',
  nativeLanguage: 'English',
  createdAt: '2026-02-20T09:00:00.000Z',
  lastStudied: '2026-02-22T18:30:00.000Z',
  cards: [
    {
      id: '0d9e6a52-1b8f-4e0c-a7d3-6f2e9c1b4a58',
      front: 'perro',
      back: 'dog',
      difficulty: 2,
      nextReviewDate: '2026-02-24T18:30:00.000Z',
      reviewCount: 1,
      consecutiveCorrect: 1,
      lastReviewed: '2026-02-22T18:30:00.000Z',
      notes: 'el perro',
    },
    {
      id: 'a1c7e3f9-5b2d-4a6e-8c0f-3d9b7e1a2c4f',
      front: 'gato',
      back: 'cat',
      difficulty: 3,
      nextReviewDate: '2026-02-20T09:05:00.000Z',
      reviewCount: 0,
      consecutiveCorrect: 0,
    },
  ],
};

const FRENCH: Deck = {
  id: 'c3d4e5f6-a7b8-4c9d-8e0f-1a2b3c4d5e6f',
  name: 'French Verbs',
  targetLanguage: 'French',
  nativeLanguage: 'English',
  createdAt: '2026-02-21T10:00:00.000Z',
  cards: [],
};

function validCardJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'card-1',
    front: 'perro',
    back: 'dog',
    difficulty: 3,
    nextReviewDate: '2026-02-24T18:30:00.000Z',
    reviewCount: 1,
    consecutiveCorrect: 1,
    ...overrides,
  };
}

function deckJson(cards: unknown[], overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'deck-1',
    name: 'Spanish Basics',
    targetLanguage: 'Spanish',
    nativeLanguage: 'English',
    createdAt: '2026-02-20T09:00:00.000Z',
    cards,
    ...overrides,
  };
}

describe('DeckRepository', () => {
  let dir: string;
  let filePath: string;
  let repository: DeckRepository;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vocab-srs-'));
    filePath = path.join(dir, 'language_learning_data.json');
    repository = new DeckRepository(filePath);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeRaw(payload: unknown): void {
    fs.writeFileSync(filePath, typeof payload === 'string' ? payload : JSON.stringify(payload));
  }

  function loadError(): unknown {
    try {
      repository.load();
    } catch (error) {
      return error;
    }
    throw new Error('expected load to fail');
  }

  it('returns null when nothing has been saved yet', () => {
    expect(repository.load()).toBeNull();
  });

  it('round-trips decks including absent optional fields', () => {
    repository.save([SPANISH, FRENCH]);

    const loaded = repository.load();

    expect(loaded).toStrictEqual([SPANISH, FRENCH]);
    expect(loaded?.[1]).not.toHaveProperty('lastStudied');
    expect(loaded?.[0].cards[1]).not.toHaveProperty('lastReviewed');
    expect(loaded?.[0].cards[1]).not.toHaveProperty('notes');
  });

  it('writes a JSON array of deck records', () => {
    repository.save([FRENCH]);

    expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual([FRENCH]);
  });

  it('creates missing parent directories and leaves no temporary file behind', () => {
    const nested = new DeckRepository(path.join(dir, 'a', 'b', 'decks.json'));

    nested.save([FRENCH]);

    expect(fs.readdirSync(path.join(dir, 'a', 'b'))).toEqual(['decks.json']);
  });

  it('replaces the previous document on every save', () => {
    repository.save([SPANISH, FRENCH]);
    repository.save([FRENCH]);

    expect(repository.load()).toEqual([FRENCH]);
  });

  it('treats null optional fields as absent', () => {
    writeRaw([deckJson([validCardJson({ notes: null, lastReviewed: null })], { lastStudied: null })]);

    const [deck] = repository.load() ?? [];

    expect(deck.lastStudied).toBeUndefined();
    expect(deck.cards[0]).not.toHaveProperty('notes');
  });

  it('reports a document that is not JSON as corrupt', () => {
    writeRaw('{"decks": [');

    const error = loadError();

    expect(error).toBeInstanceOf(CorruptDataError);
    expect(error).toMatchObject({ code: 'CORRUPT_DATA', filePath });
  });

  it('reports an empty document as corrupt', () => {
    writeRaw('');

    expect(loadError()).toBeInstanceOf(CorruptDataError);
  });

  it('requires the top level to be an array', () => {
    writeRaw({ decks: [] });

    expect(loadError()).toMatchObject({ fieldPath: '$', message: 'Expected an array of decks at $' });
  });

  it('points at the offending field', () => {
    writeRaw([deckJson([validCardJson(), validCardJson({ id: 'card-2', difficulty: 7 })])]);

    expect(loadError()).toMatchObject({
      fieldPath: '[0].cards[1].difficulty',
      message: 'Expected a difficulty from 1 to 5 at [0].cards[1].difficulty',
    });
  });

  it.each([
    ['missing front', validCardJson({ front: undefined }), '[0].cards[0].front'],
    ['negative review count', validCardJson({ reviewCount: -1 }), '[0].cards[0].reviewCount'],
    ['fractional streak', validCardJson({ consecutiveCorrect: 0.5 }), '[0].cards[0].consecutiveCorrect'],
    ['streak above review count', validCardJson({ consecutiveCorrect: 2 }), '[0].cards[0].consecutiveCorrect'],
    ['loose timestamp', validCardJson({ nextReviewDate: 'Feb 24 2026' }), '[0].cards[0].nextReviewDate'],
    ['numeric notes', validCardJson({ notes: 12 }), '[0].cards[0].notes'],
  ])('rejects a card with %s', (_label, card, fieldPath) => {
    writeRaw([deckJson([card])]);

    const error = loadError();

    expect(error).toBeInstanceOf(CorruptDataError);
    expect(error).toMatchObject({ fieldPath });
  });

  it('rejects duplicate card ids within a deck', () => {
    writeRaw([deckJson([validCardJson(), validCardJson()])]);

    expect(loadError()).toMatchObject({ fieldPath: '[0].cards[1].id' });
  });

  it('rejects duplicate deck ids', () => {
    writeRaw([deckJson([]), deckJson([])]);

    expect(loadError()).toMatchObject({ fieldPath: '[1].id' });
  });

  it('raises a write error and keeps the previous document when the target cannot be written', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const blocked = new DeckRepository(path.join(blocker, 'decks.json'));

    expect(() => blocked.save([FRENCH])).toThrow(PersistenceWriteError);
    expect(fs.readFileSync(blocker, 'utf8')).toBe('not a directory');
  });

  it('still reports the write error when the temporary file cannot be removed', () => {
    fs.mkdirSync(filePath);
    const rmSync = jest.spyOn(fs, 'rmSync').mockImplementation(() => {
      throw new Error('EPERM: operation not permitted');
    });

    try {
      expect(() => repository.save([FRENCH])).toThrow(PersistenceWriteError);
      expect(rmSync).toHaveBeenCalledWith(`${filePath}.${process.pid}.tmp`, { force: true });
    } finally {
      rmSync.mockRestore();
    }
  });

  it('moves a corrupt document aside', () => {
    writeRaw('garbage');

    const moved = repository.quarantine('2026-02-23T12:00:00.000Z');

    expect(moved).toBe(`${filePath}.corrupt-2026-02-23T12-00-00-000Z`);
    expect(fs.existsSync(filePath)).toBe(false);
    expect(fs.readFileSync(`${filePath}.corrupt-2026-02-23T12-00-00-000Z`, 'utf8')).toBe('garbage');
  });

  it('has nothing to quarantine when no document exists', () => {
    expect(repository.quarantine('2026-02-23T12:00:00.000Z')).toBeNull();
  });
});
