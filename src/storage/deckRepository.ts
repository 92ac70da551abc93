import fs from 'fs';
import path from 'path';
import { CorruptDataError, PersistenceWriteError } from '../errors';
import { Card, Deck } from '../types';
import { isDifficulty } from '../utils/rating';
import { isIsoDateTime } from '../utils/time';

type RawRecord = Record<string, unknown>;

class SchemaError extends Error {
  constructor(
    message: string,
    readonly fieldPath: string,
  ) {
    super(message);
  }
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: RawRecord, key: string, at: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError('Expected a non-empty string', `${at}.${key}`);
  }
  return value;
}

function readOptionalString(raw: RawRecord, key: string, at: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new SchemaError('Expected a string', `${at}.${key}`);
  }
  return value;
}

function readTimestamp(raw: RawRecord, key: string, at: string): string {
  const value = raw[key];
  if (!isIsoDateTime(value)) {
    throw new SchemaError('Expected an ISO-8601 timestamp', `${at}.${key}`);
  }
  return value;
}

function readOptionalTimestamp(raw: RawRecord, key: string, at: string): string | undefined {
  if (raw[key] === undefined || raw[key] === null) {
    return undefined;
  }
  return readTimestamp(raw, key, at);
}

function readCount(raw: RawRecord, key: string, at: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new SchemaError('Expected a non-negative integer', `${at}.${key}`);
  }
  return value;
}

function parseCard(raw: unknown, at: string): Card {
  if (!isRecord(raw)) {
    throw new SchemaError('Expected a card object', at);
  }
  const difficulty = raw.difficulty;
  if (!isDifficulty(difficulty)) {
    throw new SchemaError('Expected a difficulty from 1 to 5', `${at}.difficulty`);
  }
  const reviewCount = readCount(raw, 'reviewCount', at);
  const consecutiveCorrect = readCount(raw, 'consecutiveCorrect', at);
  if (consecutiveCorrect > reviewCount) {
    throw new SchemaError('Correct streak exceeds review count', `${at}.consecutiveCorrect`);
  }
  const lastReviewed = readOptionalTimestamp(raw, 'lastReviewed', at);
  const notes = readOptionalString(raw, 'notes', at);

  return {
    id: readString(raw, 'id', at),
    front: readString(raw, 'front', at),
    back: readString(raw, 'back', at),
    difficulty,
    nextReviewDate: readTimestamp(raw, 'nextReviewDate', at),
    reviewCount,
    consecutiveCorrect,
    ...(lastReviewed !== undefined ? { lastReviewed } : {}),
    ...(notes !== undefined ? { notes } : {}),
  };
}

function parseDeck(raw: unknown, at: string): Deck {
  if (!isRecord(raw)) {
    throw new SchemaError('Expected a deck object', at);
  }
  if (!Array.isArray(raw.cards)) {
    throw new SchemaError('Expected a card array', `${at}.cards`);
  }
  const cards = raw.cards.map((item: unknown, index) => parseCard(item, `${at}.cards[${index}]`));
  const seenCardIds = new Set<string>();
  cards.forEach((card, index) => {
    if (seenCardIds.has(card.id)) {
      throw new SchemaError(`Duplicate card id ${card.id}`, `${at}.cards[${index}].id`);
    }
    seenCardIds.add(card.id);
  });
  const lastStudied = readOptionalTimestamp(raw, 'lastStudied', at);

  return {
    id: readString(raw, 'id', at),
    name: readString(raw, 'name', at),
    targetLanguage: readString(raw, 'targetLanguage', at),
    nativeLanguage: readString(raw, 'nativeLanguage', at),
    cards,
    createdAt: readTimestamp(raw, 'createdAt', at),
    ...(lastStudied !== undefined ? { lastStudied } : {}),
  };
}

export function parseDeckCollection(payload: unknown): Deck[] {
  if (!Array.isArray(payload)) {
    throw new SchemaError('Expected an array of decks', '$');
  }
  const decks = payload.map((item: unknown, index) => parseDeck(item, `[${index}]`));
  const seenDeckIds = new Set<string>();
  decks.forEach((deck, index) => {
    if (seenDeckIds.has(deck.id)) {
      throw new SchemaError(`Duplicate deck id ${deck.id}`, `[${index}].id`);
    }
    seenDeckIds.add(deck.id);
  });
  return decks;
}

// fs errors can come from another realm (Jest sandboxes), so `instanceof Error` is not reliable here.
function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Best-effort cleanup of a leftover temporary file; the write failure is what gets reported.
function removeQuietly(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true });
  } catch {
    return;
  }
}

/**
 * Single-document JSON store for the whole deck collection.
 * One process owns the file; every save rewrites it in full.
 */
export class DeckRepository {
  constructor(readonly filePath: string) {}

  load(): Deck[] | null {
    let serialized: string;
    try {
      serialized = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new CorruptDataError('Saved decks could not be read', this.filePath, undefined, { cause: error });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(serialized);
    } catch (error) {
      throw new CorruptDataError('Saved decks are not valid JSON', this.filePath, undefined, { cause: error });
    }

    try {
      return parseDeckCollection(payload);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new CorruptDataError(error.message, this.filePath, error.fieldPath, { cause: error });
      }
      throw error;
    }
  }

  save(decks: readonly Deck[]): void {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(decks, null, 2)}\n`, 'utf8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      removeQuietly(tempPath);
      throw new PersistenceWriteError(this.filePath, { cause: error });
    }
  }

  /** Moves an unreadable document aside so the next save does not overwrite it. */
  quarantine(nowIso: string): string | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }
    const stamp = nowIso.replace(/[:.]/g, '-');
    const target = `${this.filePath}.corrupt-${stamp}`;
    fs.renameSync(this.filePath, target);
    return target;
  }
}
