import { isDifficulty, isRating, parseDifficultyInput, parseRatingInput, parseRuntimeNumber } from './rating';

describe('parseRuntimeNumber', () => {
  it('accepts numbers and decimal numeric strings', () => {
    expect(parseRuntimeNumber(3)).toBe(3);
    expect(parseRuntimeNumber('4')).toBe(4);
    expect(parseRuntimeNumber(' 2.0 ')).toBe(2);
    expect(parseRuntimeNumber('4e0')).toBe(4);
    expect(parseRuntimeNumber('.5')).toBe(0.5);
  });

  it('rejects malformed values', () => {
    expect(parseRuntimeNumber('0x4')).toBeNaN();
    expect(parseRuntimeNumber('Infinity')).toBeNaN();
    expect(parseRuntimeNumber(Number.POSITIVE_INFINITY)).toBeNaN();
    expect(parseRuntimeNumber(Number.NaN)).toBeNaN();
    expect(parseRuntimeNumber('')).toBeNaN();
    expect(parseRuntimeNumber('abc')).toBeNaN();
    expect(parseRuntimeNumber(null)).toBeNaN();
  });
});

describe('rating and difficulty guards', () => {
  it('accepts integer ratings from 0 to 5', () => {
    expect([0, 1, 2, 3, 4, 5].every((value) => isRating(value))).toBe(true);
    expect(isRating(-1)).toBe(false);
    expect(isRating(6)).toBe(false);
    expect(isRating(2.5)).toBe(false);
    expect(isRating('3')).toBe(false);
  });

  it('accepts integer difficulties from 1 to 5', () => {
    expect(isDifficulty(1)).toBe(true);
    expect(isDifficulty(5)).toBe(true);
    expect(isDifficulty(0)).toBe(false);
    expect(isDifficulty(6)).toBe(false);
  });

  it('parses typed rating input', () => {
    expect(parseRatingInput(' 4 ')).toBe(4);
    expect(parseRatingInput('0')).toBe(0);
    expect(parseRatingInput('6')).toBeNull();
    expect(parseRatingInput('three')).toBeNull();
    expect(parseRatingInput('2.5')).toBeNull();
  });

  it('parses typed difficulty input', () => {
    expect(parseDifficultyInput('2')).toBe(2);
    expect(parseDifficultyInput('0')).toBeNull();
    expect(parseDifficultyInput('')).toBeNull();
  });
});
