import { describe, it, expect } from 'vitest';
import { advance, COLUMN_LETTERS, ROW_LETTERS, stepsBetween } from './alphabet.js';

describe('alphabets', () => {
  it('leave out I and O', () => {
    expect(COLUMN_LETTERS).toHaveLength(24);
    expect(ROW_LETTERS).toHaveLength(20);
    expect(COLUMN_LETTERS).not.toMatch(/[IO]/);
    expect(ROW_LETTERS).not.toMatch(/[IO]/);
  });
});

describe('advance', () => {
  it('walks forward from the origin', () => {
    expect(advance(COLUMN_LETTERS, 'J', 2)).toBe('L');
    expect(advance(ROW_LETTERS, 'A', 17)).toBe('T');
  });

  it('skips I and O', () => {
    expect(advance(COLUMN_LETTERS, 'H', 1)).toBe('J');
    expect(advance(COLUMN_LETTERS, 'N', 1)).toBe('P');
  });

  it('wraps at the end', () => {
    expect(advance(COLUMN_LETTERS, 'S', 7)).toBe('Z');
    expect(advance(COLUMN_LETTERS, 'S', 8)).toBe('A');
    expect(advance(ROW_LETTERS, 'V', 1)).toBe('A');
    expect(advance(ROW_LETTERS, 'F', 17)).toBe('C');
  });

  it('wraps backwards', () => {
    expect(advance(COLUMN_LETTERS, 'A', -1)).toBe('Z');
  });
});

describe('stepsBetween', () => {
  it('counts forward steps', () => {
    expect(stepsBetween(COLUMN_LETTERS, 'J', 'L')).toBe(2);
    expect(stepsBetween(ROW_LETTERS, 'A', 'A')).toBe(0);
    expect(stepsBetween(ROW_LETTERS, 'F', 'C')).toBe(17);
    expect(stepsBetween(COLUMN_LETTERS, 'S', 'A')).toBe(8);
  });

  it('gives up on letters outside the alphabet', () => {
    expect(stepsBetween(COLUMN_LETTERS, 'A', 'I')).toBeUndefined();
    expect(stepsBetween(ROW_LETTERS, 'A', 'O')).toBeUndefined();
    expect(stepsBetween(ROW_LETTERS, 'A', 'W')).toBeUndefined();
    expect(stepsBetween(ROW_LETTERS, 'A', '1')).toBeUndefined();
  });
});
