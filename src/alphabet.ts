// 100 km square letters: I and O never appear, rows stop at V

export const COLUMN_LETTERS = 'ABCDEFGHJKLMNPQRSTUVWXYZ';
export const ROW_LETTERS = 'ABCDEFGHJKLMNPQRSTUV';

export type Alphabet = typeof COLUMN_LETTERS | typeof ROW_LETTERS;

/** Letter `steps` positions after `origin`, wrapping at the end of the alphabet. */
export function advance(alphabet: Alphabet, origin: string, steps: number): string {
  const size = alphabet.length;
  const index = ((alphabet.indexOf(origin) + steps) % size + size) % size;
  return alphabet.charAt(index);
}

/**
 * Forward steps from `origin` to `target`. The walk gives up after wrapping
 * twice, so letters outside the alphabet yield undefined.
 */
export function stepsBetween(alphabet: Alphabet, origin: string, target: string): number | undefined {
  const size = alphabet.length;
  const start = alphabet.indexOf(origin);
  if (start < 0) return undefined;

  for (let steps = 0; steps < size * 2; steps++) {
    if (alphabet.charAt((start + steps) % size) === target) return steps;
  }
  return undefined;
}
