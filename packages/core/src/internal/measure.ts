/**
 * Measures - monoids elements and subtrees aggregate into
 */

import type { Monoid } from './types';

export interface TextMeasure {
  bytes: number;
  chars: number;
  lines: number;
}

export const sumMonoid: Monoid<number> = {
  zero: () => 0,
  add: (a, b) => a + b,
};

// Product of three sum monoids, combined component-wise
export const textMonoid: Monoid<TextMeasure> = {
  zero: () => ({ bytes: 0, chars: 0, lines: 0 }),
  add: (a, b) => ({
    bytes: a.bytes + b.bytes,
    chars: a.chars + b.chars,
    lines: a.lines + b.lines,
  }),
};

export function combine3<M>(monoid: Monoid<M>, a: M, b: M, c: M): M {
  return monoid.add(monoid.add(a, b), c);
}
