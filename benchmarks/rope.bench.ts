/**
 * Benchmark: Rope edits vs native strings vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import {
  ropeConcat,
  ropeEmpty,
  ropeFromChunks,
  ropeFromText,
  ropeInsert,
  ropeLineStart,
  ropeProduce,
  ropeToText,
} from '../packages/core/src/index';

// ===== Setup =====
const LINES = 10000;

function createLines(size: number): string[] {
  return Array.from({ length: size }, (_, i) => `line ${i}\n`);
}

const nativeLines = createLines(LINES);
const nativeText = nativeLines.join('');
const nativeChars = [...nativeText];
const ropeText = ropeFromChunks(nativeLines);

// ===== Append benchmarks =====
describe('Append 1000 single characters', () => {
  bench('Native', () => {
    let s = '';
    for (let i = 0; i < 1000; i++) s += 'x';
    return s;
  });

  bench('Rope', () => {
    let rope = ropeEmpty();
    for (let i = 0; i < 1000; i++) rope = ropeConcat(rope, ropeFromText('x'));
    return rope;
  });

  bench('Rope (transient)', () => {
    return ropeProduce(ropeEmpty(), (draft) => {
      for (let i = 0; i < 1000; i++) draft.append('x');
    });
  });
});

// ===== Insert benchmarks =====
describe('Insert in the middle of 10000 lines', () => {
  const middle = nativeText.length >>> 1;

  bench('Native', () => {
    return nativeText.slice(0, middle) + 'inserted' + nativeText.slice(middle);
  });

  bench('Rope', () => {
    return ropeInsert(ropeText, middle, 'inserted');
  });

  bench('Immer produce() (char array)', () => {
    return immerProduce(nativeChars, (draft) => {
      draft.splice(middle, 0, ...'inserted');
    });
  });
});

// ===== Line lookup benchmarks =====
describe('Find the start of line 7500', () => {
  bench('Native', () => {
    let offset = 0;
    for (let line = 0; line < 7500; line++) {
      offset = nativeText.indexOf('\n', offset) + 1;
    }
    return offset;
  });

  bench('Rope', () => {
    return ropeLineStart(ropeText, 7500);
  });
});

describe('Materialize 10000 lines', () => {
  bench('Native join', () => {
    return nativeLines.join('');
  });

  bench('Rope', () => {
    return ropeToText(ropeText);
  });
});
