/**
 * Text chunks - rope elements with their counts computed once
 */

import { textMonoid, type TextMeasure } from './measure';
import type { Measurer } from './types';

export interface Chunk {
  text: string;
  bytes: number;
  chars: number;
  lines: number;
}

const NEWLINE = 10;

function isHighSurrogate(c: number): boolean {
  return c >= 0xd800 && c <= 0xdbff;
}

function isLowSurrogate(c: number): boolean {
  return c >= 0xdc00 && c <= 0xdfff;
}

// UTF-16 index after `chars` code points (clamped to the string end)
export function codePointOffset(text: string, chars: number): number {
  const len = text.length;
  let i = 0;
  let n = 0;
  while (n < chars && i < len) {
    if (isHighSurrogate(text.charCodeAt(i)) && i + 1 < len && isLowSurrogate(text.charCodeAt(i + 1))) {
      i += 2;
    } else {
      i++;
    }
    n++;
  }
  return i;
}

/**
 * Byte length as UTF-8, code point count and `\n` count in one pass.
 * A lone surrogate counts as one char of 3 bytes, as TextEncoder writes it.
 */
export function chunkFromText(text: string): Chunk {
  const len = text.length;
  let bytes = 0;
  let chars = 0;
  let lines = 0;
  for (let i = 0; i < len; i++) {
    const c = text.charCodeAt(i);
    if (c < 0x80) {
      bytes += 1;
      if (c === NEWLINE) lines++;
    } else if (c < 0x800) {
      bytes += 2;
    } else if (isHighSurrogate(c) && i + 1 < len && isLowSurrogate(text.charCodeAt(i + 1))) {
      bytes += 4;
      i++;
    } else {
      bytes += 3;
    }
    chars++;
  }
  return { text, bytes, chars, lines };
}

export function mergeChunks(a: Chunk, b: Chunk): Chunk {
  return {
    text: a.text + b.text,
    bytes: a.bytes + b.bytes,
    chars: a.chars + b.chars,
    lines: a.lines + b.lines,
  };
}

export function splitChunk(chunk: Chunk, chars: number): [Chunk, Chunk] {
  const at = codePointOffset(chunk.text, chars);
  return [chunkFromText(chunk.text.slice(0, at)), chunkFromText(chunk.text.slice(at))];
}

// Chars up to and including the `nth` newline, or -1 when there are fewer
export function charsThroughNewline(text: string, nth: number): number {
  const len = text.length;
  let seen = 0;
  let chars = 0;
  for (let i = 0; i < len; i++) {
    const c = text.charCodeAt(i);
    if (isHighSurrogate(c) && i + 1 < len && isLowSurrogate(text.charCodeAt(i + 1))) i++;
    chars++;
    if (c === NEWLINE && ++seen === nth) return chars;
  }
  return -1;
}

export const textMeasurer: Measurer<TextMeasure, Chunk> = {
  ...textMonoid,
  measure: (chunk) => ({ bytes: chunk.bytes, chars: chunk.chars, lines: chunk.lines }),
};
