/**
 * Rope - text sequence over the augmented tree
 *
 * Elements are text chunks measured by (UTF-8 bytes, code points, newlines).
 * ropeConcat merges the two chunks meeting at the junction while they fit in
 * CHUNK_SIZE bytes, so repeated small appends do not fragment the tree.
 * ropeProduce applies the same merging to a batch of edits on a draft.
 */

import {
  CHUNK_SIZE,
  EMPTY,
  charsThroughNewline,
  chunkFromText,
  concatNodes,
  mergeChunks,
  nodeMeasure,
  openSession,
  singletonNode,
  splitChunk,
  textMeasurer,
  unconsNode,
  unsnocNode,
  type Chunk,
  type Node,
  type Owner,
  type Seq,
  type TextMeasure,
} from './internal';
import {
  seqConcat,
  seqEmpty,
  seqFromArray,
  seqIsEmpty,
  seqIter,
  seqMeasure,
  seqSingleton,
  seqSplit,
  seqUncons,
  seqUnsnoc,
} from './seq';

export type Rope = Seq<TextMeasure, Chunk>;

export interface RopeDraft {
  readonly measure: TextMeasure;
  append(text: string): void;
  prepend(text: string): void;
  appendRope(other: Rope): void;
  prependRope(other: Rope): void;
}

type RopeNode = Node<TextMeasure, Chunk>;

export function ropeEmpty(): Rope {
  return seqEmpty(textMeasurer);
}

export function ropeFromText(text: string): Rope {
  if (text === '') return ropeEmpty();
  return seqSingleton(textMeasurer, chunkFromText(text));
}

// One chunk per non-empty text, no merging
export function ropeFromChunks(texts: Iterable<string>): Rope {
  const chunks: Chunk[] = [];
  for (const text of texts) {
    if (text !== '') chunks.push(chunkFromText(text));
  }
  return seqFromArray(textMeasurer, chunks);
}

export function ropeMeasure(rope: Rope): TextMeasure {
  return seqMeasure(rope);
}

export function ropeIsEmpty(rope: Rope): boolean {
  return seqIsEmpty(rope);
}

export function ropeToText(rope: Rope): string {
  const parts: string[] = [];
  for (const chunk of seqIter(rope)) {
    parts.push(chunk.text);
  }
  return parts.join('');
}

export function* ropeChunks(rope: Rope): IterableIterator<string> {
  for (const chunk of seqIter(rope)) {
    yield chunk.text;
  }
}

function joinNodes(a: RopeNode, b: RopeNode, owner: Owner, chunkSize: number): RopeNode {
  const m = textMeasurer;
  if (b.kind === 'empty') return a;
  const tail = unsnocNode(m, owner, a);
  if (!tail) return b;
  const [leftRest, last] = tail;

  const head = unconsNode(m, owner, b);
  if (!head) return concatNodes(m, owner, leftRest, singletonNode(m, owner, last));
  const [first, rightRest] = head;

  const middle =
    last.bytes + first.bytes <= chunkSize
      ? singletonNode(m, owner, mergeChunks(last, first))
      : concatNodes(m, owner, singletonNode(m, owner, last), singletonNode(m, owner, first));
  return concatNodes(m, owner, concatNodes(m, owner, leftRest, middle), rightRest);
}

export function ropeConcat(a: Rope, b: Rope, chunkSize = CHUNK_SIZE): Rope {
  if (b.root.kind === 'empty') return a;
  if (a.root.kind === 'empty') return b;
  return { measurer: textMeasurer, root: joinNodes(a.root, b.root, undefined, chunkSize) };
}

/**
 * Batch edits with chunk merging; `rope` is left untouched and the draft
 * throws once ropeProduce has returned.
 */
export function ropeProduce(rope: Rope, recipe: (draft: RopeDraft) => void, chunkSize = CHUNK_SIZE): Rope {
  const session = openSession('ropeProduce');
  const { owner } = session;
  let root = rope.root;

  const single = (text: string): RopeNode =>
    text === '' ? EMPTY : singletonNode(textMeasurer, owner, chunkFromText(text));

  const draft: RopeDraft = {
    get measure() {
      session.check();
      return nodeMeasure(textMeasurer, root);
    },
    append(text) {
      session.check();
      root = joinNodes(root, single(text), owner, chunkSize);
    },
    prepend(text) {
      session.check();
      root = joinNodes(single(text), root, owner, chunkSize);
    },
    appendRope(other) {
      session.check();
      root = joinNodes(root, other.root, owner, chunkSize);
    },
    prependRope(other) {
      session.check();
      root = joinNodes(other.root, root, owner, chunkSize);
    },
  };

  try {
    recipe(draft);
  } finally {
    session.revoke();
  }
  return root === rope.root ? rope : { measurer: textMeasurer, root };
}

export function ropeUncons(rope: Rope): [Chunk, Rope] | undefined {
  return seqUncons(rope);
}

export function ropeUnsnoc(rope: Rope): [Rope, Chunk] | undefined {
  return seqUnsnoc(rope);
}

function checkRange(rope: Rope, from: number, to: number): void {
  const { chars } = seqMeasure(rope);
  if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || from > to || to > chars) {
    throw new RangeError('Invalid index');
  }
}

/**
 * Split at a code point offset; the chunk straddling it is cut in two.
 */
export function ropeSplitAt(rope: Rope, index: number): [Rope, Rope] {
  checkRange(rope, index, index);
  const res = seqSplit(rope, (m) => m.chars > index);
  switch (res.kind) {
    case 'before':
      return [res.seq, ropeEmpty()];
    case 'after':
      return [ropeEmpty(), res.seq];
    case 'inside': {
      const offset = index - seqMeasure(res.left).chars;
      if (offset === 0) {
        return [res.left, seqConcat(seqSingleton(textMeasurer, res.element), res.right)];
      }
      const [head, tail] = splitChunk(res.element, offset);
      return [
        seqConcat(res.left, seqSingleton(textMeasurer, head)),
        seqConcat(seqSingleton(textMeasurer, tail), res.right),
      ];
    }
    case 'nonMonotonic':
      throw new Error('ropeSplitAt: split by char offset found no boundary');
  }
}

export function ropeSlice(rope: Rope, from: number, to: number): Rope {
  checkRange(rope, from, to);
  const [, rest] = ropeSplitAt(rope, from);
  const [middle] = ropeSplitAt(rest, to - from);
  return middle;
}

export function ropeInsert(rope: Rope, index: number, text: string): Rope {
  const [left, right] = ropeSplitAt(rope, index);
  return ropeConcat(ropeConcat(left, ropeFromText(text)), right);
}

export function ropeDelete(rope: Rope, from: number, to: number): Rope {
  checkRange(rope, from, to);
  const [left, rest] = ropeSplitAt(rope, from);
  const [, right] = ropeSplitAt(rest, to - from);
  return ropeConcat(left, right);
}

// Char offset where 0-based `line` starts
export function ropeLineStart(rope: Rope, line: number): number {
  const { lines } = seqMeasure(rope);
  if (!Number.isInteger(line) || line < 0 || line > lines) {
    throw new RangeError('Invalid line');
  }
  if (line === 0) return 0;

  const res = seqSplit(rope, (m) => m.lines >= line);
  if (res.kind !== 'inside') {
    throw new Error(`ropeLineStart: no chunk holds newline ${line}`);
  }
  const before = seqMeasure(res.left);
  const within = charsThroughNewline(res.element.text, line - before.lines);
  if (within < 0) {
    throw new Error(`ropeLineStart: no chunk holds newline ${line}`);
  }
  return before.chars + within;
}
