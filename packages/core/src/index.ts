/**
 * seqtree – persistent monoid-augmented sequences
 *
 * - seq*()   → generic binary tree caching a monoid measure per subtree
 * - rope*()  → text rope: chunks measured by (bytes, chars, lines)
 * - *Produce → batch edits on a draft that rewrites its own nodes in place
 */

export {
  seqEmpty,
  seqSingleton,
  seqFromArray,
  seqMeasure,
  seqIsEmpty,
  seqConcat,
  seqUncons,
  seqUnsnoc,
  seqSplit,
  seqIter,
  seqToArray,
  seqFirst,
  seqLast,
  seqSize,
  seqDepth,
  seqProduce,
  type SeqDraft,
} from './seq';

export {
  ropeEmpty,
  ropeFromText,
  ropeFromChunks,
  ropeMeasure,
  ropeIsEmpty,
  ropeToText,
  ropeChunks,
  ropeConcat,
  ropeUncons,
  ropeUnsnoc,
  ropeSplitAt,
  ropeSlice,
  ropeInsert,
  ropeDelete,
  ropeLineStart,
  ropeProduce,
  type Rope,
  type RopeDraft,
} from './rope';

export { CHUNK_SIZE, sumMonoid, textMonoid, chunkFromText, textMeasurer } from './internal';

export type {
  Owner,
  Monoid,
  Measurer,
  Node,
  Branch,
  Empty,
  Seq,
  SplitResult,
  TextMeasure,
  Chunk,
} from './internal';
