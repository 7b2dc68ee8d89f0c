/**
 * Internal modules barrel export
 */

// Constants
export { EMPTY, CHUNK_SIZE } from './constants';

// Measures
export { sumMonoid, textMonoid, combine3, type TextMeasure } from './measure';

// Tree engine
export {
  nodeMeasure,
  singletonNode,
  nodeFromArray,
  concatNodes,
  unconsNode,
  unsnocNode,
  splitNode,
  nodeIter,
  nodeFirst,
  nodeLast,
  nodeDepth,
  type NodeSplit,
} from './tree';

// Produce sessions
export { openSession, type Session } from './session';

// Chunks
export {
  chunkFromText,
  mergeChunks,
  splitChunk,
  charsThroughNewline,
  textMeasurer,
  type Chunk,
} from './chunk';

// Types
export type { Owner, Monoid, Measurer, Empty, Branch, Node, Seq, SplitResult } from './types';
