/**
 * Seq - persistent monoid-augmented sequence
 *
 * - seqConcat / seqUncons / seqUnsnoc / seqSplit rebuild only the spine
 *   they walk; untouched subtrees are shared between old and new values.
 * - seqProduce runs a batch of edits on a draft that owns the nodes it
 *   creates and rewrites them in place. The owner lives only as long as the
 *   recipe, so no value outside the draft ever sees an owned node change.
 */

import {
  EMPTY,
  concatNodes,
  nodeDepth,
  nodeFirst,
  nodeFromArray,
  nodeIter,
  nodeLast,
  nodeMeasure,
  openSession,
  singletonNode,
  splitNode,
  unconsNode,
  unsnocNode,
  type Measurer,
  type Node,
  type Seq,
  type SplitResult,
} from './internal';

export interface SeqDraft<M, T> {
  readonly measure: M;
  readonly isEmpty: boolean;
  push(element: T): void;
  unshift(element: T): void;
  append(other: Seq<M, T>): void;
  prepend(other: Seq<M, T>): void;
  pop(): T | undefined;
  shift(): T | undefined;
}

function wrap<M, T>(measurer: Measurer<M, T>, root: Node<M, T>): Seq<M, T> {
  return { measurer, root };
}

function checkMeasurer<M, T>(a: Seq<M, T>, b: Seq<M, T>): void {
  if (a.measurer !== b.measurer) {
    throw new TypeError('Cannot concatenate sequences with different measurers');
  }
}

export function seqEmpty<M, T>(measurer: Measurer<M, T>): Seq<M, T> {
  return wrap(measurer, EMPTY);
}

export function seqSingleton<M, T>(measurer: Measurer<M, T>, element: T): Seq<M, T> {
  return wrap(measurer, singletonNode(measurer, undefined, element));
}

export function seqFromArray<M, T>(measurer: Measurer<M, T>, elements: readonly T[]): Seq<M, T> {
  return wrap(measurer, nodeFromArray(measurer, elements));
}

export function seqMeasure<M, T>(seq: Seq<M, T>): M {
  return nodeMeasure(seq.measurer, seq.root);
}

export function seqIsEmpty<M, T>(seq: Seq<M, T>): boolean {
  return seq.root.kind === 'empty';
}

export function seqConcat<M, T>(a: Seq<M, T>, b: Seq<M, T>): Seq<M, T> {
  if (b.root.kind === 'empty') return a;
  if (a.root.kind === 'empty') return b;
  checkMeasurer(a, b);
  return wrap(a.measurer, concatNodes(a.measurer, undefined, a.root, b.root));
}

export function seqUncons<M, T>(seq: Seq<M, T>): [T, Seq<M, T>] | undefined {
  const res = unconsNode(seq.measurer, undefined, seq.root);
  if (!res) return undefined;
  return [res[0], wrap(seq.measurer, res[1])];
}

export function seqUnsnoc<M, T>(seq: Seq<M, T>): [Seq<M, T>, T] | undefined {
  const res = unsnocNode(seq.measurer, undefined, seq.root);
  if (!res) return undefined;
  return [wrap(seq.measurer, res[0]), res[1]];
}

/**
 * Split where a monotonic predicate over the prefix measure first holds.
 *
 * `before` / `after` mean every element sits on one side of the boundary.
 * A predicate that is not monotonic can leave elements on both sides without
 * a boundary element; that is reported as `nonMonotonic` with both halves.
 */
export function seqSplit<M, T>(seq: Seq<M, T>, predicate: (prefix: M) => boolean): SplitResult<M, T> {
  const { measurer } = seq;
  const res = splitNode(measurer, seq.root, predicate);
  switch (res.kind) {
    case 'before':
      return { kind: 'before', seq: wrap(measurer, res.node) };
    case 'after':
      return { kind: 'after', seq: wrap(measurer, res.node) };
    case 'inside':
      return {
        kind: 'inside',
        left: wrap(measurer, res.left),
        element: res.element,
        right: wrap(measurer, res.right),
      };
    case 'nonMonotonic':
      return { kind: 'nonMonotonic', left: wrap(measurer, res.left), right: wrap(measurer, res.right) };
  }
}

/**
 * Apply `recipe` to a draft of `seq` and return the result. `seq` itself is
 * left untouched; the draft throws once seqProduce has returned.
 */
export function seqProduce<M, T>(seq: Seq<M, T>, recipe: (draft: SeqDraft<M, T>) => void): Seq<M, T> {
  const { measurer } = seq;
  const session = openSession('seqProduce');
  const { owner } = session;
  let root = seq.root;

  const draft: SeqDraft<M, T> = {
    get measure() {
      session.check();
      return nodeMeasure(measurer, root);
    },
    get isEmpty() {
      session.check();
      return root.kind === 'empty';
    },
    push(element) {
      session.check();
      root = concatNodes(measurer, owner, root, singletonNode(measurer, owner, element));
    },
    unshift(element) {
      session.check();
      root = concatNodes(measurer, owner, singletonNode(measurer, owner, element), root);
    },
    append(other) {
      session.check();
      if (other.root.kind === 'empty') return;
      checkMeasurer(seq, other);
      root = concatNodes(measurer, owner, root, other.root);
    },
    prepend(other) {
      session.check();
      if (other.root.kind === 'empty') return;
      checkMeasurer(other, seq);
      root = concatNodes(measurer, owner, other.root, root);
    },
    pop() {
      session.check();
      const res = unsnocNode(measurer, owner, root);
      if (!res) return undefined;
      root = res[0];
      return res[1];
    },
    shift() {
      session.check();
      const res = unconsNode(measurer, owner, root);
      if (!res) return undefined;
      root = res[1];
      return res[0];
    },
  };

  try {
    recipe(draft);
  } finally {
    session.revoke();
  }
  return root === seq.root ? seq : wrap(measurer, root);
}

export function seqIter<M, T>(seq: Seq<M, T>): IterableIterator<T> {
  return nodeIter(seq.root);
}

export function seqToArray<M, T>(seq: Seq<M, T>): T[] {
  return [...nodeIter(seq.root)];
}

export function seqFirst<M, T>(seq: Seq<M, T>): T | undefined {
  return nodeFirst(seq.root);
}

export function seqLast<M, T>(seq: Seq<M, T>): T | undefined {
  return nodeLast(seq.root);
}

// O(n)
export function seqSize<M, T>(seq: Seq<M, T>): number {
  let n = 0;
  for (const _ of nodeIter(seq.root)) n++;
  return n;
}

export function seqDepth<M, T>(seq: Seq<M, T>): number {
  return nodeDepth(seq.root);
}
