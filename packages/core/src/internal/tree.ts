/**
 * Augmented binary tree - node-level engine
 *
 * Every branch caches measure(left) + measure(element) + measure(right).
 * Nothing here rebalances: concat, uncons, unsnoc and split cost is bounded
 * by the spines they walk, not by log(n).
 *
 * Concat, uncons and unsnoc take an `owner`. With `undefined` nodes are
 * treated as immutable and only the rebuilt spine is allocated. With an owner
 * token, branches stamped with that token are rewritten in place and the
 * operation consumes its inputs. Tokens never leave a produce session, so a
 * stamped node is only ever reachable from that session's draft.
 */

import { EMPTY } from './constants';
import { combine3 } from './measure';
import type { Branch, Measurer, Node, Owner } from './types';

export type NodeSplit<M, T> =
  | { kind: 'before'; node: Node<M, T> }
  | { kind: 'after'; node: Node<M, T> }
  | { kind: 'inside'; left: Node<M, T>; element: T; right: Node<M, T> }
  | { kind: 'nonMonotonic'; left: Node<M, T>; right: Node<M, T> };

export function nodeMeasure<M, T>(m: Measurer<M, T>, node: Node<M, T>): M {
  return node.kind === 'branch' ? node.measure : m.zero();
}

function editBranch<M, T>(
  reuse: Branch<M, T> | undefined,
  owner: Owner,
  left: Node<M, T>,
  element: T,
  right: Node<M, T>,
  measure: M
): Branch<M, T> {
  if (reuse && owner && reuse.owner === owner) {
    reuse.left = left;
    reuse.element = element;
    reuse.right = right;
    reuse.measure = measure;
    return reuse;
  }
  return { kind: 'branch', owner, left, element, right, measure };
}

function makeBranch<M, T>(
  m: Measurer<M, T>,
  owner: Owner,
  left: Node<M, T>,
  element: T,
  right: Node<M, T>,
  reuse?: Branch<M, T>
): Branch<M, T> {
  const measure = combine3(m, nodeMeasure(m, left), m.measure(element), nodeMeasure(m, right));
  return editBranch(reuse, owner, left, element, right, measure);
}

export function singletonNode<M, T>(
  m: Measurer<M, T>,
  owner: Owner,
  element: T,
  reuse?: Branch<M, T>
): Branch<M, T> {
  return editBranch(reuse, owner, EMPTY, element, EMPTY, m.measure(element));
}

// Balanced build, O(n)
export function nodeFromArray<M, T>(m: Measurer<M, T>, elements: readonly T[]): Node<M, T> {
  const build = (lo: number, hi: number): Node<M, T> => {
    if (lo >= hi) return EMPTY;
    const mid = (lo + hi) >>> 1;
    return makeBranch(m, undefined, build(lo, mid), elements[mid], build(mid + 1, hi));
  };
  return build(0, elements.length);
}

export function concatNodes<M, T>(
  m: Measurer<M, T>,
  owner: Owner,
  a: Node<M, T>,
  b: Node<M, T>
): Node<M, T> {
  if (a.kind === 'empty') return b;
  if (b.kind === 'empty') return a;

  // Pending roots of each side. Their total measure never changes while the
  // walk pulls spine nodes up, so it is carried rather than recomputed.
  const aMeasure = a.measure;
  const bMeasure = b.measure;
  let aNode = a;
  let aLeft = a.left;
  let aElement = a.element;
  let aRight = a.right;
  let bNode = b;
  let bLeft = b.left;
  let bElement = b.element;
  let bRight = b.right;

  while (true) {
    if (aRight.kind === 'empty') {
      const right = editBranch(bNode, owner, bLeft, bElement, bRight, bMeasure);
      return editBranch(aNode, owner, aLeft, aElement, right, m.add(aMeasure, bMeasure));
    }
    if (bLeft.kind === 'empty') {
      const left = editBranch(aNode, owner, aLeft, aElement, aRight, aMeasure);
      return editBranch(bNode, owner, left, bElement, bRight, m.add(aMeasure, bMeasure));
    }

    const aMid = aRight;
    const bMid = bLeft;
    aLeft = makeBranch(m, owner, aLeft, aElement, aMid.left, aNode);
    aNode = aMid;
    aElement = aMid.element;
    aRight = aMid.right;
    bRight = makeBranch(m, owner, bMid.right, bElement, bRight, bNode);
    bNode = bMid;
    bElement = bMid.element;
    bLeft = bMid.left;
  }
}

export function unconsNode<M, T>(
  m: Measurer<M, T>,
  owner: Owner,
  tree: Node<M, T>
): [T, Node<M, T>] | undefined {
  if (tree.kind === 'empty') return undefined;

  let node = tree;
  let left = tree.left;
  let element = tree.element;
  let right = tree.right;
  while (left.kind === 'branch') {
    const next = left;
    right = makeBranch(m, owner, next.right, element, right, node);
    node = next;
    element = next.element;
    left = next.left;
  }
  return [element, right];
}

export function unsnocNode<M, T>(
  m: Measurer<M, T>,
  owner: Owner,
  tree: Node<M, T>
): [Node<M, T>, T] | undefined {
  if (tree.kind === 'empty') return undefined;

  let node = tree;
  let left = tree.left;
  let element = tree.element;
  let right = tree.right;
  while (right.kind === 'branch') {
    const next = right;
    left = makeBranch(m, owner, left, element, next.left, node);
    node = next;
    element = next.element;
    right = next.right;
  }
  return [left, element];
}

/**
 * Partition at the first element whose inclusion makes `predicate` true over
 * the running prefix measure. `predicate` must be monotonic: once true for a
 * prefix, true for every longer one. Always persistent.
 */
export function splitNode<M, T>(
  m: Measurer<M, T>,
  tree: Node<M, T>,
  predicate: (prefix: M) => boolean
): NodeSplit<M, T> {
  let v = m.zero();
  let left: Node<M, T> = EMPTY;
  let right: Node<M, T> = EMPTY;
  let node = tree;

  while (node.kind === 'branch') {
    const { left: l, element, right: r } = node;
    const vl = m.add(v, nodeMeasure(m, l));
    if (predicate(vl)) {
      const head = concatNodes(m, undefined, singletonNode(m, undefined, element), r);
      right = concatNodes(m, undefined, head, right);
      node = l;
      continue;
    }

    const vle = m.add(vl, m.measure(element));
    if (predicate(vle)) {
      return {
        kind: 'inside',
        left: concatNodes(m, undefined, left, l),
        element,
        right: concatNodes(m, undefined, r, right),
      };
    }

    v = vle;
    left = concatNodes(m, undefined, concatNodes(m, undefined, left, l), singletonNode(m, undefined, element));
    node = r;
  }

  if (left.kind === 'empty' && right.kind === 'empty') {
    return predicate(v) ? { kind: 'after', node: EMPTY } : { kind: 'before', node: EMPTY };
  }
  if (left.kind === 'empty') return { kind: 'after', node: right };
  if (right.kind === 'empty') return { kind: 'before', node: left };
  return { kind: 'nonMonotonic', left, right };
}

export function* nodeIter<M, T>(tree: Node<M, T>): IterableIterator<T> {
  const stack: Branch<M, T>[] = [];
  let node = tree;
  while (true) {
    while (node.kind === 'branch') {
      stack.push(node);
      node = node.left;
    }
    const top = stack.pop();
    if (!top) return;
    yield top.element;
    node = top.right;
  }
}

export function nodeFirst<M, T>(tree: Node<M, T>): T | undefined {
  if (tree.kind === 'empty') return undefined;
  let node = tree;
  let next = node.left;
  while (next.kind === 'branch') {
    node = next;
    next = node.left;
  }
  return node.element;
}

export function nodeLast<M, T>(tree: Node<M, T>): T | undefined {
  if (tree.kind === 'empty') return undefined;
  let node = tree;
  let next = node.right;
  while (next.kind === 'branch') {
    node = next;
    next = node.right;
  }
  return node.element;
}

export function nodeDepth<M, T>(tree: Node<M, T>): number {
  let max = 0;
  const stack: [Node<M, T>, number][] = [[tree, 0]];
  while (stack.length) {
    const top = stack.pop();
    if (!top) break;
    const [node, depth] = top;
    if (node.kind === 'empty') {
      if (depth > max) max = depth;
      continue;
    }
    stack.push([node.left, depth + 1], [node.right, depth + 1]);
  }
  return max;
}
