/**
 * Core type definitions
 */

// Transient owner: nodes stamped with the same owner may be edited in place
export type Owner = object | undefined;

export interface Monoid<M> {
  zero(): M;
  add(a: M, b: M): M;
}

// Monoid plus the projection every element is measured with
export interface Measurer<M, T> extends Monoid<M> {
  measure(element: T): M;
}

export interface Empty {
  kind: 'empty';
}

export interface Branch<M, T> {
  kind: 'branch';
  owner?: Owner;
  left: Node<M, T>;
  element: T;
  right: Node<M, T>;
  measure: M;
}

export type Node<M, T> = Empty | Branch<M, T>;

// Augmented sequence
export interface Seq<M, T> {
  measurer: Measurer<M, T>;
  root: Node<M, T>;
}

export type SplitResult<M, T> =
  | { kind: 'before'; seq: Seq<M, T> }
  | { kind: 'after'; seq: Seq<M, T> }
  | { kind: 'inside'; left: Seq<M, T>; element: T; right: Seq<M, T> }
  | { kind: 'nonMonotonic'; left: Seq<M, T>; right: Seq<M, T> };
