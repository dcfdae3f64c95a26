import { isArray } from "./is";

import type { PredicateFn } from "./functions";

export type TransformFn<TIn, TOut> = (value: TIn) => TOut;
/**
 * A step of {@link accumulate}.  Given the current state and a value,
 * produces the value to yield and the state for the next step.
 */
export type AccumulateFn<TIn, TState, TOut> = (state: TState, value: TIn) => readonly [TOut, TState];

export interface ChainComposition<T> {
  /** Transforms each element. */
  map<TOut>(xformFn: TransformFn<T, TOut>): ChainComposition<TOut>;
  /** Filters to those elements that pass a predicate function. */
  filter(predicateFn: PredicateFn<T>): ChainComposition<T>;
  /** Transforms the iterable into a different iterable. */
  thru<TOut>(xformFn: TransformFn<Iterable<T>, Iterable<TOut>>): ChainComposition<TOut>;
  /** Ends the chain and produces the resulting iterable. */
  value(): Iterable<T>;
  /** Transforms the iterable into any kind of value, ending the chain. */
  value<TOut>(xformFn: TransformFn<Iterable<T>, TOut>): TOut;
  /** Ends the chain and materializes the iterable as an array. */
  toArray(): T[];
}

/**
 * Converts the given iterable into a readonly array, if needed.
 */
export const toImmutable = <T>(iterable: Iterable<T>): readonly T[] => {
  if (!isArray(iterable)) return Object.freeze([...iterable]);
  if (Object.isFrozen(iterable)) return iterable;
  return Object.freeze(iterable.slice());
};

/**
 * Threads a state through an iterable from left to right, yielding one
 * output per element.  Each output is produced only when it is pulled.
 */
export const accumulate = function*<TIn, TState, TOut>(
  iterable: Iterable<TIn>,
  initialState: TState,
  accumulateFn: AccumulateFn<TIn, TState, TOut>
): Iterable<TOut> {
  let state = initialState;
  for (const value of iterable) {
    const [output, nextState] = accumulateFn(state, value);
    state = nextState;
    yield output;
  }
};

/**
 * Yields up to `count` elements from the beginning of the given iterable.
 *
 * The source is never pulled again once `count` elements were yielded.
 */
export const take = function*<T>(
  iter: Iterable<T>,
  count: number
): Iterable<T> {
  if (count <= 0) return;

  let taken = 0;
  for (const item of iter) {
    yield item;
    taken += 1;
    if (taken >= count) return;
  }
};

/** Yields items starting from the first to pass `predicateFn`. */
export const skipUntil = function*<T>(
  iter: Iterable<T>,
  predicateFn: PredicateFn<T>
): Iterable<T> {
  let skipDone = false;
  for (const item of iter) {
    checks: {
      if (skipDone) break checks;
      if (!predicateFn(item)) continue;
      skipDone = true;
    }
    yield item;
  }
};

/**
 * Creates an iterable that transforms values.
 */
export const mapIter = function*<TIn, TOut>(
  iterable: Iterable<TIn>,
  transformFn: TransformFn<TIn, TOut>
): Iterable<TOut> {
  for (const value of iterable)
    yield transformFn(value);
};

/**
 * Filters the given iterable to those values that pass a predicate.
 */
export const filterIter = function*<T>(
  iterable: Iterable<T>,
  predicateFn: PredicateFn<T>
): Iterable<T> {
  for (const value of iterable)
    if (predicateFn(value))
      yield value;
};

/** Creates a chain from the given iterable. */
function chain<T>(iterable: Iterable<T> = []): ChainComposition<T> {
  function value(): Iterable<T>;
  function value<TOut>(xformFn: TransformFn<Iterable<T>, TOut>): TOut;
  function value<TOut>(xformFn?: TransformFn<Iterable<T>, TOut>): TOut | Iterable<T> {
    return xformFn ? xformFn(iterable) : iterable;
  }

  return {
    map: (transformFn) => chain(mapIter(iterable, transformFn)),
    filter: (predicateFn) => chain(filterIter(iterable, predicateFn)),
    thru: (transformFn) => chain(transformFn(iterable)),
    value,
    toArray: () => [...iterable]
  };
}

export { chain };
