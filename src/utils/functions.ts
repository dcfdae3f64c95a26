export type PredicateFn<T> = (value: T) => boolean;

/** Does nothing.  Useful as a default callback. */
export const noop = (..._args: unknown[]): void => {};
