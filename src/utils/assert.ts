import _isInteger from "lodash/isInteger";
import { isInstance } from "./is";

/**
 * Validates a basic assertion.  If it fails, an error with `msg` is thrown.
 */
const assert = (msg: string, check: boolean): void => {
  if (check) return;
  throw new Error(msg);
};

/**
 * Validates that `value` is not `null` or `undefined`.
 */
const assertExists = <T>(msg: string, value: T): Exclude<T, undefined | null> => {
  if (isInstance(value)) return value;
  throw new Error(msg);
};

/** Validates that `value` is an integer. */
const assertInteger = (msg: string, value: number): number => {
  assert(msg, _isInteger(value));
  return value;
};

export { assert, assertExists, assertInteger };
