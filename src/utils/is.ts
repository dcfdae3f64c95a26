export const isInstance = <T>(value: T): value is Exclude<T, undefined | null> =>
  value != null;

export const isObject = (value: unknown): value is object =>
  value !== null && typeof value === "object";

export const isArray = Array.isArray;

export const isString = (value: unknown): value is string =>
  typeof value === "string";

export const isNumber = (value: unknown): value is number =>
  typeof value === "number";

export const isRegExp = (value: unknown): value is RegExp =>
  value instanceof RegExp;
