import type { Location } from "./_interfaces";

export type LocatorErrorKind = "notAString" | "invalidAtMost" | "invalidStart" | "pattern";

/** The base class for every failure reported by the locator. */
export abstract class LocatorError extends Error {
  abstract readonly kind: LocatorErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LocatorError";
  }
}

/** The text to search was not a string. */
export class NotAStringError extends LocatorError {
  override name = "NotAStringError";
  readonly kind = "notAString";
}

/** The `atMost` option was neither a positive integer nor `"all"`. */
export class InvalidAtMostError extends LocatorError {
  override name = "InvalidAtMostError";
  readonly kind = "invalidAtMost";
}

/** The `start` option was not a `{ line, col }` record of integers. */
export class InvalidStartError extends LocatorError {
  override name = "InvalidStartError";
  readonly kind = "invalidStart";
}

/** The pattern could not be turned into something to match with. */
export class PatternError extends LocatorError {
  override name = "PatternError";
  readonly kind = "pattern";
}

export type LocateResult
  = { readonly ok: true; readonly value: readonly Location[] }
  | { readonly ok: false; readonly error: LocatorError };

export const success = (value: readonly Location[]): LocateResult =>
  Object.freeze({ ok: true, value });

export const failure = (error: LocatorError): LocateResult =>
  Object.freeze({ ok: false, error });
