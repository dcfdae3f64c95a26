export { locate, locateOrThrow } from "./locator";
export {
  BEGINNING,
  COLUMN_OFFSET,
  createLocation,
  compareLocations,
  iterLines
} from "./locator/locationOps";
export { escapeForRegex } from "./locator/PatternService";
export {
  LocatorError,
  NotAStringError,
  InvalidAtMostError,
  InvalidStartError,
  PatternError
} from "./locator/errors";

export type { LocateResult, LocatorErrorKind } from "./locator/errors";
export type { AtMost, Location, PatternInput, SearchOptions } from "./locator/_interfaces";
