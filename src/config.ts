/** Configuration options affecting the locator. */
export interface LocatorConfig {
  /**
   * When `true`, every scan is wrapped in a logger stop watch and its
   * duration is reported.
   *
   * Has no effect unless {@link Config.debugLogging debugLogging} is
   * also enabled, since the stop watch belongs to the logger.
   */
  measurePerformance: boolean;
  /**
   * Additional flags used when a set of literal strings is compiled into
   * a single alternation.  The `g` flag is always added.
   *
   * With the default of `"u"`, a literal never matches half of a
   * surrogate pair.
   */
  literalSetFlags: string;
}

export interface Config {
  /** Enables debug logging and some extra sanity checks. */
  debugLogging: boolean;
  /**
   * Whether we're in a test environment.
   *
   * See `spec-resources/_setup.ts` to see where this gets overridden.
   */
  inTestEnv: boolean;
  /** Configuration options affecting the locator. */
  locator: LocatorConfig;
}

const locator: LocatorConfig = {
  measurePerformance: false,
  literalSetFlags: "u"
};

const config: Config = {
  debugLogging: false,
  inTestEnv: false,
  locator
};

export default config;
