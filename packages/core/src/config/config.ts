import { InvalidConfigError } from '../errors/errors.js';
import { isLogLevel, LogLevel } from '../logging/logger.js';

/**
 * Named presets. Each one fixes log verbosity and the optional checks.
 */
export const Environment = {
  Production: 'production',
  Staging: 'staging',
  Development: 'development',
  Debug: 'debug',
  Test: 'test',
} as const;

export type Environment = (typeof Environment)[keyof typeof Environment];

export interface HubConfig {
  /** Run a maintenance sweep every N notifications. */
  maintenanceInterval: number;
  /** Listener count on a single key above which health degrades. */
  maxListenersPerKey: number;
  /** Total listener count above which health degrades. */
  maxTotalListeners: number;
}

export interface ArborConfig {
  readonly environment: Environment;
  readonly logLevel: LogLevel;
  /** Reject registrations whose declared dependencies close a cycle. */
  readonly checkForCircularDependencies: boolean;
  /** Collect scope/registration counters in `Metrics`. */
  readonly performanceTracking: boolean;
  readonly hub: Readonly<HubConfig>;
}

export interface ArborConfigInput {
  environment?: Environment;
  logLevel?: LogLevel;
  checkForCircularDependencies?: boolean;
  performanceTracking?: boolean;
  hub?: Partial<HubConfig>;
}

export const DEFAULT_HUB_CONFIG: Readonly<HubConfig> = {
  maintenanceInterval: 1000,
  maxListenersPerKey: 100,
  maxTotalListeners: 10_000,
};

const PRESETS: Record<Environment, Omit<ArborConfig, 'environment' | 'hub'>> = {
  production: { logLevel: LogLevel.Error, checkForCircularDependencies: false, performanceTracking: false },
  staging: { logLevel: LogLevel.Warn, checkForCircularDependencies: true, performanceTracking: true },
  development: { logLevel: LogLevel.Info, checkForCircularDependencies: true, performanceTracking: true },
  debug: { logLevel: LogLevel.Debug, checkForCircularDependencies: true, performanceTracking: true },
  test: { logLevel: LogLevel.Warn, checkForCircularDependencies: true, performanceTracking: false },
};

function isEnvironment(value: unknown): value is Environment {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PRESETS, value);
}

/**
 * Environment implied by `NODE_ENV`: `production` and `test` map to their
 * presets, anything else to `development`.
 */
export function environmentFromNodeEnv(nodeEnv: string | undefined = process.env.NODE_ENV): Environment {
  if (nodeEnv === 'production') return Environment.Production;
  if (nodeEnv === 'test') return Environment.Test;
  return Environment.Development;
}

function assertPositiveInteger(name: string, value: unknown): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigError(`'${name}' must be a positive integer, received ${String(value)}`);
  }
}

/**
 * Merge overrides onto the environment preset, validate, and freeze.
 *
 * @throws {InvalidConfigError} on an unknown environment or log level, or a
 * hub threshold that is not a positive integer
 */
export function resolveConfig(input: ArborConfigInput = {}): ArborConfig {
  const environment = input.environment ?? environmentFromNodeEnv();
  if (!isEnvironment(environment)) {
    throw new InvalidConfigError(`unknown environment '${String(environment)}'`);
  }
  const preset = PRESETS[environment];

  const logLevel = input.logLevel ?? preset.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new InvalidConfigError(`unknown log level '${String(logLevel)}'`);
  }

  const hub: HubConfig = { ...DEFAULT_HUB_CONFIG, ...input.hub };
  assertPositiveInteger('hub.maintenanceInterval', hub.maintenanceInterval);
  assertPositiveInteger('hub.maxListenersPerKey', hub.maxListenersPerKey);
  assertPositiveInteger('hub.maxTotalListeners', hub.maxTotalListeners);

  return Object.freeze({
    environment,
    logLevel,
    checkForCircularDependencies: input.checkForCircularDependencies ?? preset.checkForCircularDependencies,
    performanceTracking: input.performanceTracking ?? preset.performanceTracking,
    hub: Object.freeze(hub),
  });
}
