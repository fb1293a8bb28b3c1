import { resolveConfig, type ArborConfig, type ArborConfigInput } from '../config/config.js';
import { Logger, type LogHandler } from '../logging/logger.js';
import { HandleArena } from './handle-arena.js';
import { Metrics } from './metrics.js';

/**
 * Collaborators shared by every scope of one tree: configuration, logger,
 * metrics and the handle arena behind the dependency graphs.
 *
 * A child scope inherits its parent's runtime; a scope without a parent gets
 * a fresh one unless the caller passes it in.
 */
export interface ScopeRuntime {
  readonly config: ArborConfig;
  readonly logger: Logger;
  readonly metrics: Metrics;
  readonly arena: HandleArena;
}

export interface RuntimeOptions extends ArborConfigInput {
  logHandler?: LogHandler;
}

export function createRuntime(options: RuntimeOptions = {}): ScopeRuntime {
  const { logHandler, ...configInput } = options;
  const config = resolveConfig(configInput);
  return {
    config,
    logger: new Logger({ level: config.logLevel, handler: logHandler }),
    metrics: new Metrics(config.performanceTracking),
    arena: new HandleArena(),
  };
}
