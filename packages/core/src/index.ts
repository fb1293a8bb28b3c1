export { Container, createContainer } from './api/container.js';
export type { ContainerOptions, ContainerStats, ScopeTarget } from './api/container.js';
export { createTokenGroup, keyFor } from './api/token-utils.js';
export type { TokenGroup } from './api/token-utils.js';

export * from './core/token.js';

export { Scope } from './core/scope.js';
export type { BindingInfo, ScopeOptions, ScopeStats } from './core/scope.js';
export { ROOT_SCOPE_NAME, ScopeManager, ScopeSession } from './core/scope-manager.js';
export type { CreateScopeOptions, SystemStats } from './core/scope-manager.js';
export { createRuntime } from './core/runtime.js';
export type { RuntimeOptions, ScopeRuntime } from './core/runtime.js';
export { DependencyGraph, MAX_CYCLE_DEPTH, detectCycles } from './core/dependency-graph.js';
export { HandleArena } from './core/handle-arena.js';
export type { Handle } from './core/handle-arena.js';
export { Metrics } from './core/metrics.js';
export type { MetricName, MetricsSnapshot } from './core/metrics.js';

export { ReactiveHub, Subscription } from './reactive/reactive-hub.js';
export type {
  HealthStatus,
  HubHealthReport,
  HubMemoryStats,
  Listener,
  MemoryPressure,
  ReactiveHubOptions,
  ValueResolver,
} from './reactive/reactive-hub.js';

export { ModuleRegistry, defineModule } from './modules/module-registry.js';
export type { Module } from './modules/module-registry.js';

export { DEFAULT_HUB_CONFIG, Environment, environmentFromNodeEnv, resolveConfig } from './config/config.js';
export type { ArborConfig, ArborConfigInput, HubConfig } from './config/config.js';

export { LogLevel, Logger, consoleHandler, isLogLevel } from './logging/logger.js';
export type { LogHandler, LoggerOptions } from './logging/logger.js';

export { USE_COUNT_ALWAYS_NEW, USE_COUNT_PERMANENT, disposeValue, isDisposable } from './types/types.js';
export type {
  Constructor,
  DeleteOptions,
  Disposable,
  Factory,
  LazyOptions,
  RegisterOptions,
  TagOptions,
} from './types/types.js';

// Errors
export {
  CircularDependencyError,
  DependencyNotFoundError,
  InvalidConfigError,
  InvalidFactoryOptionsError,
  InvalidTokenError,
  ModuleCircularDependencyError,
  ScopeDisposedError,
} from './errors/errors.js';
