const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeTag = (tag?: string): string => (tag !== undefined ? ` with tag '${tag}'` : '');

/**
 * Thrown by every mutating call on a scope that has already been disposed.
 * Read-only calls on a disposed scope return nothing instead.
 */
export class ScopeDisposedError extends Error {
  constructor(
    public scopeName: string,
    public operation: string
  ) {
    const dev = [
      `Scope '${scopeName}' has been disposed.`,
      '',
      `'${operation}' cannot run on a disposed scope.`,
      'Create a new scope (or a child of a live scope) instead of reusing this one.',
    ];
    super(format(`Scope '${scopeName}' has been disposed.`, dev));
    this.name = 'ScopeDisposedError';
  }
}

/**
 * Circular dependency detected in the declared instance graph.
 */
export class CircularDependencyError extends Error {
  constructor(
    public node: string,
    public scopeName: string
  ) {
    const dev = [
      'Circular dependency detected:',
      '',
      `  ${node} (scope '${scopeName}') depends on itself through its declared dependencies.`,
      '',
      'The registration was rejected and the scope is unchanged.',
      '',
      'To fix this:',
      '  1. Remove one edge of the cycle from the declared dependencies',
      '  2. Extract the shared part into a separate binding',
    ];
    super(format(`Circular dependency detected: ${node}`, dev));
    this.name = 'CircularDependencyError';
  }
}

/**
 * Circular dependency between modules, found before any module registers.
 */
export class ModuleCircularDependencyError extends Error {
  constructor(
    public moduleName: string,
    public cycle: string[]
  ) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Circular module dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `Module '${moduleName}' depends on itself through other modules.`,
      'No module in this batch was registered.',
    ];
    super(format(`Circular dependency detected: ${moduleName}`, dev));
    this.name = 'ModuleCircularDependencyError';
  }
}

export class DependencyNotFoundError extends Error {
  constructor(
    public type: string,
    public tag: string | undefined,
    public scopeName: string
  ) {
    const dev = [
      `Dependency '${type}'${describeTag(tag)} not found.`,
      '',
      `Searched scope '${scopeName}' and all of its ancestors.`,
      '',
      'To fix this:',
      `  1. Register it first: scope.register(${type}, instance)`,
      `  2. Or register a factory: scope.lazily(${type}, () => create())`,
    ];
    super(format(`Dependency '${type}'${describeTag(tag)} not found in scope '${scopeName}'.`, dev));
    this.name = 'DependencyNotFoundError';
  }
}

export class InvalidFactoryOptionsError extends Error {
  constructor(public type: string) {
    const dev = [
      'Invalid factory options',
      '',
      `Factory for '${type}' was marked both permanent and always-new.`,
      'A factory that creates a new instance on every lookup cannot be permanent.',
    ];
    super(format(`Factory for '${type}' cannot be both permanent and always-new.`, dev));
    this.name = 'InvalidFactoryOptionsError';
  }
}

export class InvalidConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid configuration', '', `Invalid configuration: ${reason}`];
    super(format(`Invalid configuration: ${reason}`, dev));
    this.name = 'InvalidConfigError';
  }
}

export class InvalidTokenError extends Error {
  constructor(public token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token) ?? String(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid type key',
      '',
      `Expected a Token created with token() or a class constructor.`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];

    super(format('Invalid type key.', dev));
    this.name = 'InvalidTokenError';
  }
}
