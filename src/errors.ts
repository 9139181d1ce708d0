/** Unified error hierarchy for plugin discovery and execution. */

export class DeckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DeckError';
  }
}

export class NotFoundError extends DeckError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends DeckError {
  constructor(
    message: string,
    public readonly errors: string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, 'VALIDATION_ERROR', { errors }, options);
    this.name = 'ValidationError';
  }
}

export type LoadFailureKind = 'io' | 'syntax' | 'import' | 'runtime';

export class PluginLoadError extends DeckError {
  constructor(
    message: string,
    public readonly pluginId: string,
    public readonly kind: LoadFailureKind = 'io',
    code = 'LOAD_ERROR',
    options?: ErrorOptions,
  ) {
    super(message, code, { pluginId, kind }, options);
    this.name = 'PluginLoadError';
  }
}

export class PluginSyntaxError extends PluginLoadError {
  constructor(
    pluginId: string,
    public readonly compilerMessage: string,
    public readonly line?: number,
    options?: ErrorOptions,
  ) {
    const where = line !== undefined ? ` at line ${line}` : '';
    super(`Syntax error in ${pluginId}${where}: ${compilerMessage}`, pluginId, 'syntax', 'LOAD_SYNTAX', options);
    this.name = 'PluginSyntaxError';
  }
}

export class PluginImportError extends PluginLoadError {
  constructor(
    pluginId: string,
    public readonly dependency: string | undefined,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Plugin ${pluginId} has missing dependency: ${detail}`, pluginId, 'import', 'LOAD_IMPORT', options);
    this.name = 'PluginImportError';
  }
}

export class PluginRuntimeError extends PluginLoadError {
  constructor(
    pluginId: string,
    public readonly originalName: string,
    public readonly originalMessage: string,
    options?: ErrorOptions,
  ) {
    super(
      `Error initializing plugin ${pluginId}: ${originalName}: ${originalMessage}`,
      pluginId,
      'runtime',
      'LOAD_RUNTIME',
      options,
    );
    this.name = 'PluginRuntimeError';
  }
}

export class CancelledError extends DeckError {
  constructor(message = 'Cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends DeckError {
  constructor(message = 'Plugin exceeded maximum execution time') {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Remediation text a host can show next to a failed load. */
export function describeLoadFailure(error: DeckError): string {
  if (error instanceof PluginSyntaxError) {
    const where = error.line !== undefined ? `line ${error.line} of ` : '';
    return `Fix the syntax error at ${where}the plugin's entry file and reload plugins.`;
  }
  if (error instanceof PluginImportError) {
    const dep = error.dependency ? `'${error.dependency}'` : 'the missing module';
    return `Install ${dep} where the plugin can resolve it, or remove the dependency.`;
  }
  if (error instanceof PluginRuntimeError) {
    return `The plugin threw ${error.originalName} while loading; check its top-level code.`;
  }
  if (error instanceof PluginLoadError) {
    return 'Make sure the plugin directory contains a readable entry file.';
  }
  if (error instanceof NotFoundError) {
    return 'Reload plugins or check the plugin id.';
  }
  return 'See the log for details.';
}
