// Infrastructure
export { validate } from './infra/validator.js';
export type { FieldRule, Schema } from './infra/validator.js';
export { ok, err, isPlainObject } from './infra/types.js';
export type { Result } from './infra/types.js';

// Errors
export {
  DeckError, NotFoundError, ValidationError, PluginLoadError, PluginSyntaxError,
  PluginImportError, PluginRuntimeError, CancelledError, TimeoutError,
  errorMessage, describeLoadFailure,
} from './errors.js';
export type { LoadFailureKind } from './errors.js';

// Logging
export { Logger, createLogger, stderrTransport, formatEntry, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { LogLevel, LogEntry, Transport } from './logging/logger.js';

// Domain — Config
export { ConfigLoader, validateConfig } from './domain/config/loader.js';
export { DEFAULT_CONFIG } from './domain/config/types.js';
export type { DeckConfig, DeckConfigInput, ExecutionConfig } from './domain/config/types.js';

// Domain — Plugin
export { PluginRegistry } from './domain/plugin/registry.js';
export { PluginModuleLoader } from './domain/plugin/module-loader.js';
export { parseManifest, toDescriptor, checkPluginId } from './domain/plugin/manifest.js';
export type { ParsedManifest } from './domain/plugin/manifest.js';
export type {
  PluginDescriptor, PluginManifest, PluginParams, PluginEntryPoint, PluginToken, ProgressCallback,
  LoadedModule, LoadedPlugin, LoadResult, PluginSource,
} from './domain/plugin/types.js';

// Domain — Settings
export { SettingsStore } from './domain/settings/store.js';
export type { PluginSettings, PluginSettingsProvider, SettingsDocument } from './domain/settings/types.js';

// Orchestration
export { ExecutionEngine } from './orchestration/engine.js';
export { CancellationToken } from './orchestration/cancellation.js';
export { RunEventBus } from './orchestration/event-bus.js';
export type {
  ExecutionRecord, ExecuteOptions, EngineOptions, LogCallback, CompletionCallback,
  RunEvent, RunEventOf, RunEventHandler, RunEventPayloads,
} from './orchestration/types.js';

// Host
export { createDeckRuntime } from './cli/runtime-factory.js';
export type { DeckRuntime, DeckRuntimeOptions } from './cli/runtime-factory.js';

// Constants
export {
  RUN_STATUS, CANCEL_REASON, EVENT_TYPE, EVENT_WILDCARD, EXIT_CODE, clampProgress,
} from './constants.js';
export type { RunStatus, CancelReason, RunEventType } from './constants.js';
