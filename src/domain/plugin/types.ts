import type { CancelReason } from '../../constants.js';
import type { DeckError } from '../../errors.js';
import type { Result } from '../../infra/types.js';

export interface PluginDescriptor {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly author: string;
  /** Absolute path of the plugin directory */
  readonly location: string;
  readonly icon?: string;
  readonly requiresElevatedRights: boolean;
}

/** Raw plugin.json fields, as authored. */
export interface PluginManifest {
  id?: string;
  name?: string;
  description?: string;
  version?: string;
  author?: string;
  icon?: string;
  requires_admin?: boolean;
}

export type ProgressCallback = (percent: number) => void;

/**
 * Parameters handed to a plugin: the caller's params plus the injected
 * `log` function and the plugin's `settings`.
 */
export interface PluginParams {
  [key: string]: unknown;
  log: (message: string) => void;
  settings: Record<string, unknown>;
}

/** The cancellation view a plugin's `run` receives on its own thread. */
export interface PluginToken {
  readonly isCancelled: boolean;
  readonly reason: CancelReason | undefined;
  readonly signal: AbortSignal;
  throwIfCancelled(): void;
}

/**
 * Contract of the `run` export. Params must survive a structured clone,
 * since the entry point runs on a worker thread.
 */
export type PluginEntryPoint = (
  params: PluginParams,
  progress: ProgressCallback,
  token: PluginToken,
) => unknown;

/** A compiled and initialized entry file, before its exports are checked. */
export interface LoadedModule {
  descriptor: PluginDescriptor;
  entryFile: string;
  /** Whatever the unit assigned to `module.exports` */
  exports: unknown;
}

/** A module whose `run` export passed validation. */
export interface LoadedPlugin extends LoadedModule {
  /** Declared parameter count of `run` */
  arity: number;
}

/** The subset of the registry the execution engine depends on. */
export interface PluginSource {
  getPlugin(id: string): PluginDescriptor | undefined;
  validatePlugin(id: string): Promise<Result<LoadedPlugin>>;
}

export type LoadResult = Result<LoadedModule, DeckError>;
