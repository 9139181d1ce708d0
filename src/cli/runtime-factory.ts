import { join } from 'node:path';
import { ConfigLoader } from '../domain/config/loader.js';
import type { DeckConfig } from '../domain/config/types.js';
import { PluginRegistry } from '../domain/plugin/registry.js';
import { SettingsStore } from '../domain/settings/store.js';
import { ExecutionEngine } from '../orchestration/engine.js';
import { createLogger, type LogLevel, type Logger } from '../logging/logger.js';
import { DEFAULT_DATA_DIR, PLUGINS_DIR, SETTINGS_FILE } from '../constants.js';

export interface DeckRuntimeOptions {
  /** Directory with a config.json layered over the global one */
  configDir?: string;
  /** Global data directory; defaults to ~/.local/share/plugin-deck */
  globalDir?: string;
  /** Overrides the configured plugins directory */
  pluginsDir?: string;
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface DeckRuntime {
  config: DeckConfig;
  logger: Logger;
  registry: PluginRegistry;
  settings: SettingsStore;
  engine: ExecutionEngine;
}

/**
 * Loads configuration and wires registry, settings and engine together.
 * Plugins are discovered before this resolves.
 */
export async function createDeckRuntime(options: DeckRuntimeOptions = {}): Promise<DeckRuntime> {
  const globalDir = options.globalDir ?? DEFAULT_DATA_DIR;
  const loader = new ConfigLoader();
  const config = options.configDir
    ? await loader.loadWithFallback(options.configDir, globalDir)
    : await loader.load(globalDir);

  const logger = options.logger ?? createLogger(config.logging.level);
  if (options.logLevel) logger.setLevel(options.logLevel);

  const registry = new PluginRegistry(
    options.pluginsDir ?? config.pluginsDir ?? join(globalDir, PLUGINS_DIR),
    logger,
  );
  const settings = await SettingsStore.open(config.settingsFile ?? join(globalDir, SETTINGS_FILE), logger);
  const engine = new ExecutionEngine(registry, settings, logger, config.execution);

  await registry.discoverPlugins();
  return { config, logger, registry, settings, engine };
}
