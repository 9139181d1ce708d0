export type PluginSettings = Record<string, unknown>;

/** Read-only view of per-plugin settings consumed by the execution engine. */
export interface PluginSettingsProvider {
  getPluginSettings(pluginId: string): PluginSettings | Promise<PluginSettings>;
}

/** On-disk layout of settings.json; unknown top-level keys are preserved. */
export interface SettingsDocument {
  plugin_settings: Record<string, PluginSettings>;
  [key: string]: unknown;
}
