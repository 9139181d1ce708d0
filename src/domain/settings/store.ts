import { readFileOrNull, writeFileAtomic } from '../../infra/fs-utils.js';
import { isPlainObject } from '../../infra/types.js';
import { errorMessage } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import type { PluginSettings, PluginSettingsProvider, SettingsDocument } from './types.js';

export class SettingsStore implements PluginSettingsProvider {
  private constructor(
    private filePath: string,
    private data: SettingsDocument,
    private logger: Logger,
  ) {}

  /**
   * Loads settings.json. A missing file yields empty settings; an unreadable
   * or malformed one is logged and replaced by empty settings on the next save.
   */
  static async open(filePath: string, logger: Logger): Promise<SettingsStore> {
    const log = logger.child('settings');
    let data: SettingsDocument = { plugin_settings: {} };

    let raw: string | null = null;
    try {
      raw = await readFileOrNull(filePath);
    } catch (e) {
      log.warn('Could not read settings, starting empty', { filePath, error: errorMessage(e) });
    }

    if (raw !== null) {
      try {
        const parsed: unknown = JSON.parse(raw);
        if (isPlainObject(parsed)) {
          const pluginSettings = parsed['plugin_settings'];
          data = {
            ...parsed,
            plugin_settings: isPlainObject(pluginSettings) ? normalize(pluginSettings) : {},
          };
        } else {
          log.warn('Settings root is not an object, starting empty', { filePath });
        }
      } catch (e) {
        log.warn('Invalid JSON in settings, starting empty', { filePath, error: errorMessage(e) });
      }
    }

    return new SettingsStore(filePath, data, log);
  }

  getPluginSettings(pluginId: string): PluginSettings {
    return structuredClone(this.data.plugin_settings[pluginId] ?? {});
  }

  setPluginSettings(pluginId: string, settings: PluginSettings): void {
    this.data.plugin_settings[pluginId] = structuredClone(settings);
  }

  getPluginSetting(pluginId: string, key: string, fallback?: unknown): unknown {
    const settings = this.data.plugin_settings[pluginId];
    if (!settings || !Object.prototype.hasOwnProperty.call(settings, key)) return fallback;
    return structuredClone(settings[key]);
  }

  setPluginSetting(pluginId: string, key: string, value: unknown): void {
    const settings = this.data.plugin_settings[pluginId] ?? {};
    settings[key] = structuredClone(value);
    this.data.plugin_settings[pluginId] = settings;
  }

  resetPluginSettings(pluginId: string, defaults: PluginSettings): void {
    this.data.plugin_settings[pluginId] = structuredClone(defaults);
  }

  deletePluginSettings(pluginId: string): boolean {
    if (!Object.prototype.hasOwnProperty.call(this.data.plugin_settings, pluginId)) return false;
    delete this.data.plugin_settings[pluginId];
    return true;
  }

  listConfiguredPlugins(): string[] {
    return Object.keys(this.data.plugin_settings).sort();
  }

  async save(): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(this.data, null, 2));
    this.logger.debug('Settings saved', { filePath: this.filePath });
  }
}

function normalize(raw: Record<string, unknown>): Record<string, PluginSettings> {
  const out: Record<string, PluginSettings> = {};
  for (const [id, value] of Object.entries(raw)) {
    if (isPlainObject(value)) out[id] = value;
  }
  return out;
}
