import { promises as fs, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Logger } from '../../logging/logger.js';
import { isContainedIn, readUtf8Strict, statOrNull } from '../../infra/fs-utils.js';
import { err, ok, type Result } from '../../infra/types.js';
import { NotFoundError, ValidationError, errorMessage } from '../../errors.js';
import { ENTRY_ARITY, ENTRY_EXPORT, ENTRY_FILE, MANIFEST_FILE } from '../../constants.js';
import { parseManifest, toDescriptor } from './manifest.js';
import { PluginModuleLoader, entryFileOf, readExport } from './module-loader.js';
import type { LoadResult, LoadedPlugin, PluginDescriptor, PluginSource } from './types.js';

export class PluginRegistry implements PluginSource {
  private plugins = new Map<string, PluginDescriptor>();
  private loader = new PluginModuleLoader();
  private pluginsDir: string;
  private logger: Logger;

  constructor(pluginsDir: string, logger: Logger) {
    this.pluginsDir = resolve(pluginsDir);
    this.logger = logger.child('registry');
  }

  getPluginsDir(): string {
    return this.pluginsDir;
  }

  /**
   * Scans the immediate subdirectories of the plugins root and replaces the
   * registered set with what it finds. A bad entry is logged and skipped;
   * the pass as a whole never fails.
   */
  async discoverPlugins(): Promise<PluginDescriptor[]> {
    const found = new Map<string, PluginDescriptor>();

    let entries: Dirent[];
    try {
      await fs.mkdir(this.pluginsDir, { recursive: true });
      entries = await fs.readdir(this.pluginsDir, { withFileTypes: true });
    } catch (e) {
      this.logger.error('Could not read plugins directory', { dir: this.pluginsDir, error: errorMessage(e) });
      this.plugins = found;
      return [];
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const dir = join(this.pluginsDir, entry.name);
      try {
        const descriptor = await this.inspect(entry, dir);
        if (!descriptor) continue;
        if (found.has(descriptor.id)) {
          this.logger.warn(`Duplicate plugin ID '${descriptor.id}' in ${dir}, skipping`);
          continue;
        }
        found.set(descriptor.id, descriptor);
        this.logger.info(`Loaded plugin: ${descriptor.name} (v${descriptor.version})`, { id: descriptor.id });
      } catch (e) {
        this.logger.error(`Unexpected error loading plugin from ${dir}`, { error: errorMessage(e) });
      }
    }

    this.plugins = found;
    this.logger.info(`Discovered ${found.size} plugin(s)`);
    return [...found.values()];
  }

  getPlugin(id: string): PluginDescriptor | undefined {
    return this.plugins.get(id);
  }

  getAllPlugins(): PluginDescriptor[] {
    return [...this.plugins.values()];
  }

  async loadPluginModule(id: string): Promise<LoadResult> {
    const descriptor = this.plugins.get(id);
    if (!descriptor) return err(new NotFoundError('Plugin', id));
    return this.loader.load(descriptor);
  }

  /**
   * Checks that a plugin can be executed right now, running its top-level
   * code again. The error value is a reason suitable for showing to a user.
   */
  async validatePlugin(id: string): Promise<Result<LoadedPlugin>> {
    const descriptor = this.plugins.get(id);
    if (!descriptor) return err(`Plugin not found: ${id}`);

    if (!(await isContainedIn(this.pluginsDir, descriptor.location))) {
      return err(`Plugin ${id} has invalid path`);
    }

    const stat = await statOrNull(entryFileOf(descriptor)).catch(() => null);
    if (!stat) return err(`Plugin ${id} is missing ${ENTRY_FILE}`);
    if (!stat.isFile()) return err(`Plugin ${id} ${ENTRY_FILE} is not a file`);

    const loaded = await this.loadPluginModule(id);
    if (!loaded.ok) return err(loaded.error.message);

    const entry = readExport(loaded.value.exports, ENTRY_EXPORT);
    if (entry === undefined) return err(`Plugin ${id} has no ${ENTRY_EXPORT}() function`);
    if (typeof entry !== 'function') return err(`Plugin ${id} ${ENTRY_EXPORT} is not callable`);

    if (entry.length !== ENTRY_ARITY) {
      this.logger.warn(
        `Plugin ${id} ${ENTRY_EXPORT}() has ${entry.length} parameters, expected ${ENTRY_ARITY} (params, progress, token)`,
      );
    }

    return ok({ ...loaded.value, arity: entry.length });
  }

  private async inspect(entry: Dirent, dir: string): Promise<PluginDescriptor | null> {
    const isDir = entry.isDirectory()
      || (entry.isSymbolicLink() && (await statOrNull(dir))?.isDirectory() === true);
    if (!isDir) return null;

    if (!(await isContainedIn(this.pluginsDir, dir))) {
      this.logger.warn(`Skipping plugin with invalid path: ${dir}`);
      return null;
    }

    const manifestPath = join(dir, MANIFEST_FILE);
    if (!(await statOrNull(manifestPath))?.isFile()) {
      this.logger.debug(`Skipping ${entry.name}: no ${MANIFEST_FILE} found`);
      return null;
    }
    if (!(await statOrNull(join(dir, ENTRY_FILE)))) {
      this.logger.debug(`Skipping ${entry.name}: no ${ENTRY_FILE} found`);
      return null;
    }

    let raw: string;
    try {
      raw = await readUtf8Strict(manifestPath);
    } catch (e) {
      const kind = e instanceof TypeError ? 'Encoding error' : 'IO error';
      this.logger.error(`${kind} reading ${manifestPath}`, { error: errorMessage(e) });
      return null;
    }

    try {
      const { manifest, warnings } = parseManifest(raw);
      for (const warning of warnings) {
        this.logger.warn(`${warning}: ${manifestPath}`);
      }
      return toDescriptor(manifest, entry.name, dir);
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      this.logger.error(`${e.message}: ${manifestPath}`, { errors: e.errors });
      return null;
    }
  }
}
