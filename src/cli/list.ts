import type { DeckRuntime } from './runtime-factory.js';
import { EXIT_CODE } from '../constants.js';

export function listPlugins(runtime: Pick<DeckRuntime, 'registry'>): number {
  const plugins = runtime.registry.getAllPlugins();
  if (plugins.length === 0) {
    console.log(`No plugins found in ${runtime.registry.getPluginsDir()}`);
    return EXIT_CODE.OK;
  }

  console.log(`Plugins (${plugins.length}):`);
  for (const plugin of plugins) {
    const admin = plugin.requiresElevatedRights ? ' [admin]' : '';
    console.log(`  ${plugin.id} - ${plugin.name} v${plugin.version} by ${plugin.author}${admin}`);
    if (plugin.description) console.log(`    ${plugin.description}`);
  }
  return EXIT_CODE.OK;
}
