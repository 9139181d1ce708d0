import type { DeckRuntime } from './runtime-factory.js';
import { describeLoadFailure } from '../errors.js';
import { EXIT_CODE } from '../constants.js';

export async function validatePluginCommand(
  runtime: Pick<DeckRuntime, 'registry'>,
  pluginId: string,
): Promise<number> {
  const { registry } = runtime;
  if (!registry.getPlugin(pluginId)) {
    console.error(`Plugin not found: ${pluginId}`);
    return EXIT_CODE.NOT_FOUND;
  }

  const result = await registry.validatePlugin(pluginId);
  if (result.ok) {
    console.log(`${pluginId} is valid`);
    return EXIT_CODE.OK;
  }

  console.error(`${pluginId} is invalid: ${result.error}`);
  const loaded = await registry.loadPluginModule(pluginId);
  if (!loaded.ok) console.error(`Hint: ${describeLoadFailure(loaded.error)}`);
  return EXIT_CODE.PLUGIN_ERROR;
}
