import type { DeckRuntime } from './runtime-factory.js';
import { err, ok, type Result } from '../infra/types.js';
import { EVENT_TYPE, EXIT_CODE, RUN_STATUS, TIMEOUT_GRACE_SECONDS } from '../constants.js';

export interface RunCommandOptions {
  /** `key=value` pairs; values that parse as JSON are passed parsed */
  param?: string[];
  /** Seconds; 0 disables the timeout */
  timeout?: number;
}

export function parseParams(pairs: string[]): Result<Record<string, unknown>> {
  const params: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) return err(`Invalid parameter '${pair}', expected key=value`);
    params[pair.slice(0, eq)] = parseValue(pair.slice(eq + 1));
  }
  return ok(params);
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Runs one plugin in the foreground, printing its log lines and progress.
 * SIGINT requests cancellation. Resolves to the process exit code.
 */
export async function runPluginCommand(
  runtime: Pick<DeckRuntime, 'registry' | 'engine'>,
  pluginId: string,
  options: RunCommandOptions = {},
): Promise<number> {
  const { registry, engine } = runtime;

  const parsed = parseParams(options.param ?? []);
  if (!parsed.ok) {
    console.error(parsed.error);
    return EXIT_CODE.USAGE;
  }
  if (!registry.getPlugin(pluginId)) {
    console.error(`Plugin not found: ${pluginId}`);
    return EXIT_CODE.NOT_FOUND;
  }

  let lastProgress = -1;
  const accepted = await engine.executePlugin(pluginId, {
    params: parsed.value,
    timeoutSeconds: options.timeout,
    onLog: (message) => console.log(message),
    onProgress: (percent) => {
      if (percent === lastProgress) return;
      lastProgress = percent;
      console.log(`Progress: ${percent}%`);
    },
  });
  if (!accepted) return EXIT_CODE.PLUGIN_ERROR;

  const onSigint = () => {
    console.error('Cancelling...');
    engine.cancelPlugin(pluginId);
  };
  process.on('SIGINT', onSigint);

  let unsubscribe = () => {};
  const timedOut = new Promise<void>((resolve) => {
    unsubscribe = engine.events.on(EVENT_TYPE.RUN_TIMEOUT, (event) => {
      if (event.pluginId === pluginId) resolve();
    });
  });

  try {
    await Promise.race([
      engine.waitForCompletion(pluginId),
      timedOut.then(() => engine.waitForCompletion(pluginId, TIMEOUT_GRACE_SECONDS)),
    ]);
  } finally {
    process.off('SIGINT', onSigint);
    unsubscribe();
  }

  const record = engine.getResult(pluginId);
  if (!record) return EXIT_CODE.PLUGIN_ERROR;
  console.log(`${record.status.toUpperCase()}: ${record.message} (${record.executionTimeSeconds.toFixed(1)}s)`);
  return record.status === RUN_STATUS.SUCCESS ? EXIT_CODE.OK : EXIT_CODE.PLUGIN_ERROR;
}
