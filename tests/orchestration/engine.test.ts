import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ExecutionEngine } from '../../src/orchestration/engine.js';
import { PluginRegistry } from '../../src/domain/plugin/registry.js';
import type { PluginSettingsProvider } from '../../src/domain/settings/types.js';
import type { ExecuteOptions, ExecutionRecord, RunEvent } from '../../src/orchestration/types.js';
import type { Logger } from '../../src/logging/logger.js';
import {
  COOPERATIVE_SOURCE, STUBBORN_SOURCE, captureLogger, makeTempDir, quietLogger, sleep, waitUntil, writePlugin,
} from '../fixtures/plugins.js';
import { promises as fs } from 'node:fs';

const MONITOR_MS = 20;

const settings: PluginSettingsProvider = {
  getPluginSettings: (pluginId) => (pluginId === 'echo' ? { threshold: 3 } : {}),
};

/** Busy-waits up to 1.5s without yielding, checking only the token. */
const SPINNER_SOURCE = `
exports.run = function run(params, progress, token) {
  progress(10);
  const started = Date.now();
  while (Date.now() - started < 1500) {
    if (token.isCancelled) return;
  }
};
`;

describe('ExecutionEngine', () => {
  let root: string;
  let engines: ExecutionEngine[];

  beforeEach(async () => {
    root = await makeTempDir('engine-test-');
    engines = [];
  });

  afterEach(async () => {
    await Promise.all(engines.map((engine) => engine.shutdown(0)));
    await fs.rm(root, { recursive: true, force: true });
  });

  async function createEngine(logger: Logger = quietLogger(), defaultTimeoutSeconds = 0): Promise<ExecutionEngine> {
    const registry = new PluginRegistry(root, quietLogger());
    await registry.discoverPlugins();
    const engine = new ExecutionEngine(registry, settings, logger, { defaultTimeoutSeconds, monitorIntervalMs: MONITOR_MS });
    engines.push(engine);
    return engine;
  }

  /** Starts a run and resolves with the record passed to onComplete. */
  async function run(engine: ExecutionEngine, id: string, options: ExecuteOptions = {}): Promise<ExecutionRecord> {
    let resolve: (record: ExecutionRecord) => void = () => {};
    const completed = new Promise<ExecutionRecord>((r) => { resolve = r; });
    const accepted = await engine.executePlugin(id, {
      ...options,
      onComplete: (record) => {
        options.onComplete?.(record);
        resolve(record);
      },
    });
    expect(accepted).toBe(true);
    return completed;
  }

  describe('executePlugin()', () => {
    it('runs the demo plugin to success with one progress(50) report', async () => {
      await writePlugin(root, 'demo', {
        manifest: { id: 'demo', name: 'Demo' },
        source: `
exports.run = async function run(params, progress, token) {
  await new Promise((resolve) => setTimeout(resolve, 2000));
  progress(50);
};
`,
      });
      const engine = await createEngine();
      const reported: number[] = [];

      const record = await run(engine, 'demo', { onProgress: (p) => reported.push(p) });

      expect(reported.filter((p) => p === 50)).toHaveLength(1);
      expect(record.status).toBe('success');
      expect(record.progress).toBe(100);
      expect(record.message).toBe('Completed successfully');
      expect(record.executionTimeSeconds).toBeGreaterThanOrEqual(1.9);
    });

    it('returns before the plugin starts', async () => {
      await writePlugin(root, 'demo');
      const engine = await createEngine();

      const accepted = await engine.executePlugin('demo');

      expect(accepted).toBe(true);
      expect(engine.getResult('demo')?.status).toBe('pending');
      expect(engine.isPluginRunning('demo')).toBe(true);
      await engine.waitForCompletion('demo');
      expect(engine.getResult('demo')?.status).toBe('success');
    });

    it('moves through running before reaching a terminal state', async () => {
      await writePlugin(root, 'demo');
      const engine = await createEngine();
      const statuses: string[] = [];

      await run(engine, 'demo', {
        onLog: () => { statuses.push(engine.getResult('demo')?.status ?? 'none'); },
      });

      expect(statuses).toEqual(['running', 'running', 'success']);
    });

    it('refuses a second run of the same plugin while the first is active', async () => {
      await writePlugin(root, 'loop', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine();
      const logs: string[] = [];

      expect(await engine.executePlugin('loop')).toBe(true);
      const before = engine.getResult('loop');
      expect(await engine.executePlugin('loop', { onLog: (m) => logs.push(m) })).toBe(false);

      expect(logs).toEqual(['Plugin loop is already running']);
      expect(engine.getResult('loop')?.runId).toBe(before?.runId);
      expect(engine.getActivePlugins()).toEqual(['loop']);

      engine.cancelPlugin('loop');
      await engine.waitForCompletion('loop');
    });

    it('rejects unknown and invalid plugins through onLog', async () => {
      await writePlugin(root, 'hollow', { source: 'exports.other = 1;\n' });
      const engine = await createEngine();
      const logs: string[] = [];

      expect(await engine.executePlugin('ghost', { onLog: (m) => logs.push(m) })).toBe(false);
      expect(await engine.executePlugin('hollow', { onLog: (m) => logs.push(m) })).toBe(false);

      expect(logs).toEqual([
        'Plugin not found: ghost',
        'Plugin validation failed: Plugin hollow has no run() function',
      ]);
      expect(engine.getResult('hollow')).toBeUndefined();
    });

    it('refuses a run when settings cannot be read', async () => {
      await writePlugin(root, 'demo');
      const registry = new PluginRegistry(root, quietLogger());
      await registry.discoverPlugins();
      const broken: PluginSettingsProvider = {
        getPluginSettings: async () => { throw new Error('settings offline'); },
      };
      const engine = new ExecutionEngine(registry, broken, quietLogger(), {
        defaultTimeoutSeconds: 0,
        monitorIntervalMs: MONITOR_MS,
      });
      engines.push(engine);
      const logs: string[] = [];

      expect(await engine.executePlugin('demo', { onLog: (m) => logs.push(m) })).toBe(false);
      expect(logs).toEqual(['Could not load settings for demo: settings offline']);
    });

    it('injects log and settings into params', async () => {
      await writePlugin(root, 'echo', {
        source: `
exports.run = function run(params, progress, token) {
  params.log('input=' + params.input);
  params.log('settings=' + JSON.stringify(params.settings));
};
`,
      });
      const engine = await createEngine();
      const logs: string[] = [];

      await run(engine, 'echo', {
        params: { input: 'hello', settings: 'ignored', log: 'ignored' },
        onLog: (m) => logs.push(m),
      });

      expect(logs).toEqual([
        'Starting plugin: echo',
        'Executing plugin...',
        'input=hello',
        'settings={"threshold":3}',
        expect.stringMatching(/^Plugin completed: echo \(\d+\.\d+s\)$/),
      ]);
    });

    it('mentions the timeout in the start line', async () => {
      await writePlugin(root, 'demo');
      const engine = await createEngine();
      const logs: string[] = [];

      await run(engine, 'demo', { timeoutSeconds: 30, onLog: (m) => logs.push(m) });

      expect(logs[0]).toBe('Starting plugin: demo (timeout: 30s)');
    });
  });

  describe('progress', () => {
    it('clamps reported values before storing and forwarding them', async () => {
      await writePlugin(root, 'wild', {
        source: `
exports.run = function run(params, progress, token) {
  progress(-10);
  progress(150);
  progress(42.6);
};
`,
      });
      const engine = await createEngine();
      const seen: [number, number | undefined][] = [];

      await run(engine, 'wild', {
        onProgress: (p) => { seen.push([p, engine.getResult('wild')?.progress]); },
      });

      expect(seen).toEqual([[0, 0], [0, 0], [100, 100], [43, 43], [100, 100]]);
    });
  });

  describe('cancellation', () => {
    it('ends a cooperative plugin as cancelled', async () => {
      await writePlugin(root, 'loop', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine();
      const done = run(engine, 'loop');

      await waitUntil(() => engine.isPluginRunning('loop'));
      expect(engine.cancelPlugin('loop')).toBe(true);
      const record = await done;

      expect(record.status).toBe('cancelled');
      expect(record.message).toBe('Cancelled by user');
      expect(engine.getActivePlugins()).toEqual([]);
    });

    it('treats a CancelledError from throwIfCancelled as cancellation', async () => {
      await writePlugin(root, 'thrower', {
        source: `
exports.run = async function run(params, progress, token) {
  for (;;) {
    token.throwIfCancelled();
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
};
`,
      });
      const engine = await createEngine();
      const done = run(engine, 'thrower');

      await waitUntil(() => engine.isPluginRunning('thrower'));
      engine.cancelPlugin('thrower');

      expect((await done).status).toBe('cancelled');
    });

    it('reports a plain error thrown after cancellation as an error', async () => {
      await writePlugin(root, 'grumpy', {
        source: `
exports.run = async function run(params, progress, token) {
  while (!token.isCancelled) await new Promise((resolve) => setTimeout(resolve, 5));
  throw new Error('cleanup failed');
};
`,
      });
      const engine = await createEngine();
      const done = run(engine, 'grumpy');

      await waitUntil(() => engine.isPluginRunning('grumpy'));
      engine.cancelPlugin('grumpy');
      const record = await done;

      expect(record.status).toBe('error');
      expect(record.error).toBe('cleanup failed');
    });

    it('reaches a plugin stuck in synchronous code', async () => {
      await writePlugin(root, 'spinner', { source: SPINNER_SOURCE });
      const engine = await createEngine();
      const reported: number[] = [];
      const done = run(engine, 'spinner', { onProgress: (p) => reported.push(p) });

      await waitUntil(() => reported.includes(10));
      expect(engine.cancelPlugin('spinner')).toBe(true);
      const record = await done;

      expect(record.status).toBe('cancelled');
      expect(record.executionTimeSeconds).toBeLessThan(1);
    });

    it('returns false when nothing is running', async () => {
      const engine = await createEngine();
      expect(engine.cancelPlugin('idle')).toBe(false);
    });

    it('cancels every active run', async () => {
      await writePlugin(root, 'a', { source: COOPERATIVE_SOURCE });
      await writePlugin(root, 'b', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine();
      const runs = [run(engine, 'a'), run(engine, 'b')];
      await waitUntil(() => engine.getActivePlugins().length === 2);

      engine.cancelAll();

      const records = await Promise.all(runs);
      expect(records.map((r) => r.status)).toEqual(['cancelled', 'cancelled']);
    });
  });

  describe('timeout', () => {
    it('marks a plugin that never returns as timed out within one poll interval', async () => {
      await writePlugin(root, 'stubborn', { source: STUBBORN_SOURCE });
      const engine = await createEngine();
      const timeouts: RunEvent[] = [];
      engine.events.on('run.timeout', (e) => { timeouts.push(e); });
      const logs: string[] = [];

      const started = Date.now();
      expect(await engine.executePlugin('stubborn', { timeoutSeconds: 0.1, onLog: (m) => logs.push(m) })).toBe(true);
      await waitUntil(() => engine.getResult('stubborn')?.status === 'timeout');
      const elapsed = Date.now() - started;

      expect(elapsed).toBeLessThan(100 + MONITOR_MS + 150);
      const record = engine.getResult('stubborn');
      expect(record?.message).toBe('Execution timeout after 0.1 seconds');
      expect(record?.error).toBe('Plugin exceeded maximum execution time');
      expect(timeouts.map((e) => e.pluginId)).toEqual(['stubborn']);
      expect(logs).toContain('Plugin execution timeout (0.1s), cancelling...');

      // The worker is still alive, so the plugin stays active and cannot be restarted.
      expect(engine.isPluginRunning('stubborn')).toBe(true);
      expect(await engine.executePlugin('stubborn')).toBe(false);
    });

    it('keeps the timeout status when the plugin later returns', async () => {
      await writePlugin(root, 'slow', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine();
      const completions: ExecutionRecord[] = [];

      const record = await run(engine, 'slow', { timeoutSeconds: 0.05, onComplete: (r) => completions.push(r) });

      expect(record.status).toBe('timeout');
      expect(completions).toHaveLength(1);
      expect(engine.getActivePlugins()).toEqual([]);
      expect(engine.getResult('slow')?.status).toBe('timeout');
    });

    it('keeps the timeout status when the plugin later throws', async () => {
      await writePlugin(root, 'late', {
        source: `
exports.run = async function run(params, progress, token) {
  while (!token.isCancelled) await new Promise((resolve) => setTimeout(resolve, 5));
  throw new Error('too late');
};
`,
      });
      const { logger, entries } = captureLogger('warn');
      const engine = await createEngine(logger);

      const record = await run(engine, 'late', { timeoutSeconds: 0.05 });

      expect(record.status).toBe('timeout');
      expect(record.error).toBe('Plugin exceeded maximum execution time');
      expect(entries.map((e) => e.message)).toContain('Plugin late failed after timing out: too late');
    });

    it('times out a plugin stuck in synchronous code', async () => {
      await writePlugin(root, 'spinner', { source: SPINNER_SOURCE });
      const engine = await createEngine();
      const logs: string[] = [];

      const record = await run(engine, 'spinner', { timeoutSeconds: 0.2, onLog: (m) => logs.push(m) });

      expect(record.status).toBe('timeout');
      expect(record.message).toBe('Execution timeout after 0.2 seconds');
      expect(record.executionTimeSeconds).toBeLessThan(1);
      expect(logs).toContain('Plugin execution timeout (0.2s), cancelling...');
    });

    it('uses the configured default timeout', async () => {
      await writePlugin(root, 'slow', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine(quietLogger(), 0.05);

      expect((await run(engine, 'slow')).status).toBe('timeout');
    });

    it('never touches a later run of the same plugin', async () => {
      await writePlugin(root, 'nap', {
        source: `
exports.run = async function run(params, progress, token) {
  await new Promise((resolve) => setTimeout(resolve, params.napMs));
};
`,
      });
      const engine = await createEngine();

      const first = await run(engine, 'nap', { params: { napMs: 0 }, timeoutSeconds: 1 });
      const second = await run(engine, 'nap', { params: { napMs: 1500 }, timeoutSeconds: 0 });

      expect(first.status).toBe('success');
      expect(second.status).toBe('success');
      expect(second.runId).not.toBe(first.runId);
    });
  });

  describe('errors and callbacks', () => {
    it('records a throwing plugin as an error and completes once', async () => {
      await writePlugin(root, 'boom', {
        source: "exports.run = function run(params, progress, token) { throw new Error('kaboom'); };\n",
      });
      const engine = await createEngine();
      const completions: ExecutionRecord[] = [];

      const record = await run(engine, 'boom', { onComplete: (r) => completions.push(r) });

      expect(record.status).toBe('error');
      expect(record.error).toBe('kaboom');
      expect(record.message).toBe('Error: kaboom');
      expect(completions).toHaveLength(1);
      expect(engine.getActivePlugins()).toEqual([]);
      expect(engine.getResult('boom')?.status).toBe('error');
    });

    it('reports progress 0 after the error line', async () => {
      await writePlugin(root, 'boom', {
        source: "exports.run = function run(params, progress, token) { progress(30); throw new Error('kaboom'); };\n",
      });
      const engine = await createEngine();
      const trail: string[] = [];

      await run(engine, 'boom', {
        onLog: (m) => trail.push(`log:${m}`),
        onProgress: (p) => trail.push(`progress:${p}`),
      });

      expect(trail.slice(-3)).toEqual(['progress:30', 'log:Plugin error: kaboom', 'progress:0']);
    });

    it('fails a run whose params cannot be sent to its thread', async () => {
      await writePlugin(root, 'demo');
      const engine = await createEngine();

      const record = await run(engine, 'demo', { params: { callback: () => 1 } });

      expect(record.status).toBe('error');
      expect(record.error).toMatch(/could not be cloned/);
      expect(engine.getActivePlugins()).toEqual([]);
    });

    it('fails a run whose thread exits before reporting', async () => {
      await writePlugin(root, 'quitter', {
        source: 'exports.run = function run(params, progress, token) { process.exit(3); };\n',
      });
      const engine = await createEngine();

      const record = await run(engine, 'quitter');

      expect(record.status).toBe('error');
      expect(record.error).toBe('Plugin thread exited with code 3 before finishing');
    });

    it('describes thrown values that are not errors', async () => {
      await writePlugin(root, 'odd', {
        source: "exports.run = async function run(params, progress, token) { throw 'plain string'; };\n",
      });
      const engine = await createEngine();

      expect((await run(engine, 'odd')).error).toBe('plain string');
    });

    it('keeps running when host callbacks throw', async () => {
      await writePlugin(root, 'demo');
      const { logger, entries } = captureLogger('error');
      const engine = await createEngine(logger);
      let completed = false;

      await engine.executePlugin('demo', {
        onLog: () => { throw new Error('log sink down'); },
        onProgress: () => { throw new Error('bar broke'); },
        onComplete: () => { completed = true; throw new Error('ui gone'); },
      });
      await engine.waitForCompletion('demo');

      expect(completed).toBe(true);
      expect(engine.getResult('demo')?.status).toBe('success');
      expect(new Set(entries.map((e) => e.context))).toEqual(new Set(['engine.callbacks']));
      expect(entries.map((e) => e.message)).toContain('Error in completion callback: ui gone');
      expect(entries.map((e) => e.message)).toContain('Error in progress callback: bar broke');
      expect(entries.map((e) => e.message)).toContain('Error in log callback: log sink down');
    });
  });

  describe('queries', () => {
    it('returns copies of records', async () => {
      await writePlugin(root, 'demo');
      const engine = await createEngine();
      await run(engine, 'demo');

      const copy = engine.getResult('demo');
      if (copy) copy.status = 'error';

      expect(engine.getResult('demo')?.status).toBe('success');
    });

    it('reports live and stored execution times', async () => {
      await writePlugin(root, 'loop', { source: COOPERATIVE_SOURCE });
      const engine = await createEngine();
      expect(engine.getExecutionTime('loop')).toBeUndefined();

      const done = run(engine, 'loop');
      await waitUntil(() => engine.isPluginRunning('loop'));
      await sleep(10);
      expect(engine.getExecutionTime('loop')).toBeGreaterThan(0);

      engine.cancelPlugin('loop');
      const record = await done;
      expect(engine.getExecutionTime('loop')).toBe(record.executionTimeSeconds);
    });

    it('waits for completion with and without a limit', async () => {
      await writePlugin(root, 'stubborn', { source: STUBBORN_SOURCE });
      await writePlugin(root, 'demo');
      const engine = await createEngine();

      expect(await engine.waitForCompletion('demo')).toBe(true);
      await engine.executePlugin('stubborn');
      expect(await engine.waitForCompletion('stubborn', 0.05)).toBe(false);

      await engine.executePlugin('demo');
      expect(await engine.waitForCompletion('demo', 5)).toBe(true);
      expect(engine.isPluginRunning('demo')).toBe(false);
    });
  });

  describe('events', () => {
    it('publishes the lifecycle of a run in order', async () => {
      await writePlugin(root, 'quiet', { source: 'exports.run = function run(params, progress, token) {};\n' });
      const engine = await createEngine();
      const types: string[] = [];
      engine.events.on('*', (e) => { types.push(e.type); });

      const record = await run(engine, 'quiet');

      expect(types).toEqual([
        'run.started', 'run.log', 'run.progress', 'run.log', 'run.log', 'run.progress', 'run.completed',
      ]);
      expect(record.runId).toMatch(/^run-/);
    });
  });

  describe('shutdown()', () => {
    it('cancels cooperative runs and reports the ones still alive', async () => {
      await writePlugin(root, 'loop', { source: COOPERATIVE_SOURCE });
      await writePlugin(root, 'stubborn', { source: STUBBORN_SOURCE });
      const engine = await createEngine();
      await engine.executePlugin('loop');
      await engine.executePlugin('stubborn');

      const remaining = await engine.shutdown(0.2);

      expect(remaining).toEqual(['stubborn']);
      expect(engine.getResult('loop')?.status).toBe('cancelled');
    });
  });
});
