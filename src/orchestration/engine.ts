import { nanoid } from 'nanoid';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { Worker } from 'node:worker_threads';
import type { Logger } from '../logging/logger.js';
import type { LoadedPlugin, PluginSource } from '../domain/plugin/types.js';
import type { PluginSettings, PluginSettingsProvider } from '../domain/settings/types.js';
import { unitFilename } from '../domain/plugin/module-loader.js';
import { TimeoutError, errorMessage } from '../errors.js';
import {
  CANCEL_REASON, EVENT_TYPE, ID_PREFIX, NANOID_LENGTH_RUN, RUN_STATUS, TERMINAL_STATUSES, clampProgress,
} from '../constants.js';
import { CancellationToken } from './cancellation.js';
import { RunEventBus } from './event-bus.js';
import {
  PLUGIN_THREAD_SOURCE, isThreadMessage, threadFailure, type PluginThreadData, type ThreadFailure,
} from './plugin-thread.js';
import type { EngineOptions, ExecuteOptions, ExecutionRecord } from './types.js';

interface WorkerHandle {
  runId: string;
  done: Promise<void>;
}

interface RunContext {
  pluginId: string;
  runId: string;
  plugin: LoadedPlugin;
  record: ExecutionRecord;
  token: CancellationToken;
  params: Record<string, unknown>;
  settings: PluginSettings;
  timeoutSeconds: number;
  onLog: (message: string) => void;
  onProgress: (percent: number) => void;
  onComplete: (record: ExecutionRecord) => void;
}

type Outcome =
  | { kind: 'returned' }
  | { kind: 'threw'; error: ThreadFailure };

/**
 * Runs validated plugins on worker threads with at most one active run per
 * plugin id. Log lines, progress and the outcome come back as messages; the
 * cancel flag is a shared memory cell, so a plugin busy in synchronous code
 * still sees it and never holds up the caller or the timeout monitor.
 *
 * The four tracking maps are only read or written on the caller's thread, in
 * synchronous sections that never await, so the event loop serializes every
 * access.
 */
export class ExecutionEngine {
  readonly events: RunEventBus;

  private workers = new Map<string, WorkerHandle>();
  private tokens = new Map<string, CancellationToken>();
  private startTimes = new Map<string, number>();
  private results = new Map<string, ExecutionRecord>();
  private monitors = new Map<string, ReturnType<typeof setInterval>>();
  private threads = new Map<string, Worker>();

  private logger: Logger;
  private callbackLogger: Logger;

  constructor(
    private registry: PluginSource,
    private settings: PluginSettingsProvider,
    logger: Logger,
    private options: EngineOptions,
  ) {
    this.logger = logger.child('engine');
    this.callbackLogger = this.logger.child('callbacks');
    this.events = new RunEventBus(this.logger);
  }

  /**
   * Starts a run and returns once it is scheduled. Resolves false, after
   * reporting the reason through `onLog`, when the plugin is unknown,
   * fails validation or already has an active run.
   */
  async executePlugin(pluginId: string, options: ExecuteOptions = {}): Promise<boolean> {
    const onLog = this.guard('log', options.onLog);

    const descriptor = this.registry.getPlugin(pluginId);
    if (!descriptor) {
      return this.refuse(`Plugin not found: ${pluginId}`, onLog);
    }

    const validation = await this.registry.validatePlugin(pluginId);
    if (!validation.ok) {
      return this.refuse(`Plugin validation failed: ${validation.error}`, onLog);
    }

    let settings: PluginSettings;
    try {
      settings = await this.settings.getPluginSettings(pluginId);
    } catch (e) {
      return this.refuse(`Could not load settings for ${pluginId}: ${errorMessage(e)}`, onLog);
    }

    if (this.workers.has(pluginId)) {
      return this.refuse(`Plugin ${pluginId} is already running`, onLog);
    }

    const timeoutSeconds = options.timeoutSeconds ?? this.options.defaultTimeoutSeconds;
    const runId = `${ID_PREFIX.RUN}${nanoid(NANOID_LENGTH_RUN)}`;
    const startedAt = Date.now();
    const token = new CancellationToken();
    const record: ExecutionRecord = {
      runId,
      pluginId,
      status: RUN_STATUS.PENDING,
      message: 'Starting...',
      progress: 0,
      executionTimeSeconds: 0,
      startedAt,
    };

    this.results.set(pluginId, record);
    this.tokens.set(pluginId, token);
    this.startTimes.set(pluginId, startedAt);
    const done = this.runWorker({
      pluginId,
      runId,
      plugin: validation.value,
      record,
      token,
      params: { ...options.params },
      settings,
      timeoutSeconds,
      onLog,
      onProgress: this.guard('progress', options.onProgress),
      onComplete: this.guard('completion', options.onComplete),
    }).catch((e: unknown) => {
      this.logger.error(`Worker for ${pluginId} failed: ${errorMessage(e)}`, { runId });
      this.release(pluginId, runId);
    });
    this.workers.set(pluginId, { runId, done });

    if (timeoutSeconds > 0) {
      this.startMonitor(pluginId, runId, timeoutSeconds, onLog);
    }

    this.logger.debug(`Scheduled ${pluginId}`, { runId, timeoutSeconds });
    return true;
  }

  /** Requests cooperative cancellation. Returns whether a run was active. */
  cancelPlugin(pluginId: string): boolean {
    const token = this.tokens.get(pluginId);
    if (!token) return false;
    token.cancel(CANCEL_REASON.USER);
    this.logger.info(`Cancellation requested for ${pluginId}`);
    return true;
  }

  cancelAll(): void {
    for (const pluginId of [...this.tokens.keys()]) {
      this.cancelPlugin(pluginId);
    }
  }

  isPluginRunning(pluginId: string): boolean {
    return this.workers.has(pluginId);
  }

  getResult(pluginId: string): ExecutionRecord | undefined {
    const record = this.results.get(pluginId);
    return record ? { ...record } : undefined;
  }

  /** Live elapsed seconds while running, otherwise the stored value. */
  getExecutionTime(pluginId: string): number | undefined {
    const started = this.startTimes.get(pluginId);
    if (started !== undefined) return (Date.now() - started) / 1000;
    return this.results.get(pluginId)?.executionTimeSeconds;
  }

  getActivePlugins(): string[] {
    return [...this.workers.keys()];
  }

  /**
   * Resolves true once the active run of `pluginId` has finished (or when
   * none is active), false when `timeoutSeconds` elapses first.
   */
  async waitForCompletion(pluginId: string, timeoutSeconds?: number): Promise<boolean> {
    const worker = this.workers.get(pluginId);
    if (!worker) return true;
    if (timeoutSeconds === undefined) {
      await worker.done;
      return true;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutSeconds) * 1000);
    });
    try {
      return await Promise.race([worker.done.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Cancels every active run and waits for them. Threads of runs still active
   * afterwards keep running but no longer hold the host process open.
   * Returns the ids still active.
   */
  async shutdown(waitSeconds = 5): Promise<string[]> {
    const active = this.getActivePlugins();
    this.cancelAll();
    await Promise.all(active.map((pluginId) => this.waitForCompletion(pluginId, waitSeconds)));
    const remaining = this.getActivePlugins();
    if (remaining.length > 0) {
      for (const thread of this.threads.values()) thread.unref();
      this.logger.warn(`Plugins still running after shutdown: ${remaining.join(', ')}`);
    }
    return remaining;
  }

  private refuse(reason: string, onLog: (message: string) => void): false {
    this.logger.warn(reason);
    onLog(reason);
    return false;
  }

  private async runWorker(run: RunContext): Promise<void> {
    await nextTurn();

    const { pluginId, runId, plugin, record, token, timeoutSeconds } = run;
    const name = plugin.descriptor.name;
    record.status = RUN_STATUS.RUNNING;
    record.message = 'Running';

    const log = (message: string): void => {
      run.onLog(message);
      this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_LOG, runId, pluginId, { message }));
    };
    const progress = (value: number): void => {
      const percent = clampProgress(value);
      if (!TERMINAL_STATUSES.has(record.status)) record.progress = percent;
      run.onProgress(percent);
      this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_PROGRESS, runId, pluginId, { percent }));
    };

    this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_STARTED, runId, pluginId, { name, timeoutSeconds }));
    log(timeoutSeconds > 0 ? `Starting plugin: ${name} (timeout: ${timeoutSeconds}s)` : `Starting plugin: ${name}`);
    progress(0);

    log('Executing plugin...');
    const outcome = await this.runOnThread(run, log, progress);

    const elapsed = (Date.now() - record.startedAt) / 1000;
    const observedCancel = outcome.kind === 'returned' || outcome.error.cancelled;

    if (run.record.status === RUN_STATUS.TIMEOUT) {
      if (outcome.kind === 'threw' && !observedCancel) {
        this.logger.warn(`Plugin ${pluginId} failed after timing out: ${outcome.error.message}`, { runId });
      }
      log(`Plugin timed out after ${elapsed.toFixed(1)}s`);
    } else if (token.isCancelled && observedCancel) {
      record.status = RUN_STATUS.CANCELLED;
      record.message = 'Cancelled by user';
      log('Plugin execution cancelled');
    } else if (outcome.kind === 'returned') {
      record.status = RUN_STATUS.SUCCESS;
      record.message = 'Completed successfully';
      record.progress = 100;
      log(`Plugin completed: ${name} (${elapsed.toFixed(1)}s)`);
      run.onProgress(100);
      this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_PROGRESS, runId, pluginId, { percent: 100 }));
    } else {
      const description = describeFailure(outcome.error);
      record.status = RUN_STATUS.ERROR;
      record.message = `Error: ${description}`;
      record.error = description;
      log(`Plugin error: ${description}`);
      run.onProgress(0);
      this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_PROGRESS, runId, pluginId, { percent: 0 }));
    }
    record.executionTimeSeconds = elapsed;

    this.logger.info(`Plugin ${pluginId} finished: ${record.status}`, { runId, seconds: elapsed });
    const snapshot = { ...record };
    this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_COMPLETED, runId, pluginId, { record: snapshot }));
    run.onComplete(snapshot);

    this.release(pluginId, runId);
  }

  /**
   * Spawns the run's thread and resolves with the plugin's outcome. A thread
   * that crashes or exits without reporting counts as a failure.
   */
  private runOnThread(
    run: RunContext,
    log: (message: string) => void,
    progress: (value: number) => void,
  ): Promise<Outcome> {
    const { pluginId, runId, plugin, token } = run;
    const workerData: PluginThreadData = {
      entryFile: plugin.entryFile,
      dirname: plugin.descriptor.location,
      filename: unitFilename(pluginId),
      params: run.params,
      settings: run.settings,
      cancelState: token.sharedState,
    };

    let thread: Worker;
    try {
      thread = new Worker(PLUGIN_THREAD_SOURCE, { eval: true, workerData, name: `plugin:${pluginId}` });
    } catch (e) {
      return Promise.resolve({ kind: 'threw', error: threadFailure(e) });
    }
    this.threads.set(runId, thread);

    return new Promise<Outcome>((resolve) => {
      let settled = false;
      const settle = (outcome: Outcome): void => {
        if (settled) return;
        settled = true;
        this.threads.delete(runId);
        thread.unref();
        resolve(outcome);
      };

      thread.on('message', (message: unknown) => {
        if (!isThreadMessage(message)) {
          this.logger.warn(`Ignoring malformed message from ${pluginId}`, { runId });
          return;
        }
        switch (message.type) {
          case 'log':
            log(message.message);
            break;
          case 'progress':
            progress(message.value);
            break;
          case 'returned':
            settle({ kind: 'returned' });
            break;
          case 'failed':
            settle({ kind: 'threw', error: message.error });
            break;
        }
      });
      thread.on('error', (e: Error) => settle({ kind: 'threw', error: threadFailure(e) }));
      thread.on('exit', (code: number) => settle({
        kind: 'threw',
        error: threadFailure(new Error(`Plugin thread exited with code ${code} before finishing`)),
      }));
    });
  }

  private startMonitor(
    pluginId: string,
    runId: string,
    timeoutSeconds: number,
    onLog: (message: string) => void,
  ): void {
    const limitMs = timeoutSeconds * 1000;
    const timer = setInterval(() => {
      const worker = this.workers.get(pluginId);
      const started = this.startTimes.get(pluginId);
      if (!worker || worker.runId !== runId || started === undefined) {
        this.stopMonitor(runId);
        return;
      }
      const elapsedMs = Date.now() - started;
      if (elapsedMs < limitMs) return;

      this.stopMonitor(runId);
      this.tokens.get(pluginId)?.cancel(CANCEL_REASON.TIMEOUT);
      const record = this.results.get(pluginId);
      if (record && record.runId === runId && !TERMINAL_STATUSES.has(record.status)) {
        record.status = RUN_STATUS.TIMEOUT;
        record.message = `Execution timeout after ${timeoutSeconds} seconds`;
        record.error = new TimeoutError().message;
        record.executionTimeSeconds = elapsedMs / 1000;
      }

      const message = `Plugin execution timeout (${timeoutSeconds}s), cancelling...`;
      this.logger.warn(`${pluginId}: ${message}`, { runId });
      onLog(message);
      this.events.emit(this.events.createEvent(EVENT_TYPE.RUN_TIMEOUT, runId, pluginId, { timeoutSeconds }));
    }, this.options.monitorIntervalMs);
    this.monitors.set(runId, timer);
  }

  private stopMonitor(runId: string): void {
    const timer = this.monitors.get(runId);
    if (timer === undefined) return;
    clearInterval(timer);
    this.monitors.delete(runId);
  }

  private release(pluginId: string, runId: string): void {
    this.stopMonitor(runId);
    if (this.workers.get(pluginId)?.runId !== runId) return;
    this.workers.delete(pluginId);
    this.tokens.delete(pluginId);
    this.startTimes.delete(pluginId);
  }

  /** Wraps a host callback so a throw is logged instead of reaching the plugin. */
  private guard<A>(name: string, callback: ((arg: A) => void) | undefined): (arg: A) => void {
    return (arg: A) => {
      if (!callback) return;
      try {
        callback(arg);
      } catch (e) {
        this.callbackLogger.error(`Error in ${name} callback: ${errorMessage(e)}`);
      }
    };
  }
}

function describeFailure(error: ThreadFailure): string {
  return error.message || error.name || 'Unknown error';
}
