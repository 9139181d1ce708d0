import { isPlainObject } from '../infra/types.js';
import { CancelledError, TimeoutError, errorMessage } from '../errors.js';
import { UNIT_WRAPPER_PARAMS } from '../domain/plugin/module-loader.js';
import { CANCEL_REASON, ENTRY_EXPORT, PARAM_LOG, PARAM_SETTINGS, SIGNAL_POLL_MS } from '../constants.js';
import { CANCEL_CODE } from './cancellation.js';

/** `workerData` of a plugin thread; everything here crosses a structured clone. */
export interface PluginThreadData {
  entryFile: string;
  dirname: string;
  /** Virtual file name the unit is compiled under */
  filename: string;
  params: Record<string, unknown>;
  settings: Record<string, unknown>;
  /** Cancellation cell shared with the run's CancellationToken */
  cancelState: SharedArrayBuffer;
}

export interface ThreadFailure {
  name: string;
  message: string;
  /** The plugin threw CancelledError or TimeoutError from its token */
  cancelled: boolean;
}

export type ThreadMessage =
  | { type: 'log'; message: string }
  | { type: 'progress'; value: number }
  | { type: 'returned' }
  | { type: 'failed'; error: ThreadFailure };

const REASON_BY_CODE = {
  [CANCEL_CODE[CANCEL_REASON.USER]]: CANCEL_REASON.USER,
  [CANCEL_CODE[CANCEL_REASON.TIMEOUT]]: CANCEL_REASON.TIMEOUT,
};

/**
 * Bootstrap evaluated as a CommonJS worker. It compiles the plugin unit the
 * same way PluginModuleLoader does, gives `run` a token backed by the shared
 * cell, and reports log lines, progress and the outcome as ThreadMessages.
 */
export const PLUGIN_THREAD_SOURCE = `
'use strict';
const { parentPort, workerData } = require('node:worker_threads');
const { createRequire } = require('node:module');
const { readFileSync } = require('node:fs');
const vm = require('node:vm');

const { entryFile, dirname, filename, params, settings, cancelState } = workerData;
const cell = new Int32Array(cancelState);
const REASONS = ${JSON.stringify(REASON_BY_CODE)};

class CancelledError extends Error {
  constructor(message = ${JSON.stringify(new CancelledError().message)}) {
    super(message);
    this.name = 'CancelledError';
  }
}

class TimeoutError extends Error {
  constructor(message = ${JSON.stringify(new TimeoutError().message)}) {
    super(message);
    this.name = 'TimeoutError';
  }
}

function currentReason() {
  return REASONS[Atomics.load(cell, 0)];
}

function cancellationError() {
  return currentReason() === ${JSON.stringify(CANCEL_REASON.TIMEOUT)} ? new TimeoutError() : new CancelledError();
}

const controller = new AbortController();
const token = Object.freeze({
  get isCancelled() { return Atomics.load(cell, 0) !== 0; },
  get reason() { return currentReason(); },
  get signal() { return controller.signal; },
  throwIfCancelled() {
    if (currentReason() !== undefined) throw cancellationError();
  },
});

const watcher = setInterval(() => {
  if (currentReason() !== undefined && !controller.signal.aborted) controller.abort(cancellationError());
}, ${SIGNAL_POLL_MS});

function describe(error) {
  return {
    name: error instanceof Error ? error.name : typeof error,
    message: error instanceof Error ? error.message : String(error),
    cancelled: error instanceof CancelledError || error instanceof TimeoutError,
  };
}

async function main() {
  const unit = { exports: {} };
  const compiled = vm.compileFunction(readFileSync(entryFile, 'utf-8'), ${JSON.stringify(UNIT_WRAPPER_PARAMS)}, { filename });
  compiled.call(unit.exports, unit.exports, createRequire(entryFile), unit, entryFile, dirname);

  const exported = unit.exports;
  const run = exported === null || exported === undefined ? undefined : exported[${JSON.stringify(ENTRY_EXPORT)}];
  if (typeof run !== 'function') throw new TypeError('Plugin has no callable ${ENTRY_EXPORT}() export');

  const log = (message) => { parentPort.postMessage({ type: 'log', message: String(message) }); };
  const progress = (value) => { parentPort.postMessage({ type: 'progress', value: Number(value) }); };
  const injected = { ...params, ${JSON.stringify(PARAM_LOG)}: log, ${JSON.stringify(PARAM_SETTINGS)}: settings };
  await run.call(exported, injected, progress, token);
}

main().then(
  () => { parentPort.postMessage({ type: 'returned' }); },
  (error) => { parentPort.postMessage({ type: 'failed', error: describe(error) }); },
).finally(() => { clearInterval(watcher); });
`;

export function isThreadFailure(value: unknown): value is ThreadFailure {
  return isPlainObject(value)
    && typeof value['name'] === 'string'
    && typeof value['message'] === 'string'
    && typeof value['cancelled'] === 'boolean';
}

export function isThreadMessage(value: unknown): value is ThreadMessage {
  if (!isPlainObject(value)) return false;
  switch (value['type']) {
    case 'log':
      return typeof value['message'] === 'string';
    case 'progress':
      return typeof value['value'] === 'number';
    case 'returned':
      return true;
    case 'failed':
      return isThreadFailure(value['error']);
    default:
      return false;
  }
}

/** Failure for errors raised on the host side of a thread (spawn, crash, early exit). */
export function threadFailure(error: unknown): ThreadFailure {
  return {
    name: error instanceof Error ? error.name : typeof error,
    message: errorMessage(error),
    cancelled: false,
  };
}
