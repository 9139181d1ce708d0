// Orchestration domain types

import type { RunEventType, RunStatus } from '../constants.js';
import type { ProgressCallback } from '../domain/plugin/types.js';

export interface ExecutionRecord {
  runId: string;
  pluginId: string;
  status: RunStatus;
  message: string;
  /** Integer in 0..100 */
  progress: number;
  error?: string;
  /** 0 until the run reaches a terminal state */
  executionTimeSeconds: number;
  /** Epoch milliseconds */
  startedAt: number;
}

export type LogCallback = (message: string) => void;
export type CompletionCallback = (record: ExecutionRecord) => void;

export interface ExecuteOptions {
  params?: Record<string, unknown>;
  onLog?: LogCallback;
  onProgress?: ProgressCallback;
  onComplete?: CompletionCallback;
  /** Seconds; undefined uses the engine default, 0 disables the monitor */
  timeoutSeconds?: number;
}

export interface EngineOptions {
  defaultTimeoutSeconds: number;
  monitorIntervalMs: number;
}

export interface RunEventPayloads {
  'run.started': { name: string; timeoutSeconds: number };
  'run.log': { message: string };
  'run.progress': { percent: number };
  'run.timeout': { timeoutSeconds: number };
  'run.completed': { record: ExecutionRecord };
}

export interface RunEventOf<K extends RunEventType> {
  id: string;
  type: K;
  runId: string;
  pluginId: string;
  payload: RunEventPayloads[K];
  timestamp: number;
}

/** Discriminated on `type`. */
export type RunEvent = { [K in RunEventType]: RunEventOf<K> }[RunEventType];

export type RunEventHandler = (event: RunEvent) => void | Promise<void>;
