import type { LogLevel } from '../../logging/logger.js';
import { DEFAULT_MONITOR_INTERVAL_MS, DEFAULT_TIMEOUT_SECONDS } from '../../constants.js';

export interface ExecutionConfig {
  /** Applied when a run does not pass its own timeout; 0 disables the monitor. */
  defaultTimeoutSeconds: number;
  monitorIntervalMs: number;
}

export interface DeckConfig {
  /** Absolute, or relative to the directory holding config.json */
  pluginsDir?: string;
  settingsFile?: string;
  execution: ExecutionConfig;
  logging: {
    level: LogLevel;
  };
}

/** Shape accepted from config.json before defaults are merged in. */
export interface DeckConfigInput {
  pluginsDir?: string;
  settingsFile?: string;
  execution?: Partial<ExecutionConfig>;
  logging?: { level?: LogLevel };
}

export const DEFAULT_CONFIG: DeckConfig = {
  execution: {
    defaultTimeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
    monitorIntervalMs: DEFAULT_MONITOR_INTERVAL_MS,
  },
  logging: { level: 'info' },
};
