import * as os from 'node:os';
import * as path from 'node:path';

/** Application directory name under the user's data root */
export const APP_DIR_NAME = 'plugin-deck';

/** Default data root, e.g. ~/.local/share/plugin-deck */
export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.local', 'share', APP_DIR_NAME);

/** File names */
export const CONFIG_FILE = 'config.json';
export const SETTINGS_FILE = 'settings.json';
export const PLUGINS_DIR = 'plugins';

/** Plugin package layout */
export const MANIFEST_FILE = 'plugin.json';
export const ENTRY_FILE = 'run.js';
export const ENTRY_EXPORT = 'run';
/** run(params, progress, token) */
export const ENTRY_ARITY = 3;
export const PLUGIN_URL_SCHEME = 'plugin://';

/** Manifest defaults */
export const DEFAULT_PLUGIN_VERSION = '1.0.0';
export const DEFAULT_PLUGIN_AUTHOR = 'Unknown';

/** Execution defaults */
export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_MONITOR_INTERVAL_MS = 1000;
/** How often a plugin thread mirrors the shared cancel flag into `token.signal` */
export const SIGNAL_POLL_MS = 25;

/** Keys the engine injects into plugin params */
export const PARAM_LOG = 'log';
export const PARAM_SETTINGS = 'settings';

/** Run status values */
export const RUN_STATUS = {
  PENDING: 'pending',
  RUNNING: 'running',
  SUCCESS: 'success',
  CANCELLED: 'cancelled',
  ERROR: 'error',
  TIMEOUT: 'timeout',
} as const;

export type RunStatus = typeof RUN_STATUS[keyof typeof RUN_STATUS];

export const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  RUN_STATUS.SUCCESS,
  RUN_STATUS.CANCELLED,
  RUN_STATUS.ERROR,
  RUN_STATUS.TIMEOUT,
]);

/** Cancellation reasons carried by a token */
export const CANCEL_REASON = {
  USER: 'user',
  TIMEOUT: 'timeout',
} as const;

export type CancelReason = typeof CANCEL_REASON[keyof typeof CANCEL_REASON];

/** Well-known run event types */
export const EVENT_TYPE = {
  RUN_STARTED: 'run.started',
  RUN_LOG: 'run.log',
  RUN_PROGRESS: 'run.progress',
  RUN_TIMEOUT: 'run.timeout',
  RUN_COMPLETED: 'run.completed',
} as const;

export type RunEventType = typeof EVENT_TYPE[keyof typeof EVENT_TYPE];

/** Wildcard event subscription */
export const EVENT_WILDCARD = '*';

/** ID prefixes */
export const ID_PREFIX = {
  RUN: 'run-',
  EVENT: 'evt-',
} as const;

export const NANOID_LENGTH_RUN = 10;
export const NANOID_LENGTH_EVENT = 12;

/** CLI exit codes */
export const EXIT_CODE = {
  OK: 0,
  USAGE: 2,
  NOT_FOUND: 4,
  PLUGIN_ERROR: 7,
} as const;

export function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return value > 0 ? 100 : 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}

/** Reported by `plugin-deck --version` */
export const APP_VERSION = '0.1.0';

/** How long `run` keeps waiting for a plugin after its timeout fired */
export const TIMEOUT_GRACE_SECONDS = 5;
