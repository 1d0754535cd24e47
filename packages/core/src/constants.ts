export const DEFAULT_TIMEOUT_MS = 30_000;
export const RUN_TIMEOUT_MS = 300_000;
export const MIN_NODE_MAJOR = 20;

export const BOT_USERNAME = 'smoke_bot';
export const AUTH_SUITE_ID = 'auth';

export const BRIDGE_FILE_NAME = '.smoke-config.json';
export const RESULTS_FILE_NAME = 'results.json';
export const SUITES_DIR_NAME = 'suites';

export const STATE_LAST_RESULTS = 'smoke.last_results';
export const STATE_LAST_RUN = 'smoke.last_run';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SETUP_REQUIRED = 2;
