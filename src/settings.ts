export const PLATFORM_NAME = 'Termowifi';
export const PLUGIN_NAME = 'homebridge-termowifi';

export const DEFAULT_PORT = 12345;
export const DEFAULT_POLLING_INTERVAL = 30;
export const DEFAULT_CONNECT_TIMEOUT = 5000;
export const DEFAULT_READ_TIMEOUT = 5000;
export const DEFAULT_WRITE_TIMEOUT = 5000;
export const DEFAULT_SETTLE_TIME = 300;
export const DEFAULT_QUEUE_CAPACITY = 32;
export const DEFAULT_STALE_AFTER_POLLS = 3;
export const DEFAULT_COMMAND_REPEAT = 2;
export const DISCOVERY_REPEAT = 2;

export const BACKOFF_INITIAL = 1000;
export const BACKOFF_MAX = 60_000;
export const BACKOFF_STABILITY_WINDOW = 10_000;

export const KEEPALIVE_INITIAL_DELAY = 60_000;

export const MIN_TARGET_TEMP = 15;
export const MAX_TARGET_TEMP = 35;
export const TARGET_TEMP_STEP = 0.5;

export const MANUFACTURER = 'Orkli';
export const MODEL = 'Termowifi room controller';
