export const NURTURE_ENGINE_MODULE_OPTIONS = 'NURTURE_ENGINE_MODULE_OPTIONS';
export const NURTURE_ENGINE_OPTIONS = 'NURTURE_ENGINE_OPTIONS';
export const EXECUTION_STORE = 'NURTURE_EXECUTION_STORE';
export const SEGMENT_STORE = 'NURTURE_SEGMENT_STORE';
export const ENTITY_SNAPSHOT_PROVIDER = 'NURTURE_ENTITY_SNAPSHOT_PROVIDER';
export const TIMER_SERVICE = 'NURTURE_TIMER_SERVICE';
export const ACTION_HANDLER_METADATA = 'nurture:action-handler';

export const WAKE_CRON_JOB_NAME = 'nurture-wake-sweep';
export const DEFAULT_WAKE_CRON_EXPRESSION = '*/30 * * * * *';
export const DEFAULT_WAKE_BATCH_SIZE = 100;
export const DEFAULT_STUCK_THRESHOLD_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_RETRY_BASE_DELAY_MS = 30 * 1000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 60 * 60 * 1000;
export const DEFAULT_DEFINITION_CACHE_TTL_MS = 60 * 1000;
export const DEFAULT_MAX_CAS_ATTEMPTS = 5;
export const DEFAULT_MAX_RETRIES = 3;

/** Snapshot namespace under which the trigger payload is addressable. */
export const TRIGGER_NAMESPACE = 'trigger';
