import type {
  NurtureEngineModuleOptions,
  ResolvedEngineOptions,
} from '../interfaces/nurture-engine-module-options.interface';
import {
  DEFAULT_DEFINITION_CACHE_TTL_MS,
  DEFAULT_MAX_CAS_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_STUCK_THRESHOLD_MS,
  DEFAULT_WAKE_BATCH_SIZE,
  DEFAULT_WAKE_CRON_EXPRESSION,
} from '../nurture-engine.constants';

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Nurture engine option ${name} must be a positive number`);
  }
  return value;
}

export function resolveEngineOptions(
  options: NurtureEngineModuleOptions,
): ResolvedEngineOptions {
  const retryBaseDelayMs = positive(
    'retryBaseDelayMs',
    options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
  );
  const retryMaxDelayMs = positive(
    'retryMaxDelayMs',
    options.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
  );
  if (retryMaxDelayMs < retryBaseDelayMs) {
    throw new Error(
      'Nurture engine option retryMaxDelayMs must not be below retryBaseDelayMs',
    );
  }

  return {
    fieldSchema: { ...options.fieldSchema },
    computedFields: [...(options.computedFields ?? [])],
    wakeCronExpression:
      options.wakeCronExpression ?? DEFAULT_WAKE_CRON_EXPRESSION,
    enableWakeCron: options.enableWakeCron ?? true,
    wakeBatchSize: positive(
      'wakeBatchSize',
      options.wakeBatchSize ?? DEFAULT_WAKE_BATCH_SIZE,
    ),
    stuckThresholdMs: positive(
      'stuckThresholdMs',
      options.stuckThresholdMs ?? DEFAULT_STUCK_THRESHOLD_MS,
    ),
    retryBaseDelayMs,
    retryMaxDelayMs,
    definitionCacheTtlMs: Math.max(
      0,
      options.definitionCacheTtlMs ?? DEFAULT_DEFINITION_CACHE_TTL_MS,
    ),
    maxCasAttempts: positive(
      'maxCasAttempts',
      options.maxCasAttempts ?? DEFAULT_MAX_CAS_ATTEMPTS,
    ),
    clock: options.clock ?? (() => new Date()),
  };
}
