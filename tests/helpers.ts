import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryExecutionStore } from '../src/adapters/in-memory-execution.store';
import { InMemorySegmentStore } from '../src/adapters/in-memory-segment.store';
import type {
  ActionExecutionContext,
  ActionResult,
} from '../src/interfaces/action-handler.interface';
import type { IEntitySnapshotProvider } from '../src/interfaces/entity-snapshot-provider.interface';
import type {
  NurtureEngineModuleOptions,
  ResolvedEngineOptions,
} from '../src/interfaces/nurture-engine-module-options.interface';
import type {
  EntitySnapshot,
  FieldSchema,
} from '../src/interfaces/rule-set.interface';
import { ActionDispatcher } from '../src/services/action-dispatcher.service';
import { ActionHandlerRegistry } from '../src/services/action-handler-registry.service';
import { ExecutionStateMachine } from '../src/services/execution-state-machine.service';
import { RuleEvaluator } from '../src/services/rule-evaluator.service';
import { RuleGate } from '../src/services/rule-gate.service';
import { SegmentEvaluator } from '../src/services/segment-evaluator.service';
import { StepScheduler } from '../src/services/step-scheduler.service';
import { StoreBackedTimerService } from '../src/services/store-backed-timer.service';
import { TriggerMatcher } from '../src/services/trigger-matcher.service';
import { ValueResolver } from '../src/services/value-resolver.service';
import { WakeCronService } from '../src/services/wake-cron.service';
import { WorkflowDefinitionService } from '../src/services/workflow-definition.service';
import { WorkflowMetricsService } from '../src/services/workflow-metrics.service';
import { resolveEngineOptions } from '../src/utils/resolve-engine-options';

export const START = new Date('2025-01-01T00:00:00.000Z');

export const LEAD_SCHEMA: FieldSchema = {
  status: 'string',
  email: 'string',
  score: 'number',
  tags: 'list',
  is_subscribed: 'boolean',
  created_at: 'date',
  last_activity_at: 'date',
  'metadata.company_size': 'string',
};

/** Manually advanced clock shared by the engine and the test. */
export class TestClock {
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export class InMemorySnapshotProvider implements IEntitySnapshotProvider {
  private readonly snapshots = new Map<string, EntitySnapshot>();

  set(entityId: string, snapshot: EntitySnapshot): void {
    this.snapshots.set(entityId, snapshot);
  }

  delete(entityId: string): void {
    this.snapshots.delete(entityId);
  }

  async getSnapshot(entityId: string): Promise<EntitySnapshot | null> {
    return this.snapshots.get(entityId) ?? null;
  }

  async listEntityIds(): Promise<string[]> {
    return Array.from(this.snapshots.keys()).sort();
  }
}

export function createMockRegistry(): ActionHandlerRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new ActionHandlerRegistry(mockDiscovery, mockReflector);
}

/** Handler whose results are queued per call; succeeds once the queue is empty. */
export function createActionHandler(...results: ActionResult[]) {
  const execute = jest.fn<
    Promise<ActionResult>,
    [Record<string, unknown>, ActionExecutionContext]
  >(async () => results.shift() ?? { success: true });
  return { execute };
}

export function createTestOptions(
  overrides: Partial<NurtureEngineModuleOptions> = {},
): ResolvedEngineOptions {
  return resolveEngineOptions({
    executionStore: new InMemoryExecutionStore(),
    segmentStore: new InMemorySegmentStore(),
    snapshotProvider: new InMemorySnapshotProvider(),
    fieldSchema: LEAD_SCHEMA,
    enableWakeCron: false,
    retryBaseDelayMs: 1000,
    retryMaxDelayMs: 60_000,
    ...overrides,
  });
}

export interface TestEngine {
  clock: TestClock;
  options: ResolvedEngineOptions;
  store: InMemoryExecutionStore;
  segmentStore: InMemorySegmentStore;
  snapshots: InMemorySnapshotProvider;
  emitter: EventEmitter2;
  registry: ActionHandlerRegistry;
  evaluator: RuleEvaluator;
  ruleGate: RuleGate;
  dispatcher: ActionDispatcher;
  scheduler: StepScheduler;
  definitions: WorkflowDefinitionService;
  stateMachine: ExecutionStateMachine;
  triggerMatcher: TriggerMatcher;
  wakeCron: WakeCronService;
  segments: SegmentEvaluator;
  metrics: WorkflowMetricsService;
}

/**
 * The full service graph over in-memory stores, wired by hand the way the
 * module wires it.
 */
export function createTestEngine(
  overrides: Partial<NurtureEngineModuleOptions> = {},
): TestEngine {
  const clock = new TestClock();
  const store = new InMemoryExecutionStore();
  const segmentStore = new InMemorySegmentStore();
  const snapshots = new InMemorySnapshotProvider();
  const options = createTestOptions({
    executionStore: store,
    segmentStore,
    snapshotProvider: snapshots,
    clock: clock.now,
    ...overrides,
  });

  const emitter = new EventEmitter2();
  const registry = createMockRegistry();
  const evaluator = new RuleEvaluator(new ValueResolver(), options);
  const ruleGate = new RuleGate(evaluator, emitter);
  const dispatcher = new ActionDispatcher(registry, options);
  const scheduler = new StepScheduler(
    overrides.timerService ?? new StoreBackedTimerService(),
  );
  const definitions = new WorkflowDefinitionService(
    store,
    evaluator,
    registry,
    emitter,
    options,
  );
  const stateMachine = new ExecutionStateMachine(
    store,
    snapshots,
    definitions,
    dispatcher,
    scheduler,
    ruleGate,
    emitter,
    options,
  );
  const triggerMatcher = new TriggerMatcher(
    store,
    snapshots,
    definitions,
    stateMachine,
    ruleGate,
    options,
  );
  const wakeCron = new WakeCronService(scheduler, store, emitter, options);
  const segments = new SegmentEvaluator(
    segmentStore,
    snapshots,
    evaluator,
    ruleGate,
    emitter,
    options,
  );
  const metrics = new WorkflowMetricsService(store, definitions, options);

  return {
    clock,
    options,
    store,
    segmentStore,
    snapshots,
    emitter,
    registry,
    evaluator,
    ruleGate,
    dispatcher,
    scheduler,
    definitions,
    stateMachine,
    triggerMatcher,
    wakeCron,
    segments,
    metrics,
  };
}
