import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { WaitActionHandler } from './handlers/wait.handler';
import {
  NurtureEngineModuleAsyncOptions,
  NurtureEngineModuleOptions,
} from './interfaces/nurture-engine-module-options.interface';
import {
  ENTITY_SNAPSHOT_PROVIDER,
  EXECUTION_STORE,
  NURTURE_ENGINE_MODULE_OPTIONS,
  NURTURE_ENGINE_OPTIONS,
  SEGMENT_STORE,
  TIMER_SERVICE,
} from './nurture-engine.constants';
import { ActionDispatcher } from './services/action-dispatcher.service';
import { ActionHandlerRegistry } from './services/action-handler-registry.service';
import { ExecutionStateMachine } from './services/execution-state-machine.service';
import { RuleEvaluator } from './services/rule-evaluator.service';
import { RuleGate } from './services/rule-gate.service';
import { SegmentEvaluator } from './services/segment-evaluator.service';
import { StepScheduler } from './services/step-scheduler.service';
import { StoreBackedTimerService } from './services/store-backed-timer.service';
import { TriggerMatcher } from './services/trigger-matcher.service';
import { ValueResolver } from './services/value-resolver.service';
import { WakeCronService } from './services/wake-cron.service';
import { WorkflowDefinitionService } from './services/workflow-definition.service';
import { WorkflowMetricsService } from './services/workflow-metrics.service';
import { resolveEngineOptions } from './utils/resolve-engine-options';

const engineProviders: Provider[] = [
  {
    provide: NURTURE_ENGINE_OPTIONS,
    useFactory: (options: NurtureEngineModuleOptions) =>
      resolveEngineOptions(options),
    inject: [NURTURE_ENGINE_MODULE_OPTIONS],
  },
  {
    provide: EXECUTION_STORE,
    useFactory: (options: NurtureEngineModuleOptions) => options.executionStore,
    inject: [NURTURE_ENGINE_MODULE_OPTIONS],
  },
  {
    provide: SEGMENT_STORE,
    useFactory: (options: NurtureEngineModuleOptions) => options.segmentStore,
    inject: [NURTURE_ENGINE_MODULE_OPTIONS],
  },
  {
    provide: ENTITY_SNAPSHOT_PROVIDER,
    useFactory: (options: NurtureEngineModuleOptions) =>
      options.snapshotProvider,
    inject: [NURTURE_ENGINE_MODULE_OPTIONS],
  },
  StoreBackedTimerService,
  {
    provide: TIMER_SERVICE,
    useFactory: (
      options: NurtureEngineModuleOptions,
      fallback: StoreBackedTimerService,
    ) => options.timerService ?? fallback,
    inject: [NURTURE_ENGINE_MODULE_OPTIONS, StoreBackedTimerService],
  },
  ValueResolver,
  RuleEvaluator,
  RuleGate,
  ActionHandlerRegistry,
  ActionDispatcher,
  StepScheduler,
  WorkflowDefinitionService,
  ExecutionStateMachine,
  TriggerMatcher,
  WakeCronService,
  SegmentEvaluator,
  WorkflowMetricsService,
  WaitActionHandler,
];

const engineExports = [
  TriggerMatcher,
  ExecutionStateMachine,
  WorkflowDefinitionService,
  SegmentEvaluator,
  WorkflowMetricsService,
  ActionHandlerRegistry,
  RuleEvaluator,
  ValueResolver,
  StepScheduler,
  WakeCronService,
  EXECUTION_STORE,
  SEGMENT_STORE,
  NURTURE_ENGINE_OPTIONS,
];

@Module({})
export class NurtureEngineModule {
  static forRoot(options: NurtureEngineModuleOptions): DynamicModule {
    return {
      module: NurtureEngineModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        {
          provide: NURTURE_ENGINE_MODULE_OPTIONS,
          useValue: options,
        },
        ...engineProviders,
      ],
      exports: engineExports,
      global: true,
    };
  }

  static forRootAsync(options: NurtureEngineModuleAsyncOptions): DynamicModule {
    return {
      module: NurtureEngineModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: NURTURE_ENGINE_MODULE_OPTIONS,
          useFactory: (...args: unknown[]) => options.useFactory(...args),
          inject: options.inject ?? [],
        },
        ...engineProviders,
      ],
      exports: engineExports,
      global: true,
    };
  }
}
