import { Injectable, Module } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryExecutionStore } from '../../src/adapters/in-memory-execution.store';
import { InMemorySegmentStore } from '../../src/adapters/in-memory-segment.store';
import { ActionHandler } from '../../src/decorators/action-handler.decorator';
import type {
  ActionExecutionContext,
  ActionResult,
} from '../../src/interfaces/action-handler.interface';
import type {
  NurtureEngineModuleOptions,
  ResolvedEngineOptions,
} from '../../src/interfaces/nurture-engine-module-options.interface';
import type { FieldSchema } from '../../src/interfaces/rule-set.interface';
import type { ITimerService } from '../../src/interfaces/timer-service.interface';
import { NURTURE_ENGINE_OPTIONS } from '../../src/nurture-engine.constants';
import { NurtureEngineModule } from '../../src/nurture-engine.module';
import { ActionHandlerRegistry } from '../../src/services/action-handler-registry.service';
import { ExecutionStateMachine } from '../../src/services/execution-state-machine.service';
import { TriggerMatcher } from '../../src/services/trigger-matcher.service';
import { WorkflowDefinitionService } from '../../src/services/workflow-definition.service';
import { InMemorySnapshotProvider, LEAD_SCHEMA } from '../helpers';

@Injectable()
@ActionHandler('send_email')
class SendEmailHandler {
  readonly sent: string[] = [];

  async execute(
    parameters: Record<string, unknown>,
    context: ActionExecutionContext,
  ): Promise<ActionResult> {
    this.sent.push(`${context.entityId}:${String(parameters.template)}`);
    return { success: true, output: { messageId: `msg-${this.sent.length}` } };
  }
}

const LEAD_SCHEMA_TOKEN = 'LEAD_SCHEMA';

@Module({
  providers: [{ provide: LEAD_SCHEMA_TOKEN, useValue: LEAD_SCHEMA }],
  exports: [LEAD_SCHEMA_TOKEN],
})
class LeadSchemaModule {}

function createOptions(
  overrides: Partial<NurtureEngineModuleOptions> = {},
): NurtureEngineModuleOptions {
  const snapshots = new InMemorySnapshotProvider();
  snapshots.set('lead-1', { status: 'new', score: 75 });
  return {
    executionStore: new InMemoryExecutionStore(),
    segmentStore: new InMemorySegmentStore(),
    snapshotProvider: snapshots,
    fieldSchema: LEAD_SCHEMA,
    enableWakeCron: false,
    ...overrides,
  };
}

describe('NurtureEngineModule integration', () => {
  let module: TestingModule;

  afterEach(async () => {
    if (module) {
      await module.close();
    }
  });

  it('should bootstrap with forRoot and discover decorated handlers', async () => {
    module = await Test.createTestingModule({
      imports: [NurtureEngineModule.forRoot(createOptions())],
      providers: [SendEmailHandler],
    }).compile();
    await module.init();

    const registry = module.get(ActionHandlerRegistry);
    expect(registry.getKinds().sort()).toEqual(['send_email', 'wait']);
    expect(registry.get('send_email')).toBe(module.get(SendEmailHandler));
  });

  it('should run a workflow through the injected services', async () => {
    module = await Test.createTestingModule({
      imports: [NurtureEngineModule.forRoot(createOptions())],
      providers: [SendEmailHandler],
    }).compile();
    await module.init();

    await module.get(WorkflowDefinitionService).publish({
      id: 'welcome-v1',
      triggerKind: 'lead.created',
      entryRules: [{ field: 'score', operator: 'gte', value: 70 }],
      steps: [
        { actionKind: 'send_email', parameters: { template: 'welcome' } },
        { actionKind: 'wait' },
        { actionKind: 'send_email', parameters: { template: 'case_study' } },
      ],
    });

    const [id] = await module.get(TriggerMatcher).onTrigger('lead.created', 'lead-1');

    const execution = await module.get(ExecutionStateMachine).getOrThrow(id);
    expect(execution.status).toBe('COMPLETED');
    expect(execution.context).toEqual({
      trigger: {},
      step_0: { messageId: 'msg-1' },
      step_1: {},
      step_2: { messageId: 'msg-2' },
    });
    expect(module.get(SendEmailHandler).sent).toEqual([
      'lead-1:welcome',
      'lead-1:case_study',
    ]);
  });

  it('should hand delayed steps to a configured timer service', async () => {
    const timerService: ITimerService = { scheduleWake: jest.fn(async () => undefined) };
    module = await Test.createTestingModule({
      imports: [NurtureEngineModule.forRoot(createOptions({ timerService }))],
      providers: [SendEmailHandler],
    }).compile();
    await module.init();

    await module.get(WorkflowDefinitionService).publish({
      id: 'welcome-v1',
      triggerKind: 'lead.created',
      steps: [
        { actionKind: 'send_email', parameters: { template: 'welcome' }, delayMs: 3_600_000 },
        { actionKind: 'send_email', parameters: { template: 'follow_up' } },
      ],
    });
    const [id] = await module.get(TriggerMatcher).onTrigger('lead.created', 'lead-1');

    expect(timerService.scheduleWake).toHaveBeenCalledWith(id, 3_600_000);
  });

  it('should build options with forRootAsync', async () => {
    module = await Test.createTestingModule({
      imports: [
        NurtureEngineModule.forRootAsync({
          imports: [LeadSchemaModule],
          useFactory: (fieldSchema: FieldSchema) =>
            createOptions({ fieldSchema, wakeBatchSize: 25 }),
          inject: [LEAD_SCHEMA_TOKEN],
        }),
      ],
    }).compile();
    await module.init();

    const options = module.get<ResolvedEngineOptions>(NURTURE_ENGINE_OPTIONS);
    expect(options.wakeBatchSize).toBe(25);
    expect(options.fieldSchema).toEqual(LEAD_SCHEMA);
    expect(module.get(ActionHandlerRegistry).getKinds()).toEqual(['wait']);
  });
});
