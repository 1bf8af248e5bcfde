import { InMemoryExecutionStore } from '../../src/adapters/in-memory-execution.store';
import type { ExecutionInstance } from '../../src/interfaces/execution-records.interface';
import type { WorkflowDefinition } from '../../src/interfaces/workflow-definition.interface';
import { START } from '../helpers';

function definition(
  overrides: Partial<WorkflowDefinition> = {},
): WorkflowDefinition {
  return {
    id: 'welcome-v1',
    name: 'Welcome',
    triggerKind: 'lead.created',
    entryRules: [],
    steps: [
      { index: 0, actionKind: 'send_email', parameters: {}, delayMs: 0, maxRetries: 3 },
    ],
    isActive: true,
    maxConcurrentPerEntity: 1,
    maxExecutionsPerEntity: null,
    cooldownMs: 0,
    createdAt: START,
    ...overrides,
  };
}

function execution(overrides: Partial<ExecutionInstance> = {}): ExecutionInstance {
  return {
    id: 'ex-1',
    workflowId: 'welcome-v1',
    entityId: 'lead-1',
    status: 'RUNNING',
    currentStepIndex: 0,
    context: { trigger: { source: 'form' } },
    retryCountForCurrentStep: 0,
    createdAt: START,
    updatedAt: START,
    nextWakeAt: null,
    completedAt: null,
    error: null,
    version: 1,
    ...overrides,
  };
}

describe('InMemoryExecutionStore', () => {
  let store: InMemoryExecutionStore;

  beforeEach(() => {
    store = new InMemoryExecutionStore();
  });

  describe('definitions', () => {
    it('should insert once per id', async () => {
      await expect(store.insertDefinition(definition())).resolves.toBe(true);
      await expect(store.insertDefinition(definition())).resolves.toBe(false);
      await expect(store.findDefinition('welcome-v1')).resolves.toEqual(
        definition(),
      );
    });

    it('should list only active definitions for the trigger, oldest first', async () => {
      await store.insertDefinition(
        definition({ id: 'b', createdAt: new Date('2025-01-02T00:00:00.000Z') }),
      );
      await store.insertDefinition(definition({ id: 'a' }));
      await store.insertDefinition(definition({ id: 'c', isActive: false }));
      await store.insertDefinition(definition({ id: 'd', triggerKind: 'form.submitted' }));

      const active = await store.findActiveDefinitions('lead.created');
      expect(active.map((d) => d.id)).toEqual(['a', 'b']);
    });

    it('should toggle the active flag', async () => {
      await store.insertDefinition(definition());

      await expect(store.setDefinitionActive('welcome-v1', false)).resolves.toBe(true);
      await expect(store.setDefinitionActive('missing', false)).resolves.toBe(false);
      await expect(store.findActiveDefinitions('lead.created')).resolves.toEqual([]);
    });
  });

  describe('insertExecutionIfNoActive', () => {
    it('should refuse a second active execution for the same pair', async () => {
      await expect(store.insertExecutionIfNoActive(execution())).resolves.toBe(true);
      await expect(
        store.insertExecutionIfNoActive(execution({ id: 'ex-2', status: 'WAITING' })),
      ).resolves.toBe(false);
    });

    it('should allow a new execution once the previous one is terminal', async () => {
      await store.insertExecutionIfNoActive(
        execution({ status: 'COMPLETED', completedAt: START }),
      );

      await expect(
        store.insertExecutionIfNoActive(execution({ id: 'ex-2' })),
      ).resolves.toBe(true);
      await expect(store.countExecutions('welcome-v1', 'lead-1')).resolves.toBe(2);
    });
  });

  describe('updateExecution', () => {
    it('should write when the version matches and record the step result', async () => {
      await store.insertExecutionIfNoActive(execution());

      const written = await store.updateExecution(
        execution({ currentStepIndex: 1, version: 2 }),
        1,
        {
          executionId: 'ex-1',
          stepIndex: 0,
          actionKind: 'send_email',
          outcome: 'succeeded',
          attempt: 1,
          output: { messageId: 'm-1' },
          error: null,
          recordedAt: START,
        },
      );

      expect(written).toBe(true);
      await expect(store.findExecution('ex-1')).resolves.toMatchObject({
        currentStepIndex: 1,
        version: 2,
      });
      const results = await store.findStepResults('ex-1');
      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        executionId: 'ex-1',
        outcome: 'succeeded',
        output: { messageId: 'm-1' },
      });
      expect(results[0].recordedAt).toEqual(START);
    });

    it('should reject a stale version without writing anything', async () => {
      await store.insertExecutionIfNoActive(execution({ version: 3 }));

      const written = await store.updateExecution(
        execution({ status: 'COMPLETED', version: 3 }),
        2,
        {
          executionId: 'ex-1',
          stepIndex: 0,
          actionKind: 'send_email',
          outcome: 'succeeded',
          attempt: 1,
          output: null,
          error: null,
          recordedAt: START,
        },
      );

      expect(written).toBe(false);
      await expect(store.findExecution('ex-1')).resolves.toMatchObject({
        status: 'RUNNING',
      });
      await expect(store.findStepResults('ex-1')).resolves.toEqual([]);
    });
  });

  describe('findDueExecutions', () => {
    beforeEach(async () => {
      await store.insertExecutionIfNoActive(
        execution({
          id: 'late',
          entityId: 'lead-1',
          status: 'WAITING',
          nextWakeAt: new Date('2024-12-01T00:00:00.000Z'),
        }),
      );
      await store.insertExecutionIfNoActive(
        execution({
          id: 'due',
          entityId: 'lead-2',
          status: 'WAITING',
          nextWakeAt: new Date('2024-12-31T23:59:00.000Z'),
        }),
      );
      await store.insertExecutionIfNoActive(
        execution({
          id: 'future',
          entityId: 'lead-3',
          status: 'WAITING',
          nextWakeAt: new Date('2025-01-02T00:00:00.000Z'),
        }),
      );
      await store.insertExecutionIfNoActive(
        execution({
          id: 'paused',
          entityId: 'lead-4',
          status: 'PAUSED',
          nextWakeAt: new Date('2024-12-31T00:00:00.000Z'),
        }),
      );
    });

    it('should return waiting executions at or before now, oldest first', async () => {
      const due = await store.findDueExecutions(START, 10);
      expect(due.map((e) => e.id)).toEqual(['late', 'due']);
    });

    it('should honour the lower bound and the limit', async () => {
      const recent = await store.findDueExecutions(
        START,
        10,
        new Date('2024-12-31T00:00:00.000Z'),
      );
      expect(recent.map((e) => e.id)).toEqual(['due']);

      const limited = await store.findDueExecutions(START, 1);
      expect(limited.map((e) => e.id)).toEqual(['late']);
    });
  });

  it('should find the most recently finished execution of a pair', async () => {
    await store.insertExecutionIfNoActive(
      execution({
        id: 'old',
        status: 'FAILED',
        completedAt: new Date('2024-11-01T00:00:00.000Z'),
      }),
    );
    await store.insertExecutionIfNoActive(
      execution({
        id: 'recent',
        status: 'COMPLETED',
        completedAt: new Date('2024-12-01T00:00:00.000Z'),
      }),
    );
    await store.insertExecutionIfNoActive(
      execution({
        id: 'cancelled',
        status: 'CANCELLED',
        completedAt: new Date('2024-12-15T00:00:00.000Z'),
      }),
    );

    const latest = await store.findLatestFinishedExecution('welcome-v1', 'lead-1');
    expect(latest?.id).toBe('recent');
  });

  it('should return copies that callers cannot mutate', async () => {
    await store.insertExecutionIfNoActive(execution());

    const loaded = await store.findExecution('ex-1');
    if (!loaded) throw new Error('execution missing');
    loaded.context.trigger = 'mutated';

    await expect(store.findExecution('ex-1')).resolves.toMatchObject({
      context: { trigger: { source: 'form' } },
    });
  });

  it('should list executions of a workflow created since a date', async () => {
    await store.insertExecutionIfNoActive(
      execution({ id: 'old', status: 'COMPLETED', createdAt: new Date('2024-01-01T00:00:00.000Z') }),
    );
    await store.insertExecutionIfNoActive(execution({ id: 'new' }));

    const since = await store.findExecutionsByWorkflow(
      'welcome-v1',
      new Date('2024-12-01T00:00:00.000Z'),
    );
    expect(since.map((e) => e.id)).toEqual(['new']);
  });
});
