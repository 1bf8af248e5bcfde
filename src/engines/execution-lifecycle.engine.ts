import StateMachine from 'javascript-state-machine';
import { InvalidExecutionTransitionError } from '../errors/invalid-execution-transition.error';
import type { ExecutionStatus } from '../interfaces/execution-records.interface';
import { isExecutionStatus, isTerminalStatus } from '../utils/execution-status';

export type ExecutionTransition =
  | 'wait'
  | 'wake'
  | 'complete'
  | 'fail'
  | 'pause'
  | 'resume'
  | 'cancel';

const LIFECYCLE_TRANSITIONS: Array<{
  name: ExecutionTransition;
  from: ExecutionStatus | ExecutionStatus[];
  to: ExecutionStatus;
}> = [
  { name: 'wait', from: 'RUNNING', to: 'WAITING' },
  { name: 'wake', from: 'WAITING', to: 'RUNNING' },
  { name: 'complete', from: 'RUNNING', to: 'COMPLETED' },
  { name: 'fail', from: ['RUNNING', 'WAITING'], to: 'FAILED' },
  { name: 'pause', from: ['RUNNING', 'WAITING'], to: 'PAUSED' },
  { name: 'resume', from: 'PAUSED', to: 'RUNNING' },
  { name: 'cancel', from: ['RUNNING', 'WAITING', 'PAUSED'], to: 'CANCELLED' },
];

/**
 * Lifecycle of one execution, rebuilt from its persisted status for every
 * change. Holds no execution data; callers apply the returned status.
 */
export class ExecutionLifecycleEngine {
  can(status: ExecutionStatus, transition: ExecutionTransition): boolean {
    return this.createMachine(status).can(transition);
  }

  /**
   * @returns the status reached by `transition`
   * @throws InvalidExecutionTransitionError when `status` does not allow it
   */
  transition(
    executionId: string,
    status: ExecutionStatus,
    transition: ExecutionTransition,
  ): ExecutionStatus {
    const fsm = this.createMachine(status);

    if (!fsm.can(transition)) {
      throw new InvalidExecutionTransitionError(
        executionId,
        status,
        transition,
        isTerminalStatus(status),
      );
    }

    const transitionFn = fsm[transition];
    if (typeof transitionFn !== 'function') {
      throw new Error(
        `Lifecycle transition ${transition} is not available on the state machine`,
      );
    }
    transitionFn.call(fsm);

    const next = fsm.state;
    if (!isExecutionStatus(next)) {
      throw new Error(`Lifecycle reached unknown status ${next}`);
    }
    return next;
  }

  private createMachine(status: ExecutionStatus): StateMachine {
    return new StateMachine({
      init: status,
      transitions: LIFECYCLE_TRANSITIONS,
    });
  }
}
