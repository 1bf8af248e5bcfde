// javascript-state-machine 3.x ships no typings; @types covers 2.x only.
declare module 'javascript-state-machine' {
  interface TransitionConfig {
    name: string;
    from: string | string[];
    to: string;
  }

  interface MachineConfig {
    init: string;
    transitions: TransitionConfig[];
  }

  class StateMachine {
    constructor(config: MachineConfig);
    state: string;
    can(transition: string): boolean;
    [key: string]: unknown;
  }

  export = StateMachine;
}
