import type { RuleSet } from './rule-set.interface';

export interface StepDefinition {
  index: number;
  actionKind: string;
  parameters: Record<string, unknown>;
  /** Wait applied after this step succeeds, before the next one runs. */
  delayMs: number;
  skipIf?: RuleSet;
  maxRetries: number;
}

export interface WorkflowDefinition {
  id: string;
  name: string;
  triggerKind: string;
  entryRules: RuleSet;
  steps: StepDefinition[];
  isActive: boolean;
  /** Always 1: at most one active execution per (workflow, entity). */
  maxConcurrentPerEntity: number;
  /** Lifetime cap on entries for one entity. `null` means unlimited. */
  maxExecutionsPerEntity: number | null;
  cooldownMs: number;
  createdAt: Date;
}

export interface StepDefinitionInput {
  actionKind: string;
  parameters?: Record<string, unknown>;
  delayMs?: number;
  skipIf?: RuleSet;
  maxRetries?: number;
}

export interface WorkflowDefinitionInput {
  id: string;
  name?: string;
  triggerKind: string;
  entryRules?: RuleSet;
  steps: StepDefinitionInput[];
  isActive?: boolean;
  maxConcurrentPerEntity?: number;
  maxExecutionsPerEntity?: number | null;
  cooldownMs?: number;
}
