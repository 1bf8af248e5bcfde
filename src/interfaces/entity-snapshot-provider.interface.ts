import type { EntitySnapshot } from './rule-set.interface';

/**
 * Supplies the current field values of entities (leads) for rule evaluation.
 */
export interface IEntitySnapshotProvider {
  /** @returns null when the entity does not exist */
  getSnapshot(entityId: string): Promise<EntitySnapshot | null>;

  /** Population scanned by segment recalculation. */
  listEntityIds(): Promise<string[]>;
}
