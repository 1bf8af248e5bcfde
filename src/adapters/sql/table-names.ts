const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export interface EngineTableNames {
  definitions: string;
  executions: string;
  stepResults: string;
  segments: string;
  memberships: string;
}

export function validateTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

/**
 * Every table the SQL stores touch, derived from one validated prefix.
 */
export function deriveTableNames(prefix: string): EngineTableNames {
  validateTableName(prefix);
  return {
    definitions: `${prefix}_workflow_definitions`,
    executions: `${prefix}_executions`,
    stepResults: `${prefix}_step_results`,
    segments: `${prefix}_segments`,
    memberships: `${prefix}_segment_memberships`,
  };
}
