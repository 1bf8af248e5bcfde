#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { deriveTableNames } from '../adapters/sql/table-names';

const USAGE = 'Usage: nurture-engine generate-migration <tablePrefix>';

export function generateMigration(tablePrefix: string): string {
  const t = deriveTableNames(tablePrefix);

  return `-- migrate:up
CREATE TABLE ${t.definitions} (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    trigger_kind TEXT NOT NULL,
    entry_rules JSONB NOT NULL DEFAULT '[]',
    steps JSONB NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    max_concurrent_per_entity INTEGER NOT NULL DEFAULT 1,
    max_executions_per_entity INTEGER,
    cooldown_ms BIGINT NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${t.definitions}_trigger_kind
    ON ${t.definitions} (trigger_kind)
    WHERE is_active;

CREATE TABLE ${t.executions} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    workflow_id TEXT NOT NULL REFERENCES ${t.definitions}(id),
    entity_id TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('RUNNING', 'WAITING', 'PAUSED', 'COMPLETED', 'FAILED', 'CANCELLED')),
    current_step_index INTEGER NOT NULL DEFAULT 0,
    context JSONB NOT NULL DEFAULT '{}',
    retry_count_for_current_step INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    next_wake_at TIMESTAMPTZ,
    completed_at TIMESTAMPTZ,
    error TEXT,
    version INTEGER NOT NULL DEFAULT 1
);

CREATE UNIQUE INDEX uq_${t.executions}_active_pair
    ON ${t.executions} (workflow_id, entity_id)
    WHERE status IN ('RUNNING', 'WAITING', 'PAUSED');

CREATE INDEX idx_${t.executions}_next_wake_at
    ON ${t.executions} (next_wake_at)
    WHERE status = 'WAITING';

CREATE INDEX idx_${t.executions}_pair_completed_at
    ON ${t.executions} (workflow_id, entity_id, completed_at);

CREATE INDEX idx_${t.executions}_workflow_created_at
    ON ${t.executions} (workflow_id, created_at);

CREATE TABLE ${t.stepResults} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    execution_id UUID NOT NULL REFERENCES ${t.executions}(id),
    step_index INTEGER NOT NULL,
    action_kind TEXT NOT NULL,
    outcome TEXT NOT NULL CHECK (outcome IN ('succeeded', 'skipped', 'retry_scheduled', 'failed', 'discarded')),
    attempt INTEGER NOT NULL,
    output JSONB,
    error TEXT,
    recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${t.stepResults}_execution_id
    ON ${t.stepResults} (execution_id, recorded_at);

CREATE TABLE ${t.segments} (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    rules JSONB NOT NULL,
    is_dynamic BOOLEAN NOT NULL DEFAULT TRUE,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    priority INTEGER NOT NULL DEFAULT 0,
    member_count INTEGER NOT NULL DEFAULT 0,
    last_calculated_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE ${t.memberships} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    segment_id TEXT NOT NULL REFERENCES ${t.segments}(id),
    entity_id TEXT NOT NULL,
    joined_at TIMESTAMPTZ NOT NULL,
    left_at TIMESTAMPTZ,
    added_by TEXT NOT NULL CHECK (added_by IN ('recalculation', 'manual')),
    reason TEXT NOT NULL,
    leave_reason TEXT
);

CREATE UNIQUE INDEX uq_${t.memberships}_open
    ON ${t.memberships} (segment_id, entity_id)
    WHERE left_at IS NULL;

CREATE INDEX idx_${t.memberships}_entity_id
    ON ${t.memberships} (entity_id)
    WHERE left_at IS NULL;

-- migrate:down
DROP TABLE IF EXISTS ${t.memberships};
DROP TABLE IF EXISTS ${t.segments};
DROP TABLE IF EXISTS ${t.stepResults};
DROP TABLE IF EXISTS ${t.executions};
DROP TABLE IF EXISTS ${t.definitions};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      `${USAGE}\n\n` +
        'Generates a dbmate-compatible SQL migration with every table the SQL stores use.\n\n' +
        'Arguments:\n' +
        '  tablePrefix  Prefix for the table names (alphanumeric and underscores only)\n\n' +
        'Example:\n' +
        '  npx nurture-engine generate-migration nurture',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tablePrefix = args[1];
  if (!tablePrefix) {
    console.error('Error: tablePrefix argument is required.');
    console.error(USAGE);
    process.exit(1);
  }

  const sql = generateMigration(tablePrefix);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${tablePrefix}_nurture_engine.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
