import { createLogger } from '../common/logger.js';
import { loadConfig } from '../config/loader.js';
import type { EngineOptions } from '../config/types.js';
import type { EntityModel } from '../model/model.js';
import { diffSnapshots } from '../model/model-differ.js';
import { type ModelSnapshot, inheritStoreTypes, snapshotModel } from '../model/snapshot.js';
import type { SchemaOperation } from './operations.js';
import { resolveOperations } from './resolver.js';
import { generateMigrationSql } from './sql-generator.js';

const log = createLogger('migration:plan');

export interface MigrationPlan {
	/** Snapshot of the current model; store it as the baseline for the next migration */
	snapshot: ModelSnapshot;
	/** Resolved operations, spurious changes removed */
	operations: SchemaOperation[];
	statements: string[];
}

/**
 * Snapshots the model, diffs it against the previous snapshot, resolves the
 * computed-hash transitions and renders the migration SQL. Columns that name no
 * store type keep the one recorded in `previous`.
 * Pass no previous snapshot for the initial migration.
 */
export function planMigration(
	previous: ModelSnapshot | undefined,
	model: EntityModel,
	options: EngineOptions = {}
): MigrationPlan {
	const config = loadConfig(options);
	const snapshot = inheritStoreTypes(previous, snapshotModel(model));
	const operations = resolveOperations(diffSnapshots(previous, snapshot));
	const statements = generateMigrationSql(operations, config);

	log('Planned migration: %d operation(s), %d statement(s)', operations.length, statements.length);
	return { snapshot, operations, statements };
}
