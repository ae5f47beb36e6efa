import { createLogger } from '../common/logger.js';
import type {
	AddColumnOperation,
	AlterColumnOperation,
	ColumnState,
	DropColumnOperation,
	SchemaOperation,
} from '../migration/operations.js';
import { columnStatesEqual } from '../migration/operations.js';
import type { ColumnSnapshot, ModelSnapshot, TableSnapshot } from './snapshot.js';

const log = createLogger('model:differ');

function stateOf(column: ColumnSnapshot): ColumnState {
	return {
		type: column.type,
		columnType: column.columnType,
		nullable: column.nullable,
		computedColumnSql: column.computedColumnSql,
		isStored: column.isStored,
		annotations: column.annotations,
	};
}

const isComputed = (column: ColumnSnapshot): boolean => column.computedColumnSql !== null;

// Plain columns first, so a hash never references a column that does not exist yet
function plainBeforeComputed(columns: readonly ColumnSnapshot[]): ColumnSnapshot[] {
	return [...columns.filter(c => !isComputed(c)), ...columns.filter(isComputed)];
}

function addColumn(table: string, column: ColumnSnapshot): AddColumnOperation {
	return { kind: 'addColumn', table, name: column.name, ...stateOf(column) };
}

function byName<T extends { name: string }>(items: readonly T[]): Map<string, T> {
	return new Map(items.map(item => [item.name.toLowerCase(), item]));
}

/**
 * Computes column-level operations for a table present in both snapshots.
 * Order: drops (computed first), adds (plain first), alters.
 */
function diffTable(previous: TableSnapshot, current: TableSnapshot): SchemaOperation[] {
	const table = current.name;
	const previousColumns = byName(previous.columns);
	const currentColumns = byName(current.columns);

	const dropped = previous.columns.filter(c => !currentColumns.has(c.name.toLowerCase()));
	const drops = [...dropped.filter(isComputed), ...dropped.filter(c => !isComputed(c))]
		.map((column): DropColumnOperation => ({ kind: 'dropColumn', table, name: column.name, oldColumn: stateOf(column) }));

	const adds = plainBeforeComputed(current.columns.filter(c => !previousColumns.has(c.name.toLowerCase())))
		.map(column => addColumn(table, column));

	const alters: AlterColumnOperation[] = [];
	for (const column of current.columns) {
		const before = previousColumns.get(column.name.toLowerCase());
		if (before && !columnStatesEqual(stateOf(before), stateOf(column))) {
			alters.push({ kind: 'alterColumn', table, name: column.name, ...stateOf(column), oldColumn: stateOf(before) });
		}
	}

	return [...drops, ...adds, ...alters];
}

/**
 * Computes the coarse operations that take the schema from `previous` to `current`.
 * Operations carry both sides' annotations untouched; resolveOperations rewrites them.
 */
export function diffSnapshots(previous: ModelSnapshot | undefined, current: ModelSnapshot): SchemaOperation[] {
	const previousTables = byName(previous?.tables ?? []);
	const currentTables = byName(current.tables);
	const operations: SchemaOperation[] = [];

	for (const table of previous?.tables ?? []) {
		if (!currentTables.has(table.name.toLowerCase())) {
			operations.push({ kind: 'dropTable', table: table.name });
		}
	}

	for (const table of current.tables) {
		const before = previousTables.get(table.name.toLowerCase());
		if (!before) {
			operations.push({
				kind: 'createTable',
				table: table.name,
				columns: plainBeforeComputed(table.columns).map(column => addColumn(table.name, column)),
			});
		} else {
			operations.push(...diffTable(before, table));
		}
	}

	log('Diff produced %d operation(s)', operations.length);
	return operations;
}
