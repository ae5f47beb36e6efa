import { createLogger } from '../common/logger.js';
import { resolveConfig } from '../config/loader.js';
import type { EngineOptions } from '../config/types.js';
import { quoteIdentifier } from '../emit/sql-renderer.js';
import type { ColumnOperation, ColumnState, SchemaOperation } from './operations.js';

const log = createLogger('migration:sql');

// Store types for property types that carry no explicit column type
const DEFAULT_COLUMN_TYPES: Readonly<Record<string, string>> = {
	string: 'NVARCHAR(MAX)',
	number: 'FLOAT',
	int: 'INT',
	bigint: 'BIGINT',
	boolean: 'BIT',
	date: 'DATETIME2',
	uint8array: 'VARBINARY(MAX)',
	buffer: 'VARBINARY(MAX)',
	bytes: 'VARBINARY(MAX)',
};

/**
 * Store type for a column: the explicit one, else a default for its property type.
 * Unrecognized property types are taken to be SQL types already.
 */
export function columnTypeOf(column: ColumnState): string {
	return column.columnType ?? DEFAULT_COLUMN_TYPES[column.type.toLowerCase()] ?? column.type;
}

function isComputed(column: ColumnState): boolean {
	return column.computedColumnSql !== null;
}

function renderColumnDefinition(name: string, column: ColumnState): string {
	const computedSql = column.computedColumnSql;
	if (computedSql !== null) {
		const persisted = column.isStored && !/\bPERSISTED\s*$/i.test(computedSql) ? ' PERSISTED' : '';
		return `${quoteIdentifier(name)} AS ${computedSql}${persisted}`;
	}
	return `${quoteIdentifier(name)} ${columnTypeOf(column)} ${column.nullable ? 'NULL' : 'NOT NULL'}`;
}

function renderAddColumn(tableRef: string, name: string, column: ColumnState): string {
	return `ALTER TABLE ${tableRef} ADD ${renderColumnDefinition(name, column)}`;
}

function renderDropColumn(tableRef: string, name: string): string {
	return `ALTER TABLE ${tableRef} DROP COLUMN ${quoteIdentifier(name)}`;
}

/**
 * Statements for one table's consecutive column operations, by phase:
 * computed columns are dropped before the columns they may reference, and
 * added after every plain column exists in its final shape.
 */
class ColumnPhases {
	private readonly dropComputed: string[] = [];
	private readonly dropPlain: string[] = [];
	private readonly addPlain: string[] = [];
	private readonly alterPlain: string[] = [];
	private readonly addComputed: string[] = [];

	constructor(readonly tableRef: string) {}

	push(operation: ColumnOperation): void {
		const { tableRef } = this;
		switch (operation.kind) {
			case 'addColumn':
				(isComputed(operation) ? this.addComputed : this.addPlain).push(renderAddColumn(tableRef, operation.name, operation));
				break;
			case 'dropColumn': {
				const dropsComputed = operation.oldColumn !== undefined && isComputed(operation.oldColumn);
				(dropsComputed ? this.dropComputed : this.dropPlain).push(renderDropColumn(tableRef, operation.name));
				break;
			}
			case 'alterColumn':
				if (isComputed(operation) || isComputed(operation.oldColumn)) {
					(isComputed(operation.oldColumn) ? this.dropComputed : this.dropPlain).push(renderDropColumn(tableRef, operation.name));
					(isComputed(operation) ? this.addComputed : this.addPlain).push(renderAddColumn(tableRef, operation.name, operation));
				} else {
					this.alterPlain.push(
						`ALTER TABLE ${tableRef} ALTER COLUMN ${quoteIdentifier(operation.name)} ${columnTypeOf(operation)} ${operation.nullable ? 'NULL' : 'NOT NULL'}`
					);
				}
				break;
		}
	}

	flush(): string[] {
		return [...this.dropComputed, ...this.dropPlain, ...this.addPlain, ...this.alterPlain, ...this.addComputed];
	}
}

/**
 * Generates SQL Server DDL for resolved schema operations.
 * Table operations keep their order. Consecutive column operations on one table are
 * emitted by phase (see ColumnPhases). A computed column cannot be altered in place,
 * so any alter whose old or new side is computed becomes a drop and an add.
 */
export function generateMigrationSql(operations: readonly SchemaOperation[], options: EngineOptions = {}): string[] {
	const config = resolveConfig(options);
	const statements: string[] = [];
	let pending: ColumnPhases | undefined;

	for (const operation of operations) {
		const tableRef = `${quoteIdentifier(operation.schema ?? config.defaultSchema)}.${quoteIdentifier(operation.table)}`;

		if (operation.kind === 'createTable' || operation.kind === 'dropTable') {
			if (pending) statements.push(...pending.flush());
			pending = undefined;

			if (operation.kind === 'createTable') {
				const columns = operation.columns.map(column => renderColumnDefinition(column.name, column));
				statements.push(`CREATE TABLE ${tableRef} (${columns.join(', ')})`);
			} else {
				statements.push(`DROP TABLE ${tableRef}`);
			}
			continue;
		}

		if (!pending || pending.tableRef !== tableRef) {
			if (pending) statements.push(...pending.flush());
			pending = new ColumnPhases(tableRef);
		}
		pending.push(operation);
	}
	if (pending) statements.push(...pending.flush());

	log('Generated %d statement(s) for %d operation(s)', statements.length, operations.length);
	return statements;
}
