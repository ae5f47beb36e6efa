import type { Annotations } from '../schema/annotations.js';

/**
 * One side (before or after) of a column as the host migration framework sees it.
 */
export interface ColumnState {
	/** Declared value type of the model property (e.g. `string`, `Uint8Array`) */
	readonly type: string;
	/** Explicit or derived store type; null leaves the choice to the SQL generator */
	readonly columnType: string | null;
	readonly nullable: boolean;
	readonly computedColumnSql: string | null;
	readonly isStored: boolean | null;
	readonly annotations: Annotations;
}

interface ColumnOperationBase {
	readonly schema?: string;
	readonly table: string;
	/** Column name */
	readonly name: string;
}

export interface AddColumnOperation extends ColumnOperationBase, ColumnState {
	readonly kind: 'addColumn';
}

export interface AlterColumnOperation extends ColumnOperationBase, ColumnState {
	readonly kind: 'alterColumn';
	readonly oldColumn: ColumnState;
}

export interface DropColumnOperation extends ColumnOperationBase {
	readonly kind: 'dropColumn';
	/** State of the column being dropped, when the host knows it */
	readonly oldColumn?: ColumnState;
}

export type ColumnOperation = AddColumnOperation | AlterColumnOperation | DropColumnOperation;

export interface CreateTableOperation {
	readonly kind: 'createTable';
	readonly schema?: string;
	readonly table: string;
	readonly columns: readonly AddColumnOperation[];
}

export interface DropTableOperation {
	readonly kind: 'dropTable';
	readonly schema?: string;
	readonly table: string;
}

export type SchemaOperation = ColumnOperation | CreateTableOperation | DropTableOperation;

export function isColumnOperation(operation: SchemaOperation): operation is ColumnOperation {
	return operation.kind === 'addColumn' || operation.kind === 'alterColumn' || operation.kind === 'dropColumn';
}

function annotationsEqual(a: Annotations, b: Annotations): boolean {
	const aKeys = Object.keys(a);
	const bKeys = Object.keys(b);
	return aKeys.length === bKeys.length && aKeys.every(key => Object.hasOwn(b, key) && a[key] === b[key]);
}

/**
 * Compares everything a schema operation could change about a column.
 */
export function columnStatesEqual(a: ColumnState, b: ColumnState, compareAnnotations = true): boolean {
	return a.type === b.type
		&& a.columnType === b.columnType
		&& a.nullable === b.nullable
		&& a.computedColumnSql === b.computedColumnSql
		&& a.isStored === b.isStored
		&& (!compareAnnotations || annotationsEqual(a.annotations, b.annotations));
}
