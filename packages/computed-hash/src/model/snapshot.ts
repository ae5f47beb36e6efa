import { ComputedHashError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { type AnnotationValue, decodeAnnotations } from '../schema/annotations.js';
import { renderExpression, renderStorageType } from '../emit/sql-renderer.js';
import type { ColumnState } from '../migration/operations.js';
import type { EntityModel } from './model.js';

/**
 * Serializable record of what the model looked like when a migration was generated.
 * Diffing the previous snapshot against the current one yields schema operations.
 */
export interface ModelSnapshot {
	readonly version: 1;
	readonly tables: readonly TableSnapshot[];
}

export interface TableSnapshot {
	readonly name: string;
	readonly columns: readonly ColumnSnapshot[];
}

export interface ColumnSnapshot extends ColumnState {
	readonly name: string;
}

/**
 * Captures the model. Computed-hash columns get their derived store type and
 * rendered expression; annotations are re-validated on the way.
 */
export function snapshotModel(model: EntityModel): ModelSnapshot {
	const tables = model.getEntities().map((entity): TableSnapshot => ({
		name: entity.name,
		columns: entity.getProperties().map((property): ColumnSnapshot => {
			const descriptor = decodeAnnotations(property.annotations, { table: entity.name, column: property.name });
			return {
				name: property.name,
				type: property.type,
				columnType: property.columnType ?? (descriptor ? renderStorageType(descriptor).sql : null),
				nullable: property.nullable,
				computedColumnSql: descriptor ? renderExpression(descriptor) : null,
				isStored: descriptor ? true : null,
				annotations: { ...property.annotations },
			};
		}),
	}));
	return { version: 1, tables };
}

/**
 * Carries store types forward: a plain column whose model names no store type keeps
 * the type it had in `previous`. Defaults apply only when a column is first created,
 * so a former hash column stays `BINARY(n)` after its declaration is removed.
 */
export function inheritStoreTypes(previous: ModelSnapshot | undefined, current: ModelSnapshot): ModelSnapshot {
	if (!previous) return current;

	const previousTypes = new Map<string, string>();
	for (const table of previous.tables) {
		for (const column of table.columns) {
			if (column.columnType !== null) {
				previousTypes.set(`${table.name.toLowerCase()}.${column.name.toLowerCase()}`, column.columnType);
			}
		}
	}

	const tables = current.tables.map((table): TableSnapshot => ({
		name: table.name,
		columns: table.columns.map((column): ColumnSnapshot => {
			if (column.columnType !== null || column.computedColumnSql !== null) return column;
			const inherited = previousTypes.get(`${table.name.toLowerCase()}.${column.name.toLowerCase()}`);
			return inherited === undefined ? column : { ...column, columnType: inherited };
		}),
	}));
	return { version: 1, tables };
}

/**
 * Serializes a snapshot to JSON string
 */
export function serializeSnapshot(snapshot: ModelSnapshot): string {
	return JSON.stringify(snapshot, null, 2);
}

function invalid(detail: string, cause?: Error): never {
	throw new ComputedHashError(`Invalid model snapshot: ${detail}`, StatusCode.FORMAT, { cause });
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAnnotationValue(value: unknown): value is AnnotationValue {
	return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function readString(record: Record<string, unknown>, key: string, path: string): string {
	const value = record[key];
	return typeof value === 'string' ? value : invalid(`${path}.${key} must be a string`);
}

function readNullable<T>(value: unknown, guard: (v: unknown) => v is T, message: string): T | null {
	if (value === null || value === undefined) return null;
	return guard(value) ? value : invalid(message);
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

function readColumn(value: unknown, path: string): ColumnSnapshot {
	if (!isRecord(value)) return invalid(`${path} must be an object`);

	const annotations: Record<string, AnnotationValue> = {};
	const rawAnnotations = value.annotations ?? {};
	if (!isRecord(rawAnnotations)) return invalid(`${path}.annotations must be an object`);
	for (const [key, entry] of Object.entries(rawAnnotations)) {
		if (!isAnnotationValue(entry)) return invalid(`${path}.annotations.${key} must be a string, number, boolean or null`);
		annotations[key] = entry;
	}

	if (typeof value.nullable !== 'boolean') return invalid(`${path}.nullable must be a boolean`);

	return {
		name: readString(value, 'name', path),
		type: readString(value, 'type', path),
		columnType: readNullable(value.columnType, isString, `${path}.columnType must be a string or null`),
		nullable: value.nullable,
		computedColumnSql: readNullable(value.computedColumnSql, isString, `${path}.computedColumnSql must be a string or null`),
		isStored: readNullable(value.isStored, isBoolean, `${path}.isStored must be a boolean or null`),
		annotations,
	};
}

/**
 * Parses a snapshot written by serializeSnapshot, checking its shape.
 * @throws ComputedHashError (FORMAT) on malformed input
 */
export function parseSnapshot(json: string): ModelSnapshot {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (error) {
		return invalid('not valid JSON', error instanceof Error ? error : undefined);
	}

	if (!isRecord(parsed)) return invalid('root must be an object');
	if (parsed.version !== 1) return invalid(`unsupported version ${String(parsed.version)}`);
	if (!Array.isArray(parsed.tables)) return invalid('tables must be an array');

	const tables = parsed.tables.map((table: unknown, t: number): TableSnapshot => {
		const path = `tables[${t}]`;
		if (!isRecord(table)) return invalid(`${path} must be an object`);
		if (!Array.isArray(table.columns)) return invalid(`${path}.columns must be an array`);
		return {
			name: readString(table, 'name', path),
			columns: table.columns.map((column: unknown, c: number) => readColumn(column, `${path}.columns[${c}]`)),
		};
	});

	return { version: 1, tables };
}
