/**
 * Renders computed-hash descriptors into SQL Server column definitions.
 *
 * Formatting Notes:
 * - Emits uppercase T-SQL keywords.
 * - Always quotes identifiers with brackets; `]` is doubled.
 * - Each source is converted to NVARCHAR(MAX) and NULL-coalesced to N'' on its own,
 *   so one NULL source does not null out the whole hash input.
 * - Sources are joined with '|'. A source value that itself contains '|' can make two
 *   different source tuples concatenate to the same text (and hash); this is a
 *   known limitation and values are not escaped.
 */
import { IncompatibleStorageTypeError } from '../common/errors.js';
import { widthOf } from '../algorithm/registry.js';
import type { ComputedHashDescriptor } from '../schema/descriptor.js';

export const SOURCE_DELIMITER = '|';

/**
 * Fixed-width binary storage type for a hash column.
 */
export interface TypeSpec {
	readonly kind: 'binary';
	/** Width in bytes */
	readonly width: number;
	/** e.g. `BINARY(32)` */
	readonly sql: string;
}

/**
 * Column payload for a persisted computed hash column.
 */
export interface RenderedComputedColumn {
	readonly columnType: string;
	readonly computedColumnSql: string;
	readonly isStored: true;
}

export function quoteIdentifier(name: string): string {
	return `[${name.replace(/]/g, ']]')}]`;
}

function renderSourceTerm(source: string): string {
	return `ISNULL(CONVERT(NVARCHAR(MAX), ${quoteIdentifier(source)}), N'')`;
}

export function renderStorageType(descriptor: ComputedHashDescriptor): TypeSpec {
	const width = widthOf(descriptor.algorithm);
	return { kind: 'binary', width, sql: `BINARY(${width})` };
}

/**
 * The HASHBYTES call alone, without the persistence marker.
 */
export function renderHashExpression(descriptor: ComputedHashDescriptor): string {
	const concatenation = descriptor.sourceColumns
		.map(renderSourceTerm)
		.join(` + '${SOURCE_DELIMITER}' + `);
	return `HASHBYTES('${descriptor.algorithm}', ${concatenation})`;
}

/**
 * Generated-column expression, marked PERSISTED.
 * Same descriptor, same string: migrations rely on this to produce no spurious diff.
 */
export function renderExpression(descriptor: ComputedHashDescriptor): string {
	return `${renderHashExpression(descriptor)} PERSISTED`;
}

export function renderComputedColumn(descriptor: ComputedHashDescriptor): RenderedComputedColumn {
	return {
		columnType: renderStorageType(descriptor).sql,
		computedColumnSql: renderExpression(descriptor),
		isStored: true,
	};
}

const BINARY_TYPE = /^\s*binary\s*\(\s*(\d+)\s*\)\s*$/i;

/**
 * Rejects an explicitly chosen column type that cannot hold the hash.
 * Unset types (null/undefined) are accepted; the renderer supplies one.
 * @param column Qualified column name for the error message
 * @throws IncompatibleStorageTypeError
 */
export function assertCompatibleStorageType(
	descriptor: ComputedHashDescriptor,
	columnType: string | null | undefined,
	column: string
): void {
	if (columnType === null || columnType === undefined) return;

	const expected = renderStorageType(descriptor);
	const match = BINARY_TYPE.exec(columnType);
	if (match && Number(match[1]) === expected.width) return;

	throw new IncompatibleStorageTypeError(columnType, expected.sql, expected.width, column);
}
