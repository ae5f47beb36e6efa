import { createLogger } from '../common/logger.js';
import { qualifyColumn } from '../common/types.js';
import { decodeAnnotations, type Annotations } from '../schema/annotations.js';
import { type ComputedHashDescriptor, descriptorsEqual } from '../schema/descriptor.js';
import {
	assertCompatibleStorageType,
	renderExpression,
	renderStorageType,
} from '../emit/sql-renderer.js';
import {
	type AddColumnOperation,
	type AlterColumnOperation,
	type ColumnOperation,
	type SchemaOperation,
	columnStatesEqual,
} from './operations.js';

const log = createLogger('migration:resolver');

/**
 * Transition between the old and new descriptor of one column.
 */
export type LifecycleTransition =
	| { readonly kind: 'create'; readonly next: ComputedHashDescriptor }
	| { readonly kind: 'noop'; readonly descriptor: ComputedHashDescriptor }
	| { readonly kind: 'alterDefinition'; readonly previous: ComputedHashDescriptor; readonly next: ComputedHashDescriptor }
	| { readonly kind: 'convertToPlain'; readonly previous: ComputedHashDescriptor }
	| { readonly kind: 'untracked' };

/**
 * What happened to an operation. `create` and `convertToComputed` are the same
 * transition seen through an add and an alter respectively.
 */
export type TransitionKind =
	| 'create'
	| 'convertToComputed'
	| 'alterDefinition'
	| 'convertToPlain'
	| 'drop'
	| 'noop'
	| 'passthrough';

export interface ResolvedOperation<T extends ColumnOperation = ColumnOperation> {
	readonly transition: TransitionKind;
	readonly operation: T;
	/** The operation changes nothing and should not be emitted */
	readonly suppressed: boolean;
}

export function resolveTransition(
	previous: ComputedHashDescriptor | undefined,
	next: ComputedHashDescriptor | undefined
): LifecycleTransition {
	if (!previous) {
		return next ? { kind: 'create', next } : { kind: 'untracked' };
	}
	if (!next) {
		return { kind: 'convertToPlain', previous };
	}
	return descriptorsEqual(previous, next)
		? { kind: 'noop', descriptor: next }
		: { kind: 'alterDefinition', previous, next };
}

function readDescriptor(operation: ColumnOperation, annotations: Annotations): ComputedHashDescriptor | undefined {
	return decodeAnnotations(annotations, { table: operation.table, column: operation.name });
}

/**
 * Type, expression and stored marker are always re-derived together from one descriptor.
 */
function withComputedPayload<T extends AddColumnOperation | AlterColumnOperation>(
	operation: T,
	descriptor: ComputedHashDescriptor
): T {
	assertCompatibleStorageType(descriptor, operation.columnType, qualifyColumn(operation.table, operation.name));
	return {
		...operation,
		columnType: renderStorageType(descriptor).sql,
		computedColumnSql: renderExpression(descriptor),
		isStored: true,
	};
}

function resolveAddColumn(operation: AddColumnOperation): ResolvedOperation<AddColumnOperation> {
	const next = readDescriptor(operation, operation.annotations);
	return next
		? { transition: 'create', operation: withComputedPayload(operation, next), suppressed: false }
		: { transition: 'passthrough', operation, suppressed: false };
}

function resolveAlterColumn(operation: AlterColumnOperation): ResolvedOperation<AlterColumnOperation> {
	const transition = resolveTransition(
		readDescriptor(operation, operation.oldColumn.annotations),
		readDescriptor(operation, operation.annotations)
	);

	switch (transition.kind) {
		case 'create':
			return { transition: 'convertToComputed', operation: withComputedPayload(operation, transition.next), suppressed: false };
		case 'alterDefinition':
			return { transition: 'alterDefinition', operation: withComputedPayload(operation, transition.next), suppressed: false };
		case 'convertToPlain':
			// Storage type stays what it was unless the new declaration names one
			return {
				transition: 'convertToPlain',
				operation: {
					...operation,
					columnType: operation.columnType ?? operation.oldColumn.columnType ?? renderStorageType(transition.previous).sql,
					computedColumnSql: null,
					isStored: null,
				},
				suppressed: false,
			};
		case 'noop':
			return {
				transition: 'noop',
				operation,
				suppressed: columnStatesEqual(operation, operation.oldColumn, false),
			};
		case 'untracked':
			return { transition: 'passthrough', operation, suppressed: false };
	}
}

/**
 * Rewrites one host-produced column operation so it carries the rendered type and
 * expression. Returns a new operation; the input is never modified.
 * @throws ComputedHashError subclasses when either side's annotations are malformed,
 *   or when an explicit column type cannot hold the hash
 */
export function resolveOperation(operation: ColumnOperation): ResolvedOperation {
	switch (operation.kind) {
		case 'addColumn':
			return resolveAddColumn(operation);
		case 'alterColumn':
			return resolveAlterColumn(operation);
		case 'dropColumn': {
			const previous = operation.oldColumn
				? readDescriptor(operation, operation.oldColumn.annotations)
				: undefined;
			return { transition: previous ? 'drop' : 'passthrough', operation, suppressed: false };
		}
	}
}

/**
 * Resolves every column operation in order, dropping suppressed ones.
 * Columns of a create-table operation are resolved individually.
 */
export function resolveOperations(operations: readonly SchemaOperation[]): SchemaOperation[] {
	const result: SchemaOperation[] = [];

	for (const operation of operations) {
		switch (operation.kind) {
			case 'createTable': {
				const columns = operation.columns.map(column => {
					const resolved = resolveAddColumn(column);
					logResolution(resolved);
					return resolved.operation;
				});
				result.push({ ...operation, columns });
				break;
			}
			case 'dropTable':
				result.push(operation);
				break;
			default: {
				const resolved = resolveOperation(operation);
				logResolution(resolved);
				if (!resolved.suppressed) {
					result.push(resolved.operation);
				}
			}
		}
	}

	return result;
}

function logResolution(resolved: ResolvedOperation): void {
	const column = qualifyColumn(resolved.operation.table, resolved.operation.name);
	if (resolved.suppressed) {
		log('%s: %s (suppressed)', column, resolved.transition);
	} else if (resolved.transition !== 'passthrough') {
		log('%s: %s', column, resolved.transition);
	}
}
