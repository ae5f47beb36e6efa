import {
	DuplicateSourceError,
	EmptySourceListError,
	InvalidSourceNameError,
	InvalidTargetTypeError,
	UnknownAlgorithmError,
} from '../common/errors.js';
import { qualifyColumn } from '../common/types.js';
import { isHashAlgorithm, listAlgorithms } from '../algorithm/registry.js';
import type { ComputedHashDescriptor } from './descriptor.js';

/** Separator used when the source list is flattened into an annotation */
export const SOURCE_SEPARATOR = ',';

const BYTE_SEQUENCE_TYPES = new Set([
	'uint8array',
	'buffer',
	'arraybuffer',
	'bytes',
	'byte[]',
	'binary',
	'varbinary',
	'blob',
	'image',
]);

const SIZED_BINARY_TYPE = /^(?:binary\s*\(\s*\d+\s*\)|varbinary\s*\(\s*(?:\d+|max)\s*\))$/i;

/**
 * Whether a declared property type denotes a byte sequence.
 * Accepts the runtime names (`Uint8Array`, `Buffer`, ...) as well as SQL binary types.
 */
export function isByteSequenceType(declaredType: string): boolean {
	const normalized = declaredType.trim();
	return BYTE_SEQUENCE_TYPES.has(normalized.toLowerCase()) || SIZED_BINARY_TYPE.test(normalized);
}

export interface ValidationContext {
	/** Owning table, used to qualify the column in error messages */
	table?: string;
	/** Declared type of the target property, checked when given */
	targetType?: string;
}

/**
 * Checks every descriptor invariant and returns the same descriptor when it holds.
 * Validating an already-valid descriptor never changes it.
 *
 * Rules, in order: byte-sequence target type, known algorithm, non-empty source
 * list, well-formed source names, no duplicate sources (case-insensitive).
 */
export function validateDescriptor(
	descriptor: ComputedHashDescriptor,
	context: ValidationContext = {}
): ComputedHashDescriptor {
	const column = qualifyColumn(context.table, descriptor.targetColumn);

	if (context.targetType !== undefined && !isByteSequenceType(context.targetType)) {
		throw new InvalidTargetTypeError(context.targetType, column);
	}

	// Descriptors re-materialized from hand-edited metadata may carry any string here
	if (!isHashAlgorithm(descriptor.algorithm)) {
		throw new UnknownAlgorithmError(String(descriptor.algorithm), listAlgorithms(), column);
	}

	if (descriptor.sourceColumns.length === 0) {
		throw new EmptySourceListError(column);
	}

	const seen = new Set<string>();
	descriptor.sourceColumns.forEach((source, i) => {
		if (source.trim() === '' || source.includes(SOURCE_SEPARATOR)) {
			throw new InvalidSourceNameError(source, i + 1, column);
		}
		const key = source.toLowerCase();
		if (seen.has(key)) {
			throw new DuplicateSourceError(source, column);
		}
		seen.add(key);
	});

	return descriptor;
}
