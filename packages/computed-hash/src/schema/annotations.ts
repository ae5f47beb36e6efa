import { MalformedAnnotationStateError } from '../common/errors.js';
import { qualifyColumn } from '../common/types.js';
import { parseAlgorithm } from '../algorithm/registry.js';
import { type ComputedHashDescriptor, createDescriptor } from './descriptor.js';
import { SOURCE_SEPARATOR, validateDescriptor } from './validator.js';

/**
 * Annotation keys written on a model property. These three entries are the
 * only channel between declared intent and schema operations.
 */
export const AnnotationKeys = {
	Prefix: 'ComputedHash:',
	IsComputedHash: 'ComputedHash:IsComputedHash',
	Algorithm: 'ComputedHash:Algorithm',
	SourceColumns: 'ComputedHash:SourceColumns',
} as const;

export type AnnotationValue = string | number | boolean | null;

export type Annotations = Readonly<Record<string, AnnotationValue>>;

const TRIPLET_KEYS: readonly string[] = [
	AnnotationKeys.IsComputedHash,
	AnnotationKeys.Algorithm,
	AnnotationKeys.SourceColumns,
];

export interface AnnotationContext {
	table?: string;
	column: string;
}

/**
 * Serializes a descriptor into its annotation triplet.
 */
export function encodeDescriptor(descriptor: ComputedHashDescriptor): Record<string, AnnotationValue> {
	return {
		[AnnotationKeys.IsComputedHash]: true,
		[AnnotationKeys.Algorithm]: descriptor.algorithm,
		[AnnotationKeys.SourceColumns]: descriptor.sourceColumns.join(SOURCE_SEPARATOR),
	};
}

function isPresent(value: AnnotationValue | undefined): boolean {
	return value !== undefined && value !== null;
}

/**
 * Whether any of the computed-hash entries is set.
 */
export function hasComputedHashAnnotations(annotations: Annotations): boolean {
	return TRIPLET_KEYS.some(key => isPresent(annotations[key]));
}

/**
 * Re-materializes a descriptor from annotations and re-validates it.
 * @returns undefined when the column carries no computed-hash annotations
 * @throws MalformedAnnotationStateError for partial or ill-typed triplets, or the
 *   validation error of the decoded descriptor
 */
export function decodeAnnotations(
	annotations: Annotations,
	context: AnnotationContext
): ComputedHashDescriptor | undefined {
	const column = qualifyColumn(context.table, context.column);
	const flag = annotations[AnnotationKeys.IsComputedHash];
	const algorithm = annotations[AnnotationKeys.Algorithm];
	const sources = annotations[AnnotationKeys.SourceColumns];

	if (!isPresent(flag) || flag === false) {
		if (isPresent(algorithm) || isPresent(sources)) {
			throw new MalformedAnnotationStateError('algorithm or source entries are set without the computed-hash flag', column);
		}
		return undefined;
	}
	if (flag !== true) {
		throw new MalformedAnnotationStateError(`computed-hash flag must be a boolean, found ${typeof flag}`, column);
	}
	if (typeof algorithm !== 'string' || algorithm.trim() === '') {
		throw new MalformedAnnotationStateError('algorithm entry is missing or not a string', column);
	}
	if (typeof sources !== 'string') {
		throw new MalformedAnnotationStateError('source column entry is missing or not a string', column);
	}

	const sourceColumns = sources === '' ? [] : sources.split(SOURCE_SEPARATOR).map(source => source.trim());
	return validateDescriptor(
		createDescriptor(context.column, parseAlgorithm(algorithm, column), sourceColumns),
		{ table: context.table }
	);
}

/**
 * Returns a copy of `annotations` with the triplet written for `descriptor`,
 * or removed when `descriptor` is undefined. Other entries are kept.
 */
export function applyAnnotations(
	annotations: Annotations,
	descriptor: ComputedHashDescriptor | undefined
): Record<string, AnnotationValue> {
	const result: Record<string, AnnotationValue> = {};
	for (const [key, value] of Object.entries(annotations)) {
		if (!TRIPLET_KEYS.includes(key)) {
			result[key] = value;
		}
	}
	return descriptor ? { ...result, ...encodeDescriptor(descriptor) } : result;
}
