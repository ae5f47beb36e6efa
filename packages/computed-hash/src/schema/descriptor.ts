import { type HashAlgorithm, widthOf, isSecure } from '../algorithm/registry.js';

/**
 * Canonical description of a computed-hash column: the column holds
 * `algorithm` applied to the ordered concatenation of `sourceColumns`.
 */
export interface ComputedHashDescriptor {
	/** Name of the column being defined */
	readonly targetColumn: string;
	readonly algorithm: HashAlgorithm;
	/** Ordered, non-empty, duplicate-free; order changes the hash input */
	readonly sourceColumns: readonly string[];
}

/**
 * Creates a frozen descriptor. No validation happens here; see validateDescriptor.
 */
export function createDescriptor(
	targetColumn: string,
	algorithm: HashAlgorithm,
	sourceColumns: readonly string[]
): ComputedHashDescriptor {
	return Object.freeze({
		targetColumn,
		algorithm,
		sourceColumns: Object.freeze([...sourceColumns]),
	});
}

/**
 * Compares the parts of two descriptors that determine the generated column.
 * The target column name is not compared; renames are the host's concern.
 */
export function descriptorsEqual(a: ComputedHashDescriptor, b: ComputedHashDescriptor): boolean {
	return a.algorithm === b.algorithm
		&& a.sourceColumns.length === b.sourceColumns.length
		&& a.sourceColumns.every((source, i) => source === b.sourceColumns[i]);
}

/** Always derived from the current algorithm, never stored. */
export function storageWidthOf(descriptor: ComputedHashDescriptor): number {
	return widthOf(descriptor.algorithm);
}

export function isSecureDescriptor(descriptor: ComputedHashDescriptor): boolean {
	return isSecure(descriptor.algorithm);
}
