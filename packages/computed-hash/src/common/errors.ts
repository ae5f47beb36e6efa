import { StatusCode } from './types.js';

export type ComputedHashErrorKind =
	| 'Generic'
	| 'UnknownAlgorithm'
	| 'EmptySourceList'
	| 'DuplicateSource'
	| 'InvalidSourceName'
	| 'InvalidTargetType'
	| 'IncompatibleStorageType'
	| 'MalformedAnnotationState'
	| 'InsecureAlgorithm';

export interface ComputedHashErrorOptions {
	/** Qualified name (`Table.Column`) of the column being configured */
	column?: string;
	/** The invariant that was violated, in a few words */
	rule?: string;
	cause?: Error;
}

/**
 * Base class for computed-hash errors.
 * Every failure is a model-definition defect: raised synchronously, never retried.
 */
export class ComputedHashError extends Error {
	readonly kind: ComputedHashErrorKind = 'Generic';
	public code: number;
	public column?: string;
	public rule?: string;

	constructor(message: string, code: number = StatusCode.ERROR, options: ComputedHashErrorOptions = {}) {
		super(
			options.column ? `Computed hash column ${options.column}: ${message}` : message,
			options.cause ? { cause: options.cause } : undefined
		);
		this.code = code;
		this.name = 'ComputedHashError';
		this.column = options.column;
		this.rule = options.rule;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ComputedHashError);
		}
	}
}

export class UnknownAlgorithmError extends ComputedHashError {
	readonly kind = 'UnknownAlgorithm';

	constructor(public readonly token: string, known: readonly string[], column?: string) {
		super(
			`unknown or unsupported hash algorithm '${token}' (expected one of ${known.join(', ')})`,
			StatusCode.NOTFOUND,
			{ column, rule: 'algorithm must be a supported hash algorithm' }
		);
		this.name = 'UnknownAlgorithmError';
		Object.setPrototypeOf(this, UnknownAlgorithmError.prototype);
	}
}

export class EmptySourceListError extends ComputedHashError {
	readonly kind = 'EmptySourceList';

	constructor(column?: string) {
		super('at least one source column is required', StatusCode.CONSTRAINT, {
			column,
			rule: 'source list must not be empty',
		});
		this.name = 'EmptySourceListError';
		Object.setPrototypeOf(this, EmptySourceListError.prototype);
	}
}

export class DuplicateSourceError extends ComputedHashError {
	readonly kind = 'DuplicateSource';

	constructor(public readonly source: string, column?: string) {
		super(`source column '${source}' is listed more than once`, StatusCode.CONSTRAINT, {
			column,
			rule: 'source columns must be unique',
		});
		this.name = 'DuplicateSourceError';
		Object.setPrototypeOf(this, DuplicateSourceError.prototype);
	}
}

export class InvalidSourceNameError extends ComputedHashError {
	readonly kind = 'InvalidSourceName';

	constructor(public readonly source: string, position: number, column?: string) {
		super(`source column name '${source}' at position ${position} is blank or contains ','`, StatusCode.CONSTRAINT, {
			column,
			rule: 'source column names must be non-blank and free of the list separator',
		});
		this.name = 'InvalidSourceNameError';
		Object.setPrototypeOf(this, InvalidSourceNameError.prototype);
	}
}

export class InvalidTargetTypeError extends ComputedHashError {
	readonly kind = 'InvalidTargetType';

	constructor(public readonly declaredType: string, column?: string) {
		super(`computed hashes can only target byte-sequence columns; found type '${declaredType}'`, StatusCode.MISMATCH, {
			column,
			rule: 'target column must be a byte sequence',
		});
		this.name = 'InvalidTargetTypeError';
		Object.setPrototypeOf(this, InvalidTargetTypeError.prototype);
	}
}

export class IncompatibleStorageTypeError extends ComputedHashError {
	readonly kind = 'IncompatibleStorageType';

	constructor(public readonly found: string, public readonly expected: string, width: number, column?: string) {
		super(`storage type '${found}' is incompatible; expected ${expected} (${width} bytes)`, StatusCode.MISMATCH, {
			column,
			rule: 'storage type must be fixed-width binary sized to the hash',
		});
		this.name = 'IncompatibleStorageTypeError';
		Object.setPrototypeOf(this, IncompatibleStorageTypeError.prototype);
	}
}

export class MalformedAnnotationStateError extends ComputedHashError {
	readonly kind = 'MalformedAnnotationState';

	constructor(detail: string, column?: string) {
		super(`malformed computed hash annotations: ${detail}`, StatusCode.FORMAT, {
			column,
			rule: detail,
		});
		this.name = 'MalformedAnnotationStateError';
		Object.setPrototypeOf(this, MalformedAnnotationStateError.prototype);
	}
}

export class InsecureAlgorithmError extends ComputedHashError {
	readonly kind = 'InsecureAlgorithm';

	constructor(public readonly algorithm: string, column?: string) {
		super(`hash algorithm ${algorithm} is not cryptographically secure and insecure algorithms are disallowed`, StatusCode.CONSTRAINT, {
			column,
			rule: 'insecure algorithms are disallowed by configuration',
		});
		this.name = 'InsecureAlgorithmError';
		Object.setPrototypeOf(this, InsecureAlgorithmError.prototype);
	}
}
