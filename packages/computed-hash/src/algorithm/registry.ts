import { UnknownAlgorithmError } from '../common/errors.js';

/**
 * Hash functions understood by the engine's HASHBYTES implementation.
 * The value is the name passed to HASHBYTES.
 */
export enum HashAlgorithm {
	/** @deprecated Obsolete since SQL Server 2016 */
	MD2 = 'MD2',
	/** @deprecated Obsolete since SQL Server 2016 */
	MD4 = 'MD4',
	/** @deprecated Obsolete since SQL Server 2016 */
	MD5 = 'MD5',
	/** @deprecated Obsolete since SQL Server 2016 */
	SHA = 'SHA',
	/** @deprecated Obsolete since SQL Server 2016 */
	SHA1 = 'SHA1',
	SHA2_256 = 'SHA2_256',
	SHA2_512 = 'SHA2_512',
}

export interface AlgorithmInfo {
	readonly algorithm: HashAlgorithm;
	/** Output size in bytes */
	readonly width: number;
	/** Whether the algorithm is considered cryptographically secure */
	readonly secure: boolean;
}

const ALGORITHM_TABLE: Readonly<Record<HashAlgorithm, { width: number; secure: boolean }>> = {
	[HashAlgorithm.MD2]: { width: 16, secure: false },
	[HashAlgorithm.MD4]: { width: 16, secure: false },
	[HashAlgorithm.MD5]: { width: 16, secure: false },
	[HashAlgorithm.SHA]: { width: 20, secure: false },
	[HashAlgorithm.SHA1]: { width: 20, secure: false },
	[HashAlgorithm.SHA2_256]: { width: 32, secure: true },
	[HashAlgorithm.SHA2_512]: { width: 64, secure: true },
};

const ALL_ALGORITHMS: readonly HashAlgorithm[] = Object.freeze(Object.values(HashAlgorithm));

/**
 * Lists every supported algorithm in declaration order.
 */
export function listAlgorithms(): readonly HashAlgorithm[] {
	return ALL_ALGORITHMS;
}

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
	return typeof value === 'string' && ALL_ALGORITHMS.some(a => a === value);
}

/**
 * Output width of the algorithm in bytes.
 */
export function widthOf(algorithm: HashAlgorithm): number {
	return ALGORITHM_TABLE[algorithm].width;
}

export function isSecure(algorithm: HashAlgorithm): boolean {
	return ALGORITHM_TABLE[algorithm].secure;
}

export function getAlgorithmInfo(algorithm: HashAlgorithm): AlgorithmInfo {
	return { algorithm, ...ALGORITHM_TABLE[algorithm] };
}

/**
 * Resolves a free-text algorithm name, ignoring case and surrounding whitespace.
 * @param column Qualified column name reported if the token is unknown
 * @throws UnknownAlgorithmError
 */
export function parseAlgorithm(token: HashAlgorithm | string, column?: string): HashAlgorithm {
	const folded = token.trim().toUpperCase();
	const match = ALL_ALGORITHMS.find(a => a === folded);
	if (!match) {
		throw new UnknownAlgorithmError(token, ALL_ALGORITHMS, column);
	}
	return match;
}

/**
 * The fixed-width binary type that holds the algorithm's output, e.g. `BINARY(32)`.
 */
export function recommendedStorageType(algorithm: HashAlgorithm): string {
	return `BINARY(${widthOf(algorithm)})`;
}
