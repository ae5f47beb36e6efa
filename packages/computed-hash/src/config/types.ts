/**
 * Configuration types for the computed-hash engine.
 */

import type { HashAlgorithm } from '../algorithm/registry.js';

/**
 * How legacy (insecure) hash algorithms are treated when a column declares one.
 * - `allow`: accepted silently
 * - `warn`: accepted, with a warning logged and passed to `onWarning`
 * - `error`: rejected with an InsecureAlgorithmError
 */
export type InsecureAlgorithmPolicy = 'allow' | 'warn' | 'error';

export const INSECURE_ALGORITHM_POLICIES: readonly InsecureAlgorithmPolicy[] = ['allow', 'warn', 'error'];

/**
 * Warning-level signal raised while normalizing a declaration.
 */
export interface HashWarning {
	code: 'insecure-algorithm';
	/** Qualified column name */
	column: string;
	algorithm: HashAlgorithm;
	message: string;
}

export type HashWarningListener = (warning: HashWarning) => void;

/**
 * Full engine configuration.
 */
export interface EngineConfig {
	/** Treatment of legacy hash algorithms */
	insecureAlgorithms: InsecureAlgorithmPolicy;
	/** Schema used to qualify tables in generated migration SQL when an operation names none */
	defaultSchema: string;
	/** Receives warnings raised during normalization */
	onWarning?: HashWarningListener;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EngineConfig = {
	insecureAlgorithms: 'warn',
	defaultSchema: 'dbo',
};

/**
 * Partial configuration accepted by every engine entry point.
 */
export type EngineOptions = Partial<EngineConfig>;
