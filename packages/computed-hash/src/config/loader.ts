/**
 * Configuration loading.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options
 * 2. Environment variables
 * 3. Defaults
 */

import { createLogger } from '../common/logger.js';
import { ComputedHashError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import {
	type EngineConfig,
	type EngineOptions,
	type InsecureAlgorithmPolicy,
	DEFAULT_CONFIG,
	INSECURE_ALGORITHM_POLICIES,
} from './types.js';

const log = createLogger('config');

type Environment = Readonly<Record<string, string | undefined>>;

function parsePolicy(value: string, source: string): InsecureAlgorithmPolicy {
	const normalized = value.trim().toLowerCase();
	const policy = INSECURE_ALGORITHM_POLICIES.find(p => p === normalized);
	if (!policy) {
		throw new ComputedHashError(
			`Invalid ${source}: '${value}' (expected one of ${INSECURE_ALGORITHM_POLICIES.join(', ')})`,
			StatusCode.MISUSE
		);
	}
	return policy;
}

/**
 * Load configuration from environment variables.
 *
 * - `COMPUTED_HASH_INSECURE_ALGORITHMS`: allow | warn | error
 * - `COMPUTED_HASH_DEFAULT_SCHEMA`: schema name for generated SQL
 */
export function loadEnvConfig(env: Environment = process.env): EngineOptions {
	const config: EngineOptions = {};

	const policy = env.COMPUTED_HASH_INSECURE_ALGORITHMS;
	if (policy) {
		config.insecureAlgorithms = parsePolicy(policy, 'COMPUTED_HASH_INSECURE_ALGORITHMS');
	}
	const schema = env.COMPUTED_HASH_DEFAULT_SCHEMA?.trim();
	if (schema) {
		config.defaultSchema = schema;
	}

	return config;
}

/**
 * Merges option layers over the defaults. Later layers win; undefined entries are skipped.
 * Does not consult the environment.
 */
export function resolveConfig(...overrides: EngineOptions[]): EngineConfig {
	const result: EngineConfig = { ...DEFAULT_CONFIG };

	for (const override of overrides) {
		if (override.insecureAlgorithms !== undefined) {
			result.insecureAlgorithms = parsePolicy(override.insecureAlgorithms, 'insecureAlgorithms option');
		}
		if (override.defaultSchema !== undefined) {
			if (override.defaultSchema.trim() === '') {
				throw new ComputedHashError('Invalid defaultSchema option: schema name must not be blank', StatusCode.MISUSE);
			}
			result.defaultSchema = override.defaultSchema;
		}
		if (override.onWarning !== undefined) result.onWarning = override.onWarning;
	}

	return result;
}

/**
 * Load full configuration: defaults, then environment, then programmatic options.
 */
export function loadConfig(options: EngineOptions = {}, env: Environment = process.env): EngineConfig {
	const config = resolveConfig(loadEnvConfig(env), options);
	log('Loaded config: insecureAlgorithms=%s defaultSchema=%s', config.insecureAlgorithms, config.defaultSchema);
	return config;
}
