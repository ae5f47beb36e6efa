/**
 * Configuration module exports.
 */

export {
	type EngineConfig,
	type EngineOptions,
	type HashWarning,
	type HashWarningListener,
	type InsecureAlgorithmPolicy,
	DEFAULT_CONFIG,
	INSECURE_ALGORITHM_POLICIES,
} from './types.js';

export {
	loadConfig,
	loadEnvConfig,
	resolveConfig,
} from './loader.js';
