import { createLogger } from '../common/logger.js';
import { InsecureAlgorithmError, InvalidTargetTypeError } from '../common/errors.js';
import { qualifyColumn } from '../common/types.js';
import { type HashAlgorithm, isSecure, parseAlgorithm } from '../algorithm/registry.js';
import { resolveConfig } from '../config/loader.js';
import type { EngineConfig, EngineOptions } from '../config/types.js';
import { type ComputedHashDescriptor, createDescriptor } from './descriptor.js';
import { isByteSequenceType, validateDescriptor } from './validator.js';

const log = createLogger('schema:normalizer');
const warnLog = log.extend('warn');

/**
 * A hash declaration as collected by a front end, before any checking.
 */
export interface RawHashDeclaration {
	/** Owning table, for error messages */
	table?: string;
	targetColumn: string;
	/** Declared value type of the target property */
	targetType: string;
	/** Enumerant or free text, matched case-insensitively */
	algorithm: HashAlgorithm | string;
	/** Source column names in hash-input order */
	sources: readonly string[];
}

/**
 * Turns a raw declaration into a validated, frozen descriptor.
 * Source order is kept exactly as declared; names are only trimmed.
 */
export function normalizeDeclaration(
	raw: RawHashDeclaration,
	options: EngineOptions = {}
): ComputedHashDescriptor {
	const column = qualifyColumn(raw.table, raw.targetColumn);

	if (!isByteSequenceType(raw.targetType)) {
		throw new InvalidTargetTypeError(raw.targetType, column);
	}

	const algorithm = parseAlgorithm(raw.algorithm, column);
	const descriptor = validateDescriptor(
		createDescriptor(raw.targetColumn, algorithm, raw.sources.map(source => source.trim())),
		{ table: raw.table }
	);

	enforceAlgorithmPolicy(descriptor, column, resolveConfig(options));
	log('Normalized %s: %s over [%s]', column, algorithm, descriptor.sourceColumns.join(', '));
	return descriptor;
}

function enforceAlgorithmPolicy(descriptor: ComputedHashDescriptor, column: string, config: EngineConfig): void {
	if (isSecure(descriptor.algorithm)) return;

	switch (config.insecureAlgorithms) {
		case 'allow':
			return;
		case 'error':
			throw new InsecureAlgorithmError(descriptor.algorithm, column);
		case 'warn': {
			const message = `${column} uses ${descriptor.algorithm}, which is not cryptographically secure`;
			warnLog(message);
			config.onWarning?.({ code: 'insecure-algorithm', column, algorithm: descriptor.algorithm, message });
			return;
		}
	}
}
