import { createLogger } from '../common/logger.js';
import { qualifyColumn } from '../common/types.js';
import type { HashAlgorithm } from '../algorithm/registry.js';
import type { EngineOptions } from '../config/types.js';
import { applyAnnotations, hasComputedHashAnnotations } from '../schema/annotations.js';
import type { ComputedHashDescriptor } from '../schema/descriptor.js';
import { normalizeDeclaration } from '../schema/normalizer.js';
import type { EntityType, PropertyModel } from './model.js';

const log = createLogger('model:hash');

/**
 * Hash intent as written by a front end.
 */
export interface ComputedHashDeclaration {
	algorithm: HashAlgorithm | string;
	sources: readonly string[];
}

/**
 * The single entry point every front end goes through: normalizes the declaration
 * and writes the annotation triplet on the property. A later declaration on the
 * same property replaces an earlier one (last writer wins).
 */
export function applyComputedHash(
	entity: EntityType,
	property: PropertyModel,
	declaration: ComputedHashDeclaration,
	options: EngineOptions = {}
): ComputedHashDescriptor {
	const descriptor = normalizeDeclaration({
		table: entity.name,
		targetColumn: property.name,
		targetType: property.type,
		algorithm: declaration.algorithm,
		sources: declaration.sources,
	}, options);

	if (hasComputedHashAnnotations(property.annotations)) {
		log('%s: replacing earlier computed hash declaration', qualifyColumn(entity.name, property.name));
	}
	property.annotations = applyAnnotations(property.annotations, descriptor);
	return descriptor;
}

/**
 * Turns a computed-hash property back into an ordinary one.
 * @returns whether the property carried a declaration
 */
export function removeComputedHash(entity: EntityType, property: PropertyModel): boolean {
	if (!hasComputedHashAnnotations(property.annotations)) {
		return false;
	}
	property.annotations = applyAnnotations(property.annotations, undefined);
	log('%s: computed hash declaration removed', qualifyColumn(entity.name, property.name));
	return true;
}
