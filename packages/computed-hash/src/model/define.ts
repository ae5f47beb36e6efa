import { loadConfig } from '../config/loader.js';
import type { EngineOptions } from '../config/types.js';
import { applyComputedHash, type ComputedHashDeclaration } from './hash-declaration.js';
import { EntityType } from './model.js';

/**
 * Column declaration for the declarative front end.
 *
 * @example
 * ```typescript
 * const documents = defineEntity('Documents', {
 *   Title: { type: 'string' },
 *   Content: { type: 'string' },
 *   ContentHash: { type: 'Uint8Array', computedHash: { algorithm: 'SHA2_256', sources: ['Title', 'Content'] } },
 * });
 * ```
 */
export interface ColumnDeclaration {
	type: string;
	columnType?: string;
	nullable?: boolean;
	computedHash?: ComputedHashDeclaration;
}

/**
 * Declares an entity from a column map. Columns keep the map's key order.
 * Hash declarations go through the same entry point as the fluent builder.
 */
export function defineEntity(
	name: string,
	columns: Readonly<Record<string, ColumnDeclaration>>,
	options: EngineOptions = {}
): EntityType {
	const config = loadConfig(options);
	const entity = new EntityType(name);

	for (const [columnName, declaration] of Object.entries(columns)) {
		const property = entity.addProperty(columnName, declaration.type, {
			columnType: declaration.columnType,
			nullable: declaration.nullable,
		});
		if (declaration.computedHash) {
			applyComputedHash(entity, property, declaration.computedHash, config);
		}
	}

	return entity;
}
