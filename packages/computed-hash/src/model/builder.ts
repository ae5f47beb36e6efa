import type { HashAlgorithm } from '../algorithm/registry.js';
import { loadConfig } from '../config/loader.js';
import type { EngineConfig, EngineOptions } from '../config/types.js';
import { applyComputedHash, removeComputedHash } from './hash-declaration.js';
import { EntityModel, EntityType, type PropertyOptions } from './model.js';

/** Property type given to hash columns that the builder has to create */
export const HASH_PROPERTY_TYPE = 'Uint8Array';

/**
 * Fluent configuration of one entity.
 */
export class EntityTypeBuilder {
	constructor(
		public readonly entity: EntityType,
		private readonly config: EngineConfig
	) {}

	property(name: string, type: string, options: PropertyOptions = {}): this {
		this.entity.addProperty(name, type, options);
		return this;
	}

	/**
	 * Declares `propertyName` as a persisted hash of `sources`, in that order.
	 * The property is created as a nullable `Uint8Array` when it does not exist yet.
	 */
	hasComputedHash(propertyName: string, algorithm: HashAlgorithm | string, sources: readonly string[]): this {
		const property = this.entity.findProperty(propertyName)
			?? this.entity.addProperty(propertyName, HASH_PROPERTY_TYPE);
		applyComputedHash(this.entity, property, { algorithm, sources }, this.config);
		return this;
	}

	removeComputedHash(propertyName: string): this {
		removeComputedHash(this.entity, this.entity.getPropertyOrFail(propertyName));
		return this;
	}

	ignore(propertyName: string): this {
		this.entity.removeProperty(propertyName);
		return this;
	}
}

/**
 * Builds an EntityModel through the fluent front end.
 * Configuration is loaded from the environment, then `options`.
 */
export class ModelBuilder {
	private readonly model = new EntityModel();
	private readonly config: EngineConfig;

	constructor(options: EngineOptions = {}) {
		this.config = loadConfig(options);
	}

	/**
	 * Configures an entity, creating it on first use.
	 */
	entity(name: string, configure: (builder: EntityTypeBuilder) => void): this {
		const entity = this.model.findEntity(name) ?? this.model.addEntity(new EntityType(name));
		configure(new EntityTypeBuilder(entity, this.config));
		return this;
	}

	/**
	 * Adds an entity produced elsewhere (e.g. by defineEntity) so the fluent API can refine it.
	 */
	addEntity(entity: EntityType): this {
		this.model.addEntity(entity);
		return this;
	}

	build(): EntityModel {
		return this.model;
	}
}
