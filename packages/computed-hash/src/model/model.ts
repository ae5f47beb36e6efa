import { createLogger } from '../common/logger.js';
import { ComputedHashError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { AnnotationValue } from '../schema/annotations.js';

const log = createLogger('model');

/**
 * A property of an entity, mapped to one column.
 */
export interface PropertyModel {
	name: string;
	/** Declared value type (e.g. `string`, `int`, `Uint8Array`) */
	type: string;
	/** Store type chosen by the user, if any */
	columnType?: string;
	nullable: boolean;
	annotations: Record<string, AnnotationValue>;
}

export interface PropertyOptions {
	columnType?: string;
	nullable?: boolean;
}

/**
 * An entity mapped to one table. Property lookup is case-insensitive;
 * declaration order is kept.
 */
export class EntityType {
	private properties = new Map<string, PropertyModel>();

	constructor(public readonly name: string) {}

	/**
	 * Adds a property, or updates the type and options of an existing one.
	 */
	addProperty(name: string, type: string, options: PropertyOptions = {}): PropertyModel {
		const existing = this.findProperty(name);
		if (existing) {
			existing.type = type;
			if (options.columnType !== undefined) existing.columnType = options.columnType;
			if (options.nullable !== undefined) existing.nullable = options.nullable;
			return existing;
		}

		const property: PropertyModel = {
			name,
			type,
			columnType: options.columnType,
			nullable: options.nullable ?? true,
			annotations: {},
		};
		this.properties.set(name.toLowerCase(), property);
		log('Added property %s.%s (%s)', this.name, name, type);
		return property;
	}

	findProperty(name: string): PropertyModel | undefined {
		return this.properties.get(name.toLowerCase());
	}

	getPropertyOrFail(name: string): PropertyModel {
		const property = this.findProperty(name);
		if (!property) {
			throw new ComputedHashError(`Property ${this.name}.${name} not found`, StatusCode.NOTFOUND);
		}
		return property;
	}

	getProperties(): PropertyModel[] {
		return Array.from(this.properties.values());
	}

	removeProperty(name: string): boolean {
		const removed = this.properties.delete(name.toLowerCase());
		if (removed) {
			log('Removed property %s.%s', this.name, name);
		}
		return removed;
	}
}

/**
 * The in-memory model: entity types keyed case-insensitively by table name.
 */
export class EntityModel {
	private entities = new Map<string, EntityType>();

	addEntity(entity: EntityType): EntityType {
		const key = entity.name.toLowerCase();
		if (this.entities.has(key)) {
			throw new ComputedHashError(`Entity ${entity.name} already exists`, StatusCode.CONSTRAINT);
		}
		this.entities.set(key, entity);
		log('Added entity %s', entity.name);
		return entity;
	}

	findEntity(name: string): EntityType | undefined {
		return this.entities.get(name.toLowerCase());
	}

	getEntities(): EntityType[] {
		return Array.from(this.entities.values());
	}

	removeEntity(name: string): boolean {
		return this.entities.delete(name.toLowerCase());
	}
}
