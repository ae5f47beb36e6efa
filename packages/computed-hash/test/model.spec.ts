import { expect } from 'chai';
import { HashAlgorithm } from '../src/algorithm/registry.js';
import { ComputedHashError, InsecureAlgorithmError, InvalidTargetTypeError } from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';
import type { HashWarning } from '../src/config/types.js';
import { HASH_PROPERTY_TYPE, ModelBuilder } from '../src/model/builder.js';
import { defineEntity } from '../src/model/define.js';
import { applyComputedHash, removeComputedHash } from '../src/model/hash-declaration.js';
import { EntityModel, EntityType } from '../src/model/model.js';
import { decodeAnnotations } from '../src/schema/annotations.js';

const titleContentAnnotations = {
	'ComputedHash:IsComputedHash': true,
	'ComputedHash:Algorithm': 'SHA2_256',
	'ComputedHash:SourceColumns': 'Title,Content',
};

describe('Entity model', () => {
	describe('EntityType', () => {
		it('should look properties up case-insensitively and keep declaration order', () => {
			const entity = new EntityType('Documents');
			entity.addProperty('Title', 'string');
			entity.addProperty('Content', 'string', { nullable: false });
			expect(entity.findProperty('title')?.name).to.equal('Title');
			expect(entity.getProperties().map(p => p.name)).to.deep.equal(['Title', 'Content']);
			expect(entity.getPropertyOrFail('CONTENT').nullable).to.be.false;
		});

		it('should update an existing property in place', () => {
			const entity = new EntityType('Documents');
			const first = entity.addProperty('Title', 'string', { columnType: 'NVARCHAR(200)' });
			const second = entity.addProperty('title', 'string', { nullable: false });
			expect(second).to.equal(first);
			expect(second).to.deep.include({ name: 'Title', columnType: 'NVARCHAR(200)', nullable: false });
		});

		it('should report a missing property', () => {
			const entity = new EntityType('Documents');
			try {
				entity.getPropertyOrFail('Missing');
				expect.fail('should have thrown');
			} catch (e) {
				if (!(e instanceof ComputedHashError)) throw e;
				expect(e.message).to.equal('Property Documents.Missing not found');
				expect(e.code).to.equal(StatusCode.NOTFOUND);
			}
		});
	});

	describe('EntityModel', () => {
		it('should refuse a second entity with the same name', () => {
			const model = new EntityModel();
			model.addEntity(new EntityType('Documents'));
			expect(() => model.addEntity(new EntityType('documents'))).to.throw(ComputedHashError, 'Entity documents already exists');
		});

		it('should find and remove entities case-insensitively', () => {
			const model = new EntityModel();
			model.addEntity(new EntityType('Documents'));
			expect(model.findEntity('DOCUMENTS')?.name).to.equal('Documents');
			expect(model.removeEntity('documents')).to.be.true;
			expect(model.getEntities()).to.deep.equal([]);
		});
	});

	describe('ModelBuilder', () => {
		it('should declare a hash column and create its property', () => {
			const model = new ModelBuilder()
				.entity('Documents', e => e
					.property('Title', 'string')
					.property('Content', 'string')
					.hasComputedHash('ContentHash', 'sha2_256', ['Title', 'Content']))
				.build();

			const property = model.findEntity('Documents')?.findProperty('ContentHash');
			expect(property).to.deep.equal({
				name: 'ContentHash',
				type: HASH_PROPERTY_TYPE,
				columnType: undefined,
				nullable: true,
				annotations: titleContentAnnotations,
			});
		});

		it('should reject a hash on a non-byte property', () => {
			const builder = new ModelBuilder();
			expect(() => builder.entity('Documents', e => e
				.property('Title', 'string')
				.hasComputedHash('Title', HashAlgorithm.SHA2_256, ['Title'])))
				.to.throw(InvalidTargetTypeError, "Computed hash column Documents.Title: computed hashes can only target byte-sequence columns; found type 'string'");
		});

		it('should let the last declaration win', () => {
			const model = new ModelBuilder()
				.entity('Documents', e => e
					.hasComputedHash('ContentHash', HashAlgorithm.SHA2_256, ['Title'])
					.hasComputedHash('ContentHash', HashAlgorithm.SHA2_512, ['Title', 'Content']))
				.build();

			const property = model.findEntity('Documents')?.getPropertyOrFail('ContentHash');
			expect(property?.annotations).to.deep.equal({
				'ComputedHash:IsComputedHash': true,
				'ComputedHash:Algorithm': 'SHA2_512',
				'ComputedHash:SourceColumns': 'Title,Content',
			});
		});

		it('should reuse an entity configured twice', () => {
			const model = new ModelBuilder()
				.entity('Documents', e => e.property('Title', 'string'))
				.entity('documents', e => e.property('Content', 'string'))
				.build();
			expect(model.getEntities()).to.have.length(1);
			expect(model.getEntities()[0].getProperties().map(p => p.name)).to.deep.equal(['Title', 'Content']);
		});

		it('should remove a declaration and keep the property', () => {
			const model = new ModelBuilder()
				.entity('Documents', e => e
					.hasComputedHash('ContentHash', HashAlgorithm.SHA2_256, ['Title'])
					.removeComputedHash('ContentHash'))
				.build();
			const property = model.findEntity('Documents')?.getPropertyOrFail('ContentHash');
			expect(property?.annotations).to.deep.equal({});
		});

		it('should fail to remove a declaration from a missing property', () => {
			expect(() => new ModelBuilder().entity('Documents', e => e.removeComputedHash('ContentHash')))
				.to.throw(ComputedHashError, 'Property Documents.ContentHash not found');
		});

		it('should drop an ignored property', () => {
			const model = new ModelBuilder()
				.entity('Documents', e => e.property('Title', 'string').property('Scratch', 'string').ignore('Scratch'))
				.build();
			expect(model.findEntity('Documents')?.getProperties().map(p => p.name)).to.deep.equal(['Title']);
		});

		it('should pass insecure-algorithm warnings to the listener', () => {
			const warnings: HashWarning[] = [];
			new ModelBuilder({ insecureAlgorithms: 'warn', onWarning: w => warnings.push(w) })
				.entity('Documents', e => e.hasComputedHash('ContentHash', 'md5', ['Title']));
			expect(warnings).to.deep.equal([{
				code: 'insecure-algorithm',
				column: 'Documents.ContentHash',
				algorithm: 'MD5',
				message: 'Documents.ContentHash uses MD5, which is not cryptographically secure',
			}]);
		});

		it('should reject insecure algorithms when configured to', () => {
			const builder = new ModelBuilder({ insecureAlgorithms: 'error' });
			expect(() => builder.entity('Documents', e => e.hasComputedHash('ContentHash', HashAlgorithm.SHA1, ['Title'])))
				.to.throw(InsecureAlgorithmError);
		});
	});

	describe('defineEntity', () => {
		it('should produce the same annotations as the builder', () => {
			const entity = defineEntity('Documents', {
				Title: { type: 'string' },
				Content: { type: 'string', nullable: false },
				ContentHash: { type: 'Uint8Array', computedHash: { algorithm: 'SHA2_256', sources: ['Title', 'Content'] } },
			});

			expect(entity.getProperties().map(p => p.name)).to.deep.equal(['Title', 'Content', 'ContentHash']);
			expect(entity.getPropertyOrFail('Content').nullable).to.be.false;
			expect(entity.getPropertyOrFail('ContentHash').annotations).to.deep.equal(titleContentAnnotations);
		});

		it('should keep an explicit storage type', () => {
			const entity = defineEntity('Documents', {
				ContentHash: { type: 'Uint8Array', columnType: 'BINARY(32)', computedHash: { algorithm: 'SHA2_256', sources: ['Title'] } },
			});
			expect(entity.getPropertyOrFail('ContentHash').columnType).to.equal('BINARY(32)');
		});

		it('should let the fluent front end refine a defined entity', () => {
			const model = new ModelBuilder()
				.addEntity(defineEntity('Documents', {
					ContentHash: { type: 'Uint8Array', computedHash: { algorithm: 'SHA2_256', sources: ['Title'] } },
				}))
				.entity('Documents', e => e.hasComputedHash('ContentHash', 'SHA2_512', ['Content']))
				.build();

			const property = model.findEntity('Documents')?.getPropertyOrFail('ContentHash');
			expect(property && decodeAnnotations(property.annotations, { table: 'Documents', column: property.name }))
				.to.deep.equal({ targetColumn: 'ContentHash', algorithm: 'SHA2_512', sourceColumns: ['Content'] });
		});
	});

	describe('applyComputedHash / removeComputedHash', () => {
		it('should keep unrelated annotations', () => {
			const entity = new EntityType('Documents');
			const property = entity.addProperty('ContentHash', 'Buffer');
			property.annotations = { 'Other:Key': 'kept' };

			const descriptor = applyComputedHash(entity, property, { algorithm: HashAlgorithm.SHA2_256, sources: [' Title '] });
			expect(descriptor.sourceColumns).to.deep.equal(['Title']);
			expect(property.annotations['Other:Key']).to.equal('kept');

			expect(removeComputedHash(entity, property)).to.be.true;
			expect(property.annotations).to.deep.equal({ 'Other:Key': 'kept' });
		});

		it('should report removing from a plain property', () => {
			const entity = new EntityType('Documents');
			expect(removeComputedHash(entity, entity.addProperty('Title', 'string'))).to.be.false;
		});
	});
});
