import { expect } from 'chai';
import { HashAlgorithm, listAlgorithms, widthOf } from '../src/algorithm/registry.js';
import { IncompatibleStorageTypeError } from '../src/common/errors.js';
import {
	assertCompatibleStorageType,
	quoteIdentifier,
	renderComputedColumn,
	renderExpression,
	renderHashExpression,
	renderStorageType,
} from '../src/emit/sql-renderer.js';
import { createDescriptor } from '../src/schema/descriptor.js';

const TITLE_CONTENT_SHA256 =
	"HASHBYTES('SHA2_256', ISNULL(CONVERT(NVARCHAR(MAX), [Title]), N'') + '|' + ISNULL(CONVERT(NVARCHAR(MAX), [Content]), N''))";

describe('SQL renderer', () => {
	describe('quoteIdentifier', () => {
		it('should bracket names', () => {
			expect(quoteIdentifier('Title')).to.equal('[Title]');
			expect(quoteIdentifier('Last Modified')).to.equal('[Last Modified]');
		});

		it('should double closing brackets', () => {
			expect(quoteIdentifier('odd]name')).to.equal('[odd]]name]');
		});
	});

	describe('renderStorageType', () => {
		it('should agree with the registry width for every algorithm', () => {
			for (const algorithm of listAlgorithms()) {
				const type = renderStorageType(createDescriptor('H', algorithm, ['A']));
				expect(type).to.deep.equal({ kind: 'binary', width: widthOf(algorithm), sql: `BINARY(${widthOf(algorithm)})` });
			}
		});
	});

	describe('renderExpression', () => {
		const d = createDescriptor('ContentHash', HashAlgorithm.SHA2_256, ['Title', 'Content']);

		it('should render the hash of the NULL-safe concatenation', () => {
			expect(renderHashExpression(d)).to.equal(TITLE_CONTENT_SHA256);
		});

		it('should mark the expression persisted', () => {
			expect(renderExpression(d)).to.equal(`${TITLE_CONTENT_SHA256} PERSISTED`);
		});

		it('should render a single source without a delimiter', () => {
			const single = createDescriptor('H', HashAlgorithm.MD5, ['Body']);
			expect(renderExpression(single)).to.equal("HASHBYTES('MD5', ISNULL(CONVERT(NVARCHAR(MAX), [Body]), N'')) PERSISTED");
		});

		it('should be deterministic', () => {
			const again = createDescriptor('ContentHash', HashAlgorithm.SHA2_256, ['Title', 'Content']);
			expect(renderExpression(again)).to.equal(renderExpression(d));
		});

		it('should be order-sensitive', () => {
			const swapped = createDescriptor('ContentHash', HashAlgorithm.SHA2_256, ['Content', 'Title']);
			expect(renderExpression(swapped)).to.not.equal(renderExpression(d));
			expect(renderExpression(swapped).indexOf('[Content]')).to.be.lessThan(renderExpression(swapped).indexOf('[Title]'));
		});

		it('should quote awkward source names', () => {
			const odd = createDescriptor('H', HashAlgorithm.SHA1, ['a]b']);
			expect(renderHashExpression(odd)).to.equal("HASHBYTES('SHA1', ISNULL(CONVERT(NVARCHAR(MAX), [a]]b]), N''))");
		});
	});

	describe('renderComputedColumn', () => {
		it('should derive type and expression together', () => {
			const d = createDescriptor('ContentHash', HashAlgorithm.SHA2_256, ['Title', 'Content']);
			expect(renderComputedColumn(d)).to.deep.equal({
				columnType: 'BINARY(32)',
				computedColumnSql: `${TITLE_CONTENT_SHA256} PERSISTED`,
				isStored: true,
			});
		});
	});

	describe('assertCompatibleStorageType', () => {
		const d = createDescriptor('ContentHash', HashAlgorithm.SHA2_512, ['Title']);

		it('should accept an unset type', () => {
			expect(() => assertCompatibleStorageType(d, null, 'Documents.ContentHash')).to.not.throw();
			expect(() => assertCompatibleStorageType(d, undefined, 'Documents.ContentHash')).to.not.throw();
		});

		it('should accept the matching binary width in any spelling', () => {
			expect(() => assertCompatibleStorageType(d, 'BINARY(64)', 'Documents.ContentHash')).to.not.throw();
			expect(() => assertCompatibleStorageType(d, ' binary ( 64 ) ', 'Documents.ContentHash')).to.not.throw();
		});

		it('should reject a variable-width type naming the expected width', () => {
			expect(() => assertCompatibleStorageType(d, 'VARBINARY(MAX)', 'Documents.ContentHash')).to.throw(
				IncompatibleStorageTypeError,
				"Computed hash column Documents.ContentHash: storage type 'VARBINARY(MAX)' is incompatible; expected BINARY(64) (64 bytes)"
			);
		});

		it('should reject a binary type of the wrong width', () => {
			expect(() => assertCompatibleStorageType(d, 'BINARY(32)', 'Documents.ContentHash'))
				.to.throw(IncompatibleStorageTypeError, 'expected BINARY(64)');
		});
	});
});
