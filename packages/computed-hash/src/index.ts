/**
 * computed-hash
 *
 * Declares binary columns whose value is a hash of sibling columns, computed and
 * persisted by SQL Server, and keeps the generated column definition in step with
 * the declaration across migrations.
 */

// Errors and status codes
export { StatusCode, qualifyColumn } from './common/types.js';
export {
	ComputedHashError,
	UnknownAlgorithmError,
	EmptySourceListError,
	DuplicateSourceError,
	InvalidSourceNameError,
	InvalidTargetTypeError,
	IncompatibleStorageTypeError,
	MalformedAnnotationStateError,
	InsecureAlgorithmError,
} from './common/errors.js';
export type { ComputedHashErrorKind, ComputedHashErrorOptions } from './common/errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Configuration
export { DEFAULT_CONFIG, INSECURE_ALGORITHM_POLICIES, loadConfig, loadEnvConfig, resolveConfig } from './config/index.js';
export type { EngineConfig, EngineOptions, HashWarning, HashWarningListener, InsecureAlgorithmPolicy } from './config/index.js';

// Algorithm registry
export {
	HashAlgorithm,
	listAlgorithms,
	isHashAlgorithm,
	widthOf,
	isSecure,
	getAlgorithmInfo,
	parseAlgorithm,
	recommendedStorageType,
} from './algorithm/registry.js';
export type { AlgorithmInfo } from './algorithm/registry.js';

// Descriptors
export { createDescriptor, descriptorsEqual, storageWidthOf, isSecureDescriptor } from './schema/descriptor.js';
export type { ComputedHashDescriptor } from './schema/descriptor.js';
export { validateDescriptor, isByteSequenceType, SOURCE_SEPARATOR } from './schema/validator.js';
export type { ValidationContext } from './schema/validator.js';
export { normalizeDeclaration } from './schema/normalizer.js';
export type { RawHashDeclaration } from './schema/normalizer.js';
export {
	AnnotationKeys,
	encodeDescriptor,
	decodeAnnotations,
	applyAnnotations,
	hasComputedHashAnnotations,
} from './schema/annotations.js';
export type { Annotations, AnnotationValue, AnnotationContext } from './schema/annotations.js';

// SQL rendering
export {
	SOURCE_DELIMITER,
	quoteIdentifier,
	renderStorageType,
	renderHashExpression,
	renderExpression,
	renderComputedColumn,
	assertCompatibleStorageType,
} from './emit/sql-renderer.js';
export type { TypeSpec, RenderedComputedColumn } from './emit/sql-renderer.js';

// Migrations
export { isColumnOperation, columnStatesEqual } from './migration/operations.js';
export type {
	ColumnState,
	AddColumnOperation,
	AlterColumnOperation,
	DropColumnOperation,
	ColumnOperation,
	CreateTableOperation,
	DropTableOperation,
	SchemaOperation,
} from './migration/operations.js';
export { resolveTransition, resolveOperation, resolveOperations } from './migration/resolver.js';
export type { LifecycleTransition, TransitionKind, ResolvedOperation } from './migration/resolver.js';
export { generateMigrationSql, columnTypeOf } from './migration/sql-generator.js';
export { planMigration } from './migration/plan.js';
export type { MigrationPlan } from './migration/plan.js';

// Model front ends
export { EntityModel, EntityType } from './model/model.js';
export type { PropertyModel, PropertyOptions } from './model/model.js';
export { ModelBuilder, EntityTypeBuilder, HASH_PROPERTY_TYPE } from './model/builder.js';
export { defineEntity } from './model/define.js';
export type { ColumnDeclaration } from './model/define.js';
export { applyComputedHash, removeComputedHash } from './model/hash-declaration.js';
export type { ComputedHashDeclaration } from './model/hash-declaration.js';
export { snapshotModel, inheritStoreTypes, serializeSnapshot, parseSnapshot } from './model/snapshot.js';
export type { ModelSnapshot, TableSnapshot, ColumnSnapshot } from './model/snapshot.js';
export { diffSnapshots } from './model/model-differ.js';
