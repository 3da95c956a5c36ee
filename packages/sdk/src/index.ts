/**
 * @canonizer/sdk — data model, error taxonomy and plugin contracts.
 */

export type {
	GoldenTestSpec,
	IgluUri,
	LogEntry,
	LogPhase,
	RegistryIndex,
	SchemaLocation,
	SchemaSummary,
	SchemaUnit,
	SchemaVer,
	SemVer,
	TransformCompat,
	TransformLocation,
	TransformMetadata,
	TransformProvenance,
	TransformStatus,
	TransformSummary,
	TransformUnit,
	UnitKind,
} from './types.js';
export { INDEX_FORMAT_VERSION, TRANSFORM_ENGINE, TRANSFORM_STATUSES } from './types.js';

export {
	ChecksumError,
	EvaluationError,
	FixtureError,
	GoldenMismatchError,
	MetadataError,
	RegistryError,
	SchemaError,
	StructureError,
	describeValue,
} from './errors.js';
export type { RegistryErrorKind } from './errors.js';

export type { EvaluationOutcome, Evaluator, EvaluatorRegistration } from './evaluator.js';
export type { Logger, LoggerRegistration } from './logger.js';

export {
	compareSchemaVer,
	compareSemVer,
	formatIgluUri,
	formatSchemaVer,
	isIgluRange,
	parseIgluUri,
	parseSchemaVer,
	parseSemVer,
} from './versions.js';

export { FakeEvaluator, MockLogger, createTestMetadata } from './testing.js';
export type { FakeHandler } from './testing.js';
