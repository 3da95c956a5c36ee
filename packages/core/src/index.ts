/**
 * @canonizer/core — registry validation and index generation.
 */

export { computeSha256, verifyChecksum } from './checksum.js';
export { childPath, findFirstDifference } from './diff.js';
export type { Difference } from './diff.js';
export { runGoldenTest, runGoldenTests } from './golden.js';
export type { GoldenRunOptions, GoldenTestResult } from './golden.js';
export {
	DEFAULT_INDEX_FILE,
	buildIndex,
	serializeIndex,
	summarizeSchema,
	summarizeTransform,
	writeIndex,
} from './index-builder.js';
export type { WriteIndexResult } from './index-builder.js';
export { LoggerManager } from './logger.js';
export type { LoggerErrorHandler } from './logger.js';
export { loadMetadata, parseMetadataDocument, validateMetadata } from './metadata.js';
export type { ExpectedIdentity, MetadataResult } from './metadata.js';
export { regenerateIndex } from './registry.js';
export type { RegenerateIndexOptions, RegenerateIndexResult } from './registry.js';
export {
	DEFAULT_REQUIRED_DIRS,
	checkStructure,
	resolveSchemas,
	resolveTransforms,
} from './resolver.js';
export type { LayoutProblem, SchemaEnumeration } from './resolver.js';
export {
	DEFAULT_ACCEPTED_DRAFTS,
	SchemaDocumentValidator,
	isKnownDraft,
	normalizeDraft,
} from './schema.js';
export type { SchemaValidationResult } from './schema.js';
export { RegistryValidator, VALIDATION_SCOPES } from './validator.js';
export type {
	RegistryValidatorOptions,
	UnitReport,
	ValidationReport,
	ValidationScope,
} from './validator.js';
