/**
 * @file Public surface of the VEX statement matching library.
 */

export {
	createMatchService,
	type MatchRequest,
	type MatchService,
	type MatchServiceDependencies,
	type MatchServiceError,
	type StatementMatch,
} from "./app/matchService";
export { componentMatches, productMatches } from "./core/componentMatcher";
export {
	findLatest,
	findMatches,
	findTimedMatches,
	type ResolveOptions,
} from "./core/documentResolver";
export {
	generateImagePurlVariants,
	generateReferenceIdentifiers,
	identifiersBundleToStrings,
	type GenerateReferenceIdentifiersError,
} from "./core/imageIdentifiers";
export { packageUrlMatches, purlMatches } from "./core/purlMatcher";
export {
	statementMatches,
	statementMatchesQuery,
	type StatementQuery,
} from "./core/statementMatcher";
export {
	DEFAULT_FALLBACK_TIME,
	effectiveTime,
	sortStatements,
} from "./core/statementOrder";
export {
	describeStatementValidationError,
	validateDocument,
	validateStatement,
	type DocumentValidationIssue,
	type StatementValidationError,
} from "./core/statementValidation";
export { vulnerabilityMatches } from "./core/vulnerabilityMatcher";
export { parseImageReference } from "./foundation/imageReference";
export {
	loadOpenVexDocument,
	parseOpenVexJson,
	type ParseOpenVexJsonError,
} from "./foundation/openVexJson";
export {
	formatPackageUrl,
	parsePackageUrl,
	type PackageUrl,
} from "./foundation/packageUrl";
export {
	createStubRegistryDigestPort,
	type RegistryDigestPort,
} from "./ports/registryDigestPort";
export * from "./types/image";
export type { Result } from "./types/result";
export * from "./types/vex";
