/**
 * Library exports for programmatic usage
 */
export { ApiDocService } from './doc-service.js';
export type { EndpointInfo, EndpointInfoOptions, GenerateDocumentationOptions, VerifyAllOptions } from './doc-service.js';
export { FileSpecLoader, readMarkdownFile } from './spec-loader.js';
export type { SpecLoader } from './spec-loader.js';
export { parseEndpointsFilter, loadEndpointsFilter } from './endpoints-filter-loader.js';
export { createSpec, createEndpoint, EndpointFilter } from './spec-model.js';
export { SchemaResolver } from './ref-resolver.js';
export { SchemaCollector } from './schema-collector.js';
export { EndpointFinder } from './endpoint-finder.js';
export { formatType, formatExample, formatDescription, extractExamples, safeReplace } from './formatters.js';
export { DocumentGenerator } from './document-generator.js';
export type { GenerateOptions } from './document-generator.js';
export { MarkdownRenderer } from './markdown-renderer.js';
export type { DocumentRenderer } from './markdown-renderer.js';
export { DocumentationVerifier } from './verifier.js';
export { formatVerificationResult, formatVerificationSummary } from './report-formatter.js';
export { calculateStats, formatStats, formatEndpointList } from './stats.js';
export { buildErrorsReport, extractErrorCodes, formatErrorsReport } from './errors-report.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
export type * from './types/openapi.js';
export type * from './types/document.js';
export type * from './types/verification.js';
