// Public API of the ingestor, for use as a library
export { AuthService, isTokenExpired } from './lib/auth';
export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH, IngestorConfigSchema } from './lib/config';
export { DocumentService, prepareUpload, uploadUrl } from './lib/documentService';
export { ConfigurationError, AuthenticationError, MetadataError, UploadError, IngestorError } from './lib/errors';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
export { loadMetadata, findMetadataShapeIssues } from './lib/metadata';
export { DocumentMetadataSchema } from './lib/schemas/document-metadata.schema';
export type { DocumentMetadata, DocAuthor } from './lib/schemas/document-metadata.schema';
export { main, runIngestor, buildProgram } from './lib/cli';
export type { IngestorOptions, IngestorDeps } from './lib/cli';
export type * from './lib/typing';
