import {Command, CommanderError} from 'commander';
import {AuthService} from './auth';
import {DEFAULT_CONFIG_PATH, Env, loadConfig} from './config';
import {DocumentService, prepareUpload} from './documentService';
import {IngestorError, describeError} from './errors';
import {Logger, createLogger} from './logger';
import {findMetadataShapeIssues, loadMetadata} from './metadata';
import {FetchLike, UploadRequest, UploadResult} from './typing';

export const PROGRAM_NAME = 'alphasense-ingest';
export const VERSION = '1.0.0';

export interface IngestorOptions extends UploadRequest {
    configPath: string;
    verbose: boolean;
}

export interface IngestorDeps {
    fetch?: FetchLike;
    env?: Env;
    logger?: Logger;
}

interface CliOptions {
    config: string;
    metadata?: string;
    attachment: string[];
    verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export function buildProgram(): Command {
    return new Command()
        .name(PROGRAM_NAME)
        .description('Upload a document to the AlphaSense ingestion API')
        .version(VERSION)
        .argument('<document>', 'path to the document to upload')
        .option('-c, --config <path>', 'path to the TOML configuration file', DEFAULT_CONFIG_PATH)
        .option('-m, --metadata <json-or-path>', 'metadata as inline JSON or a path to a JSON file')
        .option('-a, --attachment <path>', 'attachment file, repeat for several', collect, [])
        .option('-v, --verbose', 'enable verbose logging')
        .exitOverride();
}

export function parseArguments(argv: string[], program: Command = buildProgram()): IngestorOptions {
    program.parse(argv);
    const opts = program.opts<CliOptions>();
    const [documentPath] = program.args;
    return {
        documentPath,
        attachmentPaths: opts.attachment,
        metadata: opts.metadata,
        configPath: opts.config,
        verbose: opts.verbose ?? false
    };
}

/**
 * One ingestion run: config, local files and metadata first, then a single
 * token request and a single upload request.
 */
export async function runIngestor(options: IngestorOptions, deps: IngestorDeps = {}): Promise<UploadResult> {
    const logger = deps.logger ?? createLogger({verbose: options.verbose});
    const fetchImpl = deps.fetch ?? fetch;

    logger.info('Starting AlphaSense ingestor...');
    logger.debug(`Verbose mode on, config: ${options.configPath}`);

    const config = await loadConfig(options.configPath, deps.env ?? process.env);
    logger.debug(`Auth endpoint: ${config.authUrl}, ingestion endpoint: ${config.ingestionBaseUrl}`);

    const upload = await prepareUpload(options.documentPath, options.attachmentPaths);

    logger.info('Loading metadata...');
    const metadata = await loadMetadata(options.metadata);
    for (const issue of findMetadataShapeIssues(metadata)) {
        logger.warn(`Metadata field ${issue}`);
    }
    logger.debug('Metadata:', JSON.stringify(metadata));

    logger.info('Authenticating...');
    const token = await new AuthService(config, logger, fetchImpl).authenticate();

    logger.info(`Uploading ${upload.document.fileName} with ${upload.attachments.length} attachment(s)...`);
    const result = await new DocumentService(config, logger, fetchImpl).uploadDocument(token, upload, metadata);

    logger.info(result.documentId
        ? `✅ Upload complete, document id: ${result.documentId}`
        : `✅ Upload complete (HTTP ${result.status})`);
    return result;
}

// Returns the process exit code instead of exiting.
export async function main(argv: string[] = process.argv, deps: IngestorDeps = {}): Promise<number> {
    let options: IngestorOptions;
    try {
        options = parseArguments(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }

    const logger = deps.logger ?? createLogger({verbose: options.verbose});
    try {
        const result = await runIngestor(options, {...deps, logger});
        if (result.documentId) {
            console.log(result.documentId);
        }
        return 0;
    } catch (error) {
        if (error instanceof IngestorError) {
            logger.error(`${error.name}: ${error.message}`);
            if (error.cause !== undefined) {
                logger.debug('Caused by:', error.cause);
            }
            return error.exitCode;
        }
        logger.error(`Unexpected failure: ${describeError(error)}`);
        logger.debug('Stack:', error);
        return 1;
    }
}
