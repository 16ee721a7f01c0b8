import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as mime from 'mime-types';
import {z} from 'zod';
import {UploadError, describeError, errorCode} from './errors';
import {Logger} from './logger';
import {DocumentMetadata} from './schemas/document-metadata.schema';
import {AccessToken, FetchLike, IngestorConfig, PreparedUpload, UploadFile, UploadResult} from './typing';

export const UPLOAD_PATH = '/upload-document';
const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

const identifier = z.union([z.string().min(1), z.number()]).transform(String).optional().catch(undefined);

const UploadResponseSchema = z.object({
    documentId: identifier,
    id: identifier
}).passthrough();

async function readUploadFile(filePath: string, role: string): Promise<UploadFile> {
    try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
            throw new UploadError(`${role} is not a regular file: ${filePath}`);
        }
        const content = await fs.readFile(filePath);
        const contentType = mime.lookup(filePath) || FALLBACK_CONTENT_TYPE;
        return {
            fileName: path.basename(filePath),
            contentType,
            blob: new Blob([content], {type: contentType})
        };
    } catch (error) {
        if (error instanceof UploadError) throw error;
        const message = errorCode(error) === 'ENOENT'
            ? `${role} file not found: ${filePath}`
            : `Cannot read ${role.toLowerCase()} file ${filePath}: ${describeError(error)}`;
        throw new UploadError(message, {cause: error});
    }
}

/**
 * Reads the document and every attachment up front so a bad path fails the
 * run before any request is sent.
 */
export async function prepareUpload(documentPath: string, attachmentPaths: string[] = []): Promise<PreparedUpload> {
    const document = await readUploadFile(documentPath, 'Document');
    const attachments: UploadFile[] = [];
    for (const attachmentPath of attachmentPaths) {
        attachments.push(await readUploadFile(attachmentPath, 'Attachment'));
    }
    return {document, attachments};
}

export function uploadUrl(ingestionBaseUrl: string): string {
    return ingestionBaseUrl.replace(/\/+$/, '') + UPLOAD_PATH;
}

export class DocumentService {
    constructor(
        private readonly config: IngestorConfig,
        private readonly logger: Logger,
        private readonly fetchImpl: FetchLike = fetch
    ) {
    }

    buildForm(upload: PreparedUpload, metadata: DocumentMetadata): FormData {
        const form = new FormData();
        form.append('file', upload.document.blob, upload.document.fileName);
        for (const attachment of upload.attachments) {
            form.append('attachments', attachment.blob, attachment.fileName);
        }
        form.append('metadata', JSON.stringify(metadata));
        return form;
    }

    async uploadDocument(token: AccessToken, upload: PreparedUpload, metadata: DocumentMetadata): Promise<UploadResult> {
        const url = uploadUrl(this.config.ingestionBaseUrl);
        const startTime = Date.now();

        this.logger.debug(`Uploading ${upload.document.fileName} (${upload.document.contentType}, ${upload.document.blob.size} bytes) to ${url}`);
        for (const attachment of upload.attachments) {
            this.logger.debug(`  attachment ${attachment.fileName} (${attachment.contentType}, ${attachment.blob.size} bytes)`);
        }

        let response: Response;
        let body: string;
        try {
            response = await this.fetchImpl(url, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${token.accessToken}`,
                    'clientId': this.config.uploadClientId
                },
                body: this.buildForm(upload, metadata)
            });
            body = await response.text();
        } catch (error) {
            throw new UploadError(`Upload request to ${url} failed: ${describeError(error)}`, {cause: error});
        }

        this.logger.debug(`Ingestion API answered HTTP ${response.status} in ${Date.now() - startTime}ms`);

        if (!response.ok) {
            throw new UploadError(`Upload rejected with HTTP ${response.status}: ${body}`, {
                status: response.status,
                body
            });
        }

        // Any 2xx means the document was accepted; the identifier is best effort.
        let payload: unknown = body;
        try {
            payload = JSON.parse(body);
        } catch (error) {
            this.logger.debug(`Upload response is not JSON: ${describeError(error)}`);
        }

        const parsed = UploadResponseSchema.safeParse(payload);
        const documentId = parsed.success ? parsed.data.documentId ?? parsed.data.id : undefined;
        if (!documentId) {
            this.logger.warn(`Upload accepted with HTTP ${response.status} but the response carries no document identifier`);
        }

        return {documentId, status: response.status, response: payload};
    }
}
