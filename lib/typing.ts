/**
 * Essential types for AlphaSense document ingestion
 */

export interface IngestorConfig {
    username: string;
    password: string;
    apiKey: string;
    clientId: string;
    clientSecret: string;
    authUrl: string;
    ingestionBaseUrl: string;
    uploadClientId: string;
}

export interface AccessToken {
    accessToken: string;
    tokenType: string;
    expiresIn?: number;
    expiresAt?: Date;
    refreshToken?: string;
    scope?: string;
}

export interface UploadRequest {
    documentPath: string;
    attachmentPaths: string[];
    metadata?: string;
}

export interface UploadFile {
    fileName: string;
    contentType: string;
    blob: Blob;
}

export interface PreparedUpload {
    document: UploadFile;
    attachments: UploadFile[];
}

export interface UploadResult {
    documentId?: string;
    status: number;
    response: unknown;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
