import * as fs from 'node:fs/promises';
import {MetadataError, describeError} from './errors';
import {DocumentMetadata, DocumentMetadataSchema, MetadataObjectSchema} from './schemas/document-metadata.schema';

function parseMetadataJson(text: string, origin: string): DocumentMetadata {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new MetadataError(`Invalid JSON metadata in ${origin}: ${describeError(error)}`, {cause: error});
    }

    const result = MetadataObjectSchema.safeParse(value);
    if (!result.success) {
        throw new MetadataError(`Metadata in ${origin} must be a JSON object`);
    }
    return result.data;
}

/**
 * Resolves the `--metadata` argument. A value starting with `{` is inline
 * JSON; anything else is read as a path to a JSON file. No argument yields
 * an empty object.
 */
export async function loadMetadata(source?: string): Promise<DocumentMetadata> {
    const trimmed = source?.trim();
    if (!trimmed) {
        return {};
    }

    if (trimmed.startsWith('{')) {
        return parseMetadataJson(trimmed, 'inline argument');
    }

    let text: string;
    try {
        text = await fs.readFile(trimmed, {encoding: 'utf-8'});
    } catch (error) {
        throw new MetadataError(`Cannot read metadata file ${trimmed}: ${describeError(error)}`, {cause: error});
    }
    return parseMetadataJson(text, trimmed);
}

// Advisory: the object is sent as-is whatever this returns.
export function findMetadataShapeIssues(metadata: DocumentMetadata): string[] {
    const result = DocumentMetadataSchema.safeParse(metadata);
    if (result.success) {
        return [];
    }
    return result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
