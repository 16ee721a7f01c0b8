import { z } from 'zod';

// Author entry; `operation` tells the ingestion API how to merge the value
export const DocAuthorSchema = z.object({
  authorName: z.string(),
  operation: z.string().optional()
}).passthrough();

// Fields the ingestion API documents. Anything else is forwarded untouched.
export const DocumentMetadataSchema = z.object({
  title: z.string().optional(),
  companies: z.array(z.unknown()).optional(),
  docAuthors: z.array(DocAuthorSchema).optional(),
  sourceType: z.string().optional(),
  customTags: z.array(z.unknown()).optional()
}).passthrough();

// Any JSON object is accepted as metadata
export const MetadataObjectSchema = z.record(z.string(), z.unknown());

// Export TypeScript types
export type DocAuthor = z.infer<typeof DocAuthorSchema>;
export type DocumentMetadata = z.infer<typeof MetadataObjectSchema>;
