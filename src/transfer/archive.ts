/**
 * Collection Archive
 *
 * Portable snapshot of a collection: gzipped JSON holding every point with
 * its vector and payload, plus the dimension and embedding model needed to
 * recreate the collection elsewhere.
 */

import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';
import { TransferError } from '../errors/index.js';
import { PointPayloadSchema } from '../store/types.js';

export const ARCHIVE_FORMAT = 'know-collection';
export const ARCHIVE_VERSION = 1;
export const ARCHIVE_FILE_NAME = 'collection.json.gz';

// ============================================================================
// SCHEMA
// ============================================================================

const ArchivePointSchema = z.object({
  id: z.string().uuid(),
  vector: z.array(z.number()),
  payload: PointPayloadSchema,
});

/** Only the envelope, so a foreign file is reported as such rather than as a list of issues */
const ArchiveHeaderSchema = z.object({
  format: z.string(),
  version: z.number(),
});

export const CollectionArchiveSchema = z
  .object({
    format: z.literal(ARCHIVE_FORMAT),
    version: z.literal(ARCHIVE_VERSION),
    collection: z.string().min(1),
    dimension: z.number().int().positive(),
    distance: z.literal('Cosine'),
    embedding_model: z.string().min(1),
    exported_at: z.string(),
    points: z.array(ArchivePointSchema),
  })
  .superRefine((archive, ctx) => {
    archive.points.forEach((point, index) => {
      if (point.vector.length !== archive.dimension) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['points', index, 'vector'],
          message: `expected ${archive.dimension} values, got ${point.vector.length}`,
        });
      }
    });
  });

export type CollectionArchive = z.infer<typeof CollectionArchiveSchema>;
export type ArchivePoint = z.infer<typeof ArchivePointSchema>;

// ============================================================================
// ENCODE / DECODE
// ============================================================================

export function encodeArchive(archive: CollectionArchive): Buffer {
  return gzipSync(Buffer.from(JSON.stringify(archive), 'utf-8'));
}

/**
 * Unpack and validate an archive.
 *
 * @throws TransferError for anything that is not a valid version 1 archive
 */
export function decodeArchive(data: Buffer): CollectionArchive {
  let json: string;
  try {
    json = gunzipSync(data).toString('utf-8');
  } catch (error) {
    throw new TransferError('Archive is not gzip data', 'The image does not contain a know collection', {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new TransferError('Archive is not valid JSON', 'The image does not contain a know collection', {
      cause: error,
    });
  }

  const header = ArchiveHeaderSchema.safeParse(raw);
  if (!header.success || header.data.format !== ARCHIVE_FORMAT) {
    throw new TransferError(
      'Unsupported archive format',
      'The image does not contain a know collection'
    );
  }
  if (header.data.version !== ARCHIVE_VERSION) {
    throw new TransferError(
      `Unsupported archive version ${header.data.version}`,
      `This build reads version ${ARCHIVE_VERSION}; upgrade know to pull this image`
    );
  }

  const parsed = CollectionArchiveSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TransferError(`Invalid archive: ${issues}`, 'The image was not produced by know push');
  }
  return parsed.data;
}
