import { createHash } from 'node:crypto';
import { v5 as uuidv5 } from 'uuid';

/** Namespace for point ids; changing it orphans every stored point */
export const POINT_ID_NAMESPACE = '3b241101-e2bb-5255-8caf-4136c566a962';

/**
 * Deterministic point id for chunk `chunkIndex` of `source`.
 * Re-ingesting a file overwrites its points in place.
 */
export function pointId(source: string, chunkIndex: number): string {
  return uuidv5(`${source}#${chunkIndex}`, POINT_ID_NAMESPACE);
}

/** SHA-256 of the raw file bytes, hex encoded */
export function contentHash(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
