/**
 * In-memory ArtifactRegistry: images are a map from reference to archive bytes.
 */

import { TransferError } from '../errors/index.js';
import type { ArchiveLabels, ArtifactRegistry } from '../transfer/registry.js';

export class InMemoryRegistry implements ArtifactRegistry {
  readonly images = new Map<string, { archive: Buffer; labels: ArchiveLabels }>();

  async push(archive: Buffer, imageRef: string, labels: ArchiveLabels): Promise<void> {
    this.images.set(imageRef, { archive: Buffer.from(archive), labels });
  }

  async pull(imageRef: string): Promise<Buffer> {
    const image = this.images.get(imageRef);
    if (!image) {
      throw new TransferError(`docker pull failed: manifest for ${imageRef} not found`);
    }
    return image.archive;
  }
}
