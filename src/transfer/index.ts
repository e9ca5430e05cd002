/**
 * Collection Transfer Module
 *
 * Share a built collection through a container registry.
 */

export {
  ARCHIVE_FORMAT,
  ARCHIVE_VERSION,
  ARCHIVE_FILE_NAME,
  CollectionArchiveSchema,
  encodeArchive,
  decodeArchive,
  type CollectionArchive,
  type ArchivePoint,
} from './archive.js';

export {
  IMAGE_ARCHIVE_DIR,
  DockerImageRegistry,
  validateImageRef,
  buildDockerfile,
  type ArtifactRegistry,
  type ArchiveLabels,
  type DockerImageRegistryOptions,
} from './registry.js';

export {
  pushCollection,
  pullCollection,
  type TransferDependencies,
  type TransferOptions,
  type TransferResult,
} from './transfer.js';
