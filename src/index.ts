export {
  CacheSynchronizer,
  mapWithConcurrency,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_OBJECT_BYTES,
  type CacheEntry,
  type CorruptMetadataPolicy,
  type Decoder,
  type StalenessStrategy,
  type SyncLogger,
  type SynchronizerOptions,
} from "./core/synchronizer.js";
export {
  buildLookup,
  defineGroup,
  objectKey,
  resourceId,
  resourcesOf,
  METADATA_FILE_NAME,
  type ResourceGroup,
  type ResourceId,
} from "./core/registry.js";
export { MetadataStore, type MetadataRecord } from "./core/metadata.js";
export {
  ContentTooLargeError,
  DecodeError,
  DuplicateResourceNameError,
  InvalidResourceNameError,
  LocalWriteError,
  MetadataCodecError,
  MissingRemoteResourceError,
  NetworkError,
  NotCachedError,
  SyncError,
  SyncPassError,
  isRetryable,
  withRetry,
  type SyncReport,
} from "./core/errors.js";
export { CacheManager, createObjectStore } from "./core/manager.js";
export { loadManifest, ManifestError, type Manifest } from "./core/manifest.js";
export type { GetObjectOptions, ObjectStore, RemoteObject } from "./providers/types.js";
export { MemoryObjectStore } from "./providers/memory.js";
export { GitHubObjectStore, parseGitHubRemote } from "./providers/github.js";
export { S3ObjectStore, parseS3Remote, type S3StoreConfig } from "./providers/s3.js";
