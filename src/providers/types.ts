/**
 * An object as seen in a folder listing.
 * `tag` is opaque: equal tags mean the content has not changed.
 */
export interface RemoteObject {
  key: string;
  tag: string;
}

export interface GetObjectOptions {
  maxBytes?: number;
}

/**
 * ObjectStore is the network capability the cache consumes.
 *
 * The store is a transport layer only. Staleness decisions, size limits and
 * local persistence are handled by the CacheSynchronizer, not the store.
 * Implementations map transport failures to NetworkError.
 */
export interface ObjectStore {
  /**
   * List the objects directly under a folder.
   *
   * @returns one entry per object; an absent folder yields an empty list.
   */
  listObjects(folder: string): Promise<RemoteObject[]>;

  /**
   * Fetch the revision tag of a single object.
   *
   * @returns the tag, or null when the object does not exist or carries none.
   */
  headObject(key: string): Promise<string | null>;

  /**
   * Open the content of an object as a stream of chunks.
   * Consumers may stop iterating early; the store must release the
   * underlying connection when they do.
   *
   * A store that learns the object size before transferring the content
   * should fail with ContentTooLargeError when it exceeds `maxBytes`.
   */
  getObject(key: string, options?: GetObjectOptions): Promise<AsyncIterable<Uint8Array>>;

  /** Short human readable description, e.g. "github:owner/repo". */
  describe?(): string;
}
