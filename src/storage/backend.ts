/**
 * Abstract object store interface.
 */
export interface StorageBackend {
  /** Upload the local file at `filePath` to `bucket`/`key`, replacing any existing object. */
  upload(bucket: string, key: string, filePath: string): Promise<void>;

  /** Read the object at `bucket`/`key`. */
  read(bucket: string, key: string): Promise<Uint8Array>;

  /** Check if the object exists. */
  exists(bucket: string, key: string): Promise<boolean>;
}
