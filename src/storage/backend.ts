/**
 * Where file-based sources read their inputs from.
 */

export interface StorageBackend {
  /**
   * Seeds an input file, creating parent folders. Pipelines only read;
   * this is how fixtures and tests lay out a raw data directory.
   */
  write(key: string, data: Uint8Array | string): Promise<void>;

  read(key: string): Promise<Uint8Array>;

  /**
   * Every file key under `prefix`, sorted. A prefix naming a single file
   * lists just that file; a missing prefix lists nothing.
   */
  list(prefix: string): Promise<string[]>;

  exists(key: string): Promise<boolean>;
}
