export interface ObjectSummary {
  key: string;
  size: number;
  lastModified: Date;
}

/**
 * Object store capability consumed by the catalog and the orchestrator.
 * Implementations throw StorageError: `notFound` for missing keys,
 * `transient` for retryable read failures, `unreachable` when listing fails.
 */
export interface ObjectStore {
  listObjects(prefix: string): Promise<ObjectSummary[]>;
  getObject(key: string): Promise<Uint8Array>;
}
