export type ArtifactStorageKind = 's3' | 'local';

/**
 * Object storage for artifact bundles. Keys look like
 * `artifacts/ab/ab12...ef.json` on every backend.
 */
export interface ArtifactStorage {
  readonly kind: ArtifactStorageKind;

  /**
   * Verify the backend can be used (bucket exists, directory writable)
   */
  ensureAvailable(): Promise<void>;

  /**
   * Throws FileNotFoundError when the key is absent
   */
  getObjectAsBuffer(key: string): Promise<Buffer>;

  putObject(key: string, body: Buffer, contentType: string): Promise<void>;

  /**
   * Returns false when there was nothing to delete
   */
  deleteObject(key: string): Promise<boolean>;

  objectExists(key: string): Promise<boolean>;
}

export const ARTIFACT_STORAGE = 'ARTIFACT_STORAGE';
