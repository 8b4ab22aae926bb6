/**
 * Narrow storage interface used by the handlers and the analysis pipeline.
 *
 * The production implementation is S3ObjectStore; tests use an in-memory fake.
 */

import type { ObjectLocation } from './paths.ts';

/** Lifetime of presigned upload URLs: 1 hour. */
export const UPLOAD_URL_TTL_SECONDS = 3600;

export interface ObjectStore {
  /** Bucket that uploads, job output and result documents live in. */
  readonly bucket: string;

  /**
   * Issues a time-limited PUT URL for exactly this key and content type.
   *
   * @throws StorageError when no credential can be issued
   */
  createUploadUrl(key: string, contentType: string, expiresInSeconds: number): Promise<string>;

  /**
   * Reads and parses a JSON document.
   *
   * @returns The parsed document, or null when no object exists at the location
   * @throws StorageError on any other read or parse failure
   */
  readJson(location: ObjectLocation): Promise<unknown>;

  /**
   * Writes a JSON document to the configured bucket, replacing any existing object.
   *
   * @throws StorageError on failure
   */
  writeJson(key: string, value: unknown): Promise<void>;
}
