/**
 * S3-backed ObjectStore.
 */

import {
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { ObjectStore } from './object-store.ts';
import type { ObjectLocation } from './paths.ts';
import { StorageError, errorMessage } from '../utils/errors.ts';

export class S3ObjectStore implements ObjectStore {
  readonly bucket: string;
  private readonly client: S3Client;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  async createUploadUrl(key: string, contentType: string, expiresInSeconds: number): Promise<string> {
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      ContentType: contentType,
    });

    try {
      return await getSignedUrl(this.client, command, { expiresIn: expiresInSeconds });
    } catch (error) {
      throw new StorageError(`Failed to generate presigned URL: ${errorMessage(error)}`);
    }
  }

  async readJson(location: ObjectLocation): Promise<unknown> {
    let text: string;

    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
      );
      if (!response.Body) {
        throw new StorageError(`Empty object body at s3://${location.bucket}/${location.key}`);
      }
      text = await response.Body.transformToString('utf-8');
    } catch (error) {
      if (isMissingObject(error)) return null;
      if (error instanceof StorageError) throw error;
      throw new StorageError(
        `Error downloading s3://${location.bucket}/${location.key}: ${errorMessage(error)}`,
      );
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new StorageError(`Object at s3://${location.bucket}/${location.key} is not valid JSON`);
    }
  }

  async writeJson(key: string, value: unknown): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: JSON.stringify(value, null, 2),
        ContentType: 'application/json',
      }));
    } catch (error) {
      throw new StorageError(`Failed to write s3://${this.bucket}/${key}: ${errorMessage(error)}`);
    }
  }
}

/** S3 reports a missing key as NoSuchKey; some paths surface only the error name. */
function isMissingObject(error: unknown): boolean {
  return error instanceof NoSuchKey || (error instanceof Error && error.name === 'NoSuchKey');
}
