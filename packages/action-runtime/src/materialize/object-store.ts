/**
 * @module @action-engine/runtime/materialize/object-store
 *
 * Remote storage port used by the module materializer, and its S3 adapter.
 */

import { GetObjectCommand, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import type { StorageSettings } from '@action-engine/contracts';

export interface ObjectStore {
  /** Download one object in full. Rejects when the object cannot be read. */
  getObject(bucket: string, key: string, signal?: AbortSignal): Promise<Uint8Array>;
}

/**
 * Build an S3 client config. Explicit credentials are used only when region,
 * access key id and secret are all set; otherwise the SDK default chain applies.
 */
export function s3ClientConfig(storage: Readonly<StorageSettings>): S3ClientConfig {
  const { region, accessKeyId, secretAccessKey } = storage;
  if (region && accessKeyId && secretAccessKey) {
    return { region, credentials: { accessKeyId, secretAccessKey } };
  }
  return region ? { region } : {};
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  static fromSettings(storage: Readonly<StorageSettings>): S3ObjectStore {
    return new S3ObjectStore(new S3Client(s3ClientConfig(storage)));
  }

  async getObject(bucket: string, key: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }), {
      abortSignal: signal,
    });

    if (!response.Body) {
      throw new Error(`Object s3://${bucket}/${key} has no body`);
    }
    return response.Body.transformToByteArray();
  }
}
