/**
 * object-store.ts - Read access to the image bucket
 *
 * The pipeline only ever lists keys under the image prefix and fetches
 * single objects. The S3 implementation talks to any S3-compatible service
 * (Cloudflare R2 in production) through @aws-sdk/client-s3.
 */

import {
  GetObjectCommand,
  NoSuchKey,
  S3Client,
  paginateListObjectsV2,
} from "@aws-sdk/client-s3";
import { NotFoundError } from "../errors";
import type { ObjectStoreConfig } from "../config";

export interface ObjectStore {
  /**
   * Lists every key under the prefix, one page at a time, in the store's
   * listing order.
   */
  listKeys(prefix: string): AsyncIterable<string[]>;

  /**
   * Fetches one object's bytes.
   * @throws NotFoundError if the key does not exist
   */
  getObject(key: string): Promise<Uint8Array>;
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  static fromConfig(config: ObjectStoreConfig): S3ObjectStore {
    const client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
    return new S3ObjectStore(client, config.bucket);
  }

  async *listKeys(prefix: string): AsyncIterable<string[]> {
    const pages = paginateListObjectsV2(
      { client: this.client },
      { Bucket: this.bucket, Prefix: prefix }
    );
    for await (const page of pages) {
      const keys: string[] = [];
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      yield keys;
    }
  }

  async getObject(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!response.Body) {
        throw new NotFoundError(`Object '${key}' has no body`);
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw new NotFoundError(`Object '${key}' not found in bucket '${this.bucket}'`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
