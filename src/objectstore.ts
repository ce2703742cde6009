import { readFile } from "node:fs/promises";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";

/** The four primitives reconciliation needs. */
export interface ObjectStore {
  readonly bucket: string;
  listKeys(prefix: string): Promise<string[]>;
  /** Object bytes, or undefined when there is no such key. */
  getObject(key: string): Promise<Buffer | undefined>;
  putFile(key: string, localPath: string): Promise<void>;
  deleteObject(key: string): Promise<void>;
}

export function createS3Client(region?: string): S3Client {
  return new S3Client(region ? { region } : {});
}

function isNoSuchKey(error: unknown): boolean {
  return error instanceof Error && (error.name === "NoSuchKey" || error.name === "NotFound");
}

export function createS3ObjectStore(client: S3Client, bucket: string): ObjectStore {
  return { bucket, listKeys, getObject, putFile, deleteObject };

  async function listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix || undefined,
          ContinuationToken: continuationToken,
        }),
      );

      for (const object of response.Contents ?? []) {
        if (object.Key) {
          keys.push(object.Key);
        }
      }

      continuationToken = response.NextContinuationToken;
    } while (continuationToken);

    return keys;
  }

  async function getObject(key: string): Promise<Buffer | undefined> {
    try {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        return undefined;
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNoSuchKey(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async function putFile(key: string, localPath: string): Promise<void> {
    const body = await readFile(localPath);
    await client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }));
  }

  async function deleteObject(key: string): Promise<void> {
    await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}
