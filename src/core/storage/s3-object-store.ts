/**
 * S3 Object Store
 * Adapts the AWS SDK v3 client to the ObjectStoreClient primitives
 */

import fs from 'node:fs';
import {
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import {
  ListOptions,
  ListPage,
  ObjectStoreClient,
  RemoteObject,
  StoreOutcome,
} from '../../interfaces/object-store';

/** Max keys per ListObjectsV2 request (S3 limit). */
export const LIST_PAGE_SIZE = 1000;

const NOT_FOUND_ERRORS = new Set(['NotFound', 'NoSuchKey', 'NoSuchBucket']);

export interface S3ConnectionOptions {
  region: string;
  endpoint?: string;
}

export function createS3Client(options: S3ConnectionOptions): S3Client {
  return new S3Client({
    region: options.region,
    ...(options.endpoint
      ? { endpoint: options.endpoint, forcePathStyle: true }
      : {}),
  });
}

export function toFailureOutcome(error: unknown): StoreOutcome<never> {
  if (error instanceof S3ServiceException) {
    if (
      NOT_FOUND_ERRORS.has(error.name) ||
      error.$metadata?.httpStatusCode === 404
    ) {
      return { status: 'not-found' };
    }
    return { status: 'error', code: error.name, message: error.message };
  }

  if (error instanceof Error) {
    return { status: 'error', code: error.name, message: error.message };
  }
  return { status: 'error', code: 'UnknownError', message: String(error) };
}

export function createS3ObjectStore(client: S3Client): ObjectStoreClient {
  const listObjects = async (
    bucket: string,
    prefix: string,
    options: ListOptions = {},
  ): Promise<StoreOutcome<ListPage>> => {
    try {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix || undefined,
          MaxKeys: options.maxKeys ?? LIST_PAGE_SIZE,
          ContinuationToken: options.continuationToken,
        }),
      );

      const objects: RemoteObject[] = [];
      for (const obj of response.Contents ?? []) {
        // skip directory placeholders
        if (!obj.Key || obj.Key.endsWith('/')) {
          continue;
        }
        objects.push({ key: obj.Key, size: obj.Size ?? 0 });
      }

      return {
        status: 'ok',
        value: {
          objects,
          nextContinuationToken: response.IsTruncated
            ? response.NextContinuationToken
            : undefined,
        },
      };
    } catch (error) {
      return toFailureOutcome(error);
    }
  };

  const headObject = async (
    bucket: string,
    key: string,
  ): Promise<StoreOutcome<{ size: number }>> => {
    try {
      const response = await client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key }),
      );
      return { status: 'ok', value: { size: response.ContentLength ?? 0 } };
    } catch (error) {
      return toFailureOutcome(error);
    }
  };

  const putObjectFromFile = async (
    bucket: string,
    key: string,
    localPath: string,
  ): Promise<StoreOutcome<{ etag?: string }>> => {
    let body: fs.ReadStream | undefined;
    try {
      const { size } = fs.statSync(localPath);
      body = fs.createReadStream(localPath);
      const response = await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: size,
        }),
      );
      return { status: 'ok', value: { etag: response.ETag } };
    } catch (error) {
      return toFailureOutcome(error);
    } finally {
      // A request rejected before the body is read leaves the file open.
      body?.destroy();
    }
  };

  const deleteObject = async (
    bucket: string,
    key: string,
  ): Promise<StoreOutcome<{ key: string }>> => {
    try {
      await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
      return { status: 'ok', value: { key } };
    } catch (error) {
      return toFailureOutcome(error);
    }
  };

  return { listObjects, headObject, putObjectFromFile, deleteObject };
}
