/**
 * Object store boundary: the primitives a remote store must provide and the
 * shapes the gateway hands back to the rest of the pipeline.
 */

export type StoreOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'not-found' }
  | { status: 'error'; code: string; message: string };

export interface RemoteObject {
  key: string;
  size: number;
}

export interface ListPage {
  objects: RemoteObject[];
  nextContinuationToken?: string;
}

export interface ListOptions {
  maxKeys?: number;
  continuationToken?: string;
}

export interface ObjectStoreClient {
  listObjects(
    bucket: string,
    prefix: string,
    options?: ListOptions,
  ): Promise<StoreOutcome<ListPage>>;
  headObject(bucket: string, key: string): Promise<StoreOutcome<{ size: number }>>;
  putObjectFromFile(
    bucket: string,
    key: string,
    localPath: string,
  ): Promise<StoreOutcome<{ etag?: string }>>;
  deleteObject(bucket: string, key: string): Promise<StoreOutcome<{ key: string }>>;
}

/**
 * Cached answer to "does this key exist remotely, and how big is it".
 */
export interface ExistenceProbe {
  exists: boolean;
  size: number | null;
}

export interface UploadResult {
  success: boolean;
  bytesSent: number;
}
