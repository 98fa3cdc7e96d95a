import { StorageApiError, type StorageClient, type StorageError } from '@supabase/storage-js';

import type { BucketInfo, CreateOutcome, ObjectStore } from '../../domain/archive/types';
import { logger } from '../logging/logger';

// 一覧取得の 1 ページあたりの件数
const LIST_PAGE_SIZE = 100;

/**
 * "a/b/c.html" を ("a/b", "c.html") に分割する
 */
function splitPath(path: string): { folder: string; name: string } {
  const index = path.lastIndexOf('/');
  if (index < 0) return { folder: '', name: path };
  return { folder: path.slice(0, index), name: path.slice(index + 1) };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 既存オブジェクトとの衝突（"The resource already exists"）か
 */
function isConflict(error: StorageError): boolean {
  if (error instanceof StorageApiError && error.status === 409) return true;
  return /already exists|duplicate/i.test(error.message);
}

/**
 * Supabase Storage のバケットを ObjectStore として扱う
 */
export function createSupabaseObjectStore(client: StorageClient, bucket: string): ObjectStore {
  const objects = () => client.from(bucket);

  /**
   * テキストをアップロードする（同じパスがあれば上書き）
   */
  const uploadText = async (path: string, content: string, contentType: string): Promise<boolean> => {
    try {
      const { error } = await objects().upload(path, content, {
        contentType,
        upsert: true,
        cacheControl: '3600',
      });
      if (error) {
        logger.error(`Storage error uploading to ${path}`, error.message);
        return false;
      }
      logger.info(`Successfully uploaded to: ${bucket}/${path}`);
      return true;
    } catch (error) {
      logger.error(`Unexpected error uploading to ${path}`, describeError(error));
      return false;
    }
  };

  /**
   * テキストを新規作成する（同じパスがあれば書き込まずに 'exists'）
   */
  const createText = async (path: string, content: string, contentType: string): Promise<CreateOutcome> => {
    try {
      const { error } = await objects().upload(path, content, {
        contentType,
        upsert: false,
        cacheControl: '3600',
      });
      if (error) {
        if (isConflict(error)) {
          logger.warn(`Object already exists: ${bucket}/${path}`);
          return 'exists';
        }
        logger.error(`Storage error uploading to ${path}`, error.message);
        return 'failed';
      }
      logger.info(`Successfully uploaded to: ${bucket}/${path}`);
      return 'created';
    } catch (error) {
      logger.error(`Unexpected error uploading to ${path}`, describeError(error));
      return 'failed';
    }
  };

  /**
   * テキストをダウンロードする（存在しない・失敗時は null）
   */
  const downloadText = async (path: string): Promise<string | null> => {
    try {
      const { data, error } = await objects().download(path);
      if (error || !data) {
        logger.warn(`File not available: ${bucket}/${path}`, error?.message ?? 'empty body');
        return null;
      }
      const text = await data.text();
      logger.info(`Successfully downloaded from: ${bucket}/${path}`);
      return text;
    } catch (error) {
      logger.error(`Unexpected error downloading ${path}`, describeError(error));
      return null;
    }
  };

  const exists = async (path: string): Promise<boolean> => {
    const { folder, name } = splitPath(path);
    try {
      const { data, error } = await objects().list(folder, { search: name, limit: 100 });
      if (error || !data) {
        logger.error(`Error checking file existence for ${path}`, error?.message ?? 'no data');
        return false;
      }
      return data.some((entry) => entry.name === name);
    } catch (error) {
      logger.error(`Error checking file existence for ${path}`, describeError(error));
      return false;
    }
  };

  /**
   * 指定した接頭辞を持つファイルのパスを名前の降順で返す
   * Storage の search は部分一致（_ や % がワイルドカード）なので、ページを進めながら接頭辞で絞り込む
   */
  const listFiles = async (prefix: string, limit: number): Promise<string[]> => {
    const { folder, name } = splitPath(prefix);
    const paths: string[] = [];
    try {
      for (let offset = 0; paths.length < limit; offset += LIST_PAGE_SIZE) {
        const { data, error } = await objects().list(folder, {
          limit: LIST_PAGE_SIZE,
          offset,
          search: name,
          sortBy: { column: 'name', order: 'desc' },
        });
        if (error || !data) {
          logger.error(`Error listing files with prefix ${prefix}`, error?.message ?? 'no data');
          return [];
        }
        paths.push(
          ...data
            .filter((entry) => entry.name.startsWith(name))
            .map((entry) => (folder ? `${folder}/${entry.name}` : entry.name))
        );
        if (data.length < LIST_PAGE_SIZE) break;
      }
    } catch (error) {
      logger.error(`Error listing files with prefix ${prefix}`, describeError(error));
      return [];
    }
    logger.info(`Listed ${Math.min(paths.length, limit)} files with prefix: ${prefix}`);
    return paths.slice(0, limit);
  };

  /**
   * バケットの存在を確認し、無ければ非公開で作成する
   * Supabase はバケット単位のリージョン指定を持たないため locationHint は記録のみ
   */
  const ensureBucketExists = async (locationHint: string): Promise<boolean> => {
    try {
      const { data } = await client.getBucket(bucket);
      if (data) {
        logger.info(`Bucket ${bucket} already exists`);
        return true;
      }

      const { error } = await client.createBucket(bucket, { public: false });
      if (error) {
        logger.error(`Error creating bucket ${bucket}`, error.message);
        return false;
      }
      logger.info(`Created bucket ${bucket} (location hint: ${locationHint})`);
      return true;
    } catch (error) {
      logger.error(`Error creating bucket ${bucket}`, describeError(error));
      return false;
    }
  };

  const getBucketInfo = async (): Promise<BucketInfo> => {
    try {
      const { data, error } = await client.getBucket(bucket);
      if (error || !data) {
        return {
          name: bucket,
          exists: false,
          public: null,
          createdAt: null,
          error: error?.message ?? 'bucket not found',
        };
      }
      return {
        name: data.name,
        exists: true,
        public: data.public,
        createdAt: data.created_at,
        error: null,
      };
    } catch (error) {
      logger.error('Error getting bucket info', describeError(error));
      return { name: bucket, exists: false, public: null, createdAt: null, error: describeError(error) };
    }
  };

  return {
    uploadText,
    createText,
    downloadText,
    exists,
    ensureBucketExists,
    listFiles,
    getBucketInfo,
  };
}
