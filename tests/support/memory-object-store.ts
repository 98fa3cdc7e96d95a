import type { BucketInfo, CreateOutcome, ObjectStore } from '../../src/domain/archive/types';

export interface MemoryObjectStoreOptions {
  files?: Record<string, string>;
  bucketReady?: boolean;
  failUpload?: (path: string) => boolean;
  /** exists() が常に false を返す（一覧取得に失敗したストアの再現） */
  hideExisting?: boolean;
  throwOnDownload?: boolean;
}

export interface UploadRecord {
  path: string;
  content: string;
  contentType: string;
}

/**
 * テスト用のインメモリ ObjectStore
 */
export function createMemoryObjectStore(options: MemoryObjectStoreOptions = {}) {
  const files = new Map(Object.entries(options.files ?? {}));
  const uploads: UploadRecord[] = [];

  const store: ObjectStore = {
    async uploadText(path, content, contentType) {
      if (options.failUpload?.(path)) return false;
      files.set(path, content);
      uploads.push({ path, content, contentType });
      return true;
    },
    async createText(path, content, contentType): Promise<CreateOutcome> {
      if (options.failUpload?.(path)) return 'failed';
      if (files.has(path)) return 'exists';
      files.set(path, content);
      uploads.push({ path, content, contentType });
      return 'created';
    },
    async downloadText(path) {
      if (options.throwOnDownload) throw new Error('download exploded');
      return files.get(path) ?? null;
    },
    async exists(path) {
      return !options.hideExisting && files.has(path);
    },
    async ensureBucketExists() {
      return options.bucketReady ?? true;
    },
    async listFiles(prefix, limit) {
      return [...files.keys()]
        .filter((path) => path.startsWith(prefix))
        .sort()
        .reverse()
        .slice(0, limit);
    },
    async getBucketInfo(): Promise<BucketInfo> {
      const exists = options.bucketReady ?? true;
      return {
        name: 'test-bucket',
        exists,
        public: exists ? false : null,
        createdAt: exists ? '2024-01-01T00:00:00Z' : null,
        error: exists ? null : 'bucket not found',
      };
    },
  };

  return { store, files, uploads };
}
