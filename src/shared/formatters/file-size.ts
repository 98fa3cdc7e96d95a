const KB = 1024;
const MB = 1024 * 1024;

/**
 * バイト数を人間が読みやすい形式に変換する
 * @param bytes ファイルサイズ（バイト）
 * @returns 例: "500 bytes", "100.00 KB", "5.00 MB"
 */
export function formatFileSize(bytes: number): string {
  if (bytes < KB) return `${bytes} bytes`;
  if (bytes < MB) return `${(bytes / KB).toFixed(2)} KB`;
  return `${(bytes / MB).toFixed(2)} MB`;
}
