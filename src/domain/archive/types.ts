export interface MessageAuthor {
  username: string;
  discriminator: string;
}

export interface Attachment {
  filename: string;
  url: string;
  size: number;
}

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface Embed {
  title: string | null;
  url: string | null;
  description: string | null;
  fields: EmbedField[];
  footer: { text: string } | null;
}

/**
 * アーカイブ対象のメッセージ
 * 取得元の API では新しい順に返るが、ここでは常に古い順に並んでいる前提で扱う
 */
export interface ArchivedMessage {
  id: string;
  author: MessageAuthor;
  content: string;
  timestamp: string;
  attachments: Attachment[];
  embeds: Embed[];
}

export interface ChannelInfo {
  id: string;
  name: string;
}

export interface RateLimitInfo {
  limit: number | null;
  remaining: number | null;
  reset: number | null;
  resetAfter: number | null;
  bucket: string | null;
  global: boolean;
}

export interface FetchMessagesOptions {
  after?: string | null;
  before?: string | null;
  limit?: number;
}

export interface FetchMessagesResult {
  messages: ArchivedMessage[];
  rateLimit: RateLimitInfo | null;
}

export interface BotIdentity {
  id: string;
  username: string;
  discriminator: string;
}

/**
 * メッセージの取得元（Discord REST API）
 */
export interface MessageSource {
  fetchMessages(channelId: string, options?: FetchMessagesOptions): Promise<FetchMessagesResult>;
  fetchChannelInfo(channelId: string): Promise<ChannelInfo>;
  fetchCurrentUser(): Promise<BotIdentity>;
  close(): void;
}

export interface BucketInfo {
  name: string;
  exists: boolean;
  public: boolean | null;
  createdAt: string | null;
  error: string | null;
}

/**
 * 上書きしない書き込みの結果。既存のキーと衝突した場合は 'exists'
 */
export type CreateOutcome = 'created' | 'exists' | 'failed';

/**
 * アーカイブと状態ファイルの保存先
 * 失敗は例外ではなく戻り値（false / null / 空配列）で表す
 */
export interface ObjectStore {
  /** 同じパスがあれば上書きする */
  uploadText(path: string, content: string, contentType: string): Promise<boolean>;
  /** 同じパスがあれば書き込まない */
  createText(path: string, content: string, contentType: string): Promise<CreateOutcome>;
  downloadText(path: string): Promise<string | null>;
  exists(path: string): Promise<boolean>;
  ensureBucketExists(locationHint: string): Promise<boolean>;
  listFiles(prefix: string, limit: number): Promise<string[]>;
  getBucketInfo(): Promise<BucketInfo>;
}

export interface Checkpoint {
  lastReadMessageId: string | null;
  lastCheckTime: string | null;
  lastMessageCount: number;
  lastFilePath: string | null;
}

export interface RunResult {
  channelId: string;
  messageCount: number;
  fileCreated: boolean;
  filePath: string | null;
  previousMessageId: string | null;
  newMessageId: string | null;
  checkpointSaved: boolean;
}
