import { formatFileStamp } from '../../shared/utils/time';

export const ARCHIVE_FOLDER = 'Discord_Messages';

/**
 * チャンネルのアーカイブファイル名の接頭辞
 */
export function archivePrefix(channelId: string): string {
  return `${ARCHIVE_FOLDER}/unread_messages_${channelId}_`;
}

/**
 * Discord_Messages/unread_messages_{channelId}_{YYYY-MM-DD}_{HH-MM-SS}[_{n}].html
 */
export function archivePath(channelId: string, at: Date, timeZone: string, sequence = 1): string {
  const stamp = formatFileStamp(at, timeZone);
  const suffix = sequence > 1 ? `_${sequence}` : '';
  return `${archivePrefix(channelId)}${stamp.date}_${stamp.time}${suffix}.html`;
}
