import { Logger } from 'tslog';

export const LOG_LEVEL_NAMES = [
  'silly',
  'trace',
  'debug',
  'info',
  'warn',
  'warning',
  'error',
  'fatal',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

// tslogのログレベル定義: 0: silly, 1: trace, 2: debug, 3: info, 4: warn, 5: error, 6: fatal
const LOG_LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  warning: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'discord-message-archiver',
  minLevel: LOG_LEVELS.info,
});

/**
 * 起動時に一度だけ呼び出し、設定されたログレベルを反映する
 */
export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}
