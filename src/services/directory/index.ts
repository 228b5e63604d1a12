export * from './types';
export { TelegramDirectory, createTelegramDirectory } from './adapters/telegram';

import { config } from '../../config';
import { logger } from '../../utils/logger';
import { createTelegramDirectory, type TelegramDirectory } from './adapters/telegram';

let directory: TelegramDirectory | null = null;

export function initializeDirectory(): TelegramDirectory {
  if (!config.telegram.botToken) {
    logger.warn('[Directory] TELEGRAM_BOT_TOKEN not set; directory calls will fail');
  }

  directory = createTelegramDirectory({
    botToken: config.telegram.botToken,
    apiBaseUrl: config.telegram.apiBaseUrl,
    timeoutMs: config.telegram.timeoutMs,
  });
  return directory;
}

export function getDirectory(): TelegramDirectory {
  if (!directory) {
    return initializeDirectory();
  }
  return directory;
}
