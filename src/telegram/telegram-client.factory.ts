import { Agent } from 'node:https';
import { Telegram } from 'telegraf';

import type { AppConfigService } from '../config/app-config.service';

const MAX_IDLE_SOCKETS = 5;

export const createTelegramClient = (appConfigService: AppConfigService): Telegram => {
  const agent: Agent = new Agent({
    keepAlive: true,
    maxSockets: appConfigService.telegramMaxConnections,
    maxFreeSockets: Math.min(MAX_IDLE_SOCKETS, appConfigService.telegramMaxConnections),
  });

  return new Telegram(appConfigService.botToken, {
    apiRoot: appConfigService.telegramApiBaseUrl,
    agent,
  });
};
