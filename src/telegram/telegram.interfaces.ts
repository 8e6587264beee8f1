export const TELEGRAM_CLIENT = Symbol('TELEGRAM_CLIENT');

export type TelegramParseMode = 'HTML';

export interface OutboundMessage {
  readonly chat_id: string;
  readonly text: string;
  readonly parse_mode: TelegramParseMode;
  readonly disable_web_page_preview: boolean;
}

export interface DeliveryResult {
  readonly messageId: number;
  readonly chatId: string;
  readonly attempts: number;
  readonly durationMs: number;
}

export interface TelegramConnectionStatus {
  readonly connected: boolean;
  readonly botUsername: string | null;
  readonly error: string | null;
}
