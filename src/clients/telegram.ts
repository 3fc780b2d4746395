import { z } from 'zod';
import { http } from '../lib/http';

/** Outbound "send text to the operator channel" capability. */
export interface Dispatcher {
  send(text: string): Promise<void>;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export class TelegramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelegramError';
  }
}

const SendMessageResponse = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.object({ message_id: z.number() }).partial().optional(),
});

export function createTelegramDispatcher(config: TelegramConfig): Dispatcher {
  const url = `https://api.telegram.org/bot${config.botToken}/sendMessage`;

  // got puts the request url (and so the bot token) into its error messages
  const redact = (message: string) => message.replaceAll(config.botToken, '<redacted>');

  return {
    async send(text: string) {
      let raw: unknown;
      try {
        // Telegram answers 4xx with a JSON body; read it instead of throwing HTTPError
        raw = await http
          .post(url, {
            json: { chat_id: config.chatId, text, disable_web_page_preview: true },
            throwHttpErrors: false,
          })
          .json<unknown>();
      } catch (e) {
        throw new TelegramError(`sendMessage failed: ${redact(e instanceof Error ? e.message : String(e))}`);
      }
      const res = SendMessageResponse.safeParse(raw);
      if (!res.success) {
        throw new TelegramError('Unexpected sendMessage response');
      }
      if (!res.data.ok) {
        throw new TelegramError(res.data.description || 'Unknown Telegram API error');
      }
    },
  };
}
