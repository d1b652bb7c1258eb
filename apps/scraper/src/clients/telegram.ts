import { type ResultAsync, errAsync, okAsync } from 'neverthrow';
import { z } from 'zod';
import { ErrorCode, type ScraperError, createError } from '../core/errors.js';
import type { HttpFetch } from '../lib/http-utils.js';
import { describeError, resultFrom } from '../lib/result.js';

export interface MessageSender {
  sendMessage(chatId: string, text: string): ResultAsync<void, ScraperError>;
}

const sendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramBotClientOptions {
  apiUrl: string;
  timeoutMs: number;
  fetch: HttpFetch;
}

export class TelegramBotClient implements MessageSender {
  constructor(
    private readonly token: string,
    private readonly options: TelegramBotClientOptions
  ) {}

  sendMessage(chatId: string, text: string): ResultAsync<void, ScraperError> {
    const request = this.options
      .fetch(`${this.options.apiUrl}/bot${this.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
      .then(async (res) => ({ status: res.status, payload: await res.json() }));

    return resultFrom(
      request,
      ErrorCode.NotificationError,
      (error) => `Telegram request failed: ${describeError(error)}`
    ).andThen(({ status, payload }) => {
      const parsed = sendMessageResponseSchema.safeParse(payload);
      if (!parsed.success) {
        return errAsync(
          createError(ErrorCode.NotificationError, `Invalid Telegram response (HTTP ${status})`, {
            chatId,
          })
        );
      }

      if (!parsed.data.ok) {
        return errAsync(
          createError(
            ErrorCode.NotificationError,
            `Telegram rejected message to ${chatId}: ${parsed.data.description ?? `HTTP ${status}`}`,
            { chatId, status }
          )
        );
      }

      return okAsync(undefined);
    });
  }
}
