import { type ResultAsync, okAsync } from 'neverthrow';
import type { MessageSender } from '../../clients/telegram.js';
import type { ScraperError } from '../../core/errors.js';
import type { Logger } from '../../lib/logger.js';

export type SenderFactory = (token: string) => MessageSender;

export interface NotifierDeps {
  token: string | undefined;
  chatIds: readonly string[];
  createSender: SenderFactory;
  logger: Logger;
}

export const formatAlert = (message: string): string => `Error while executing: ${message}`;

/**
 * Relays a failure message to every configured chat, one after another.
 * The first failed send stops the chain and is returned.
 */
export function notifyFailure(
  message: string,
  { token, chatIds, createSender, logger }: NotifierDeps
): ResultAsync<void, ScraperError> {
  if (!token) {
    logger.error('TOKEN not defined in environment, skip sending telegram message');
    return okAsync(undefined);
  }

  if (chatIds.length === 0) {
    logger.error('chatlist is empty (env var: TELEGRAM_CHATLIST)');
  }

  const sender = createSender(token);
  const text = formatAlert(message);

  return chatIds.reduce<ResultAsync<void, ScraperError>>(
    (chain, chatId) =>
      chain.andThen(() => {
        logger.debug({ chatId }, 'Sending failure notification');
        return sender.sendMessage(chatId, text);
      }),
    okAsync(undefined)
  );
}
