import { TelegramBotClient } from './clients/telegram.js';
import type { PipelineOutcome } from './core/types.js';
import { type SenderFactory, notifyFailure } from './features/alerts/notifier.js';
import { type PipelineDeps, collectReading } from './features/reading/usecase.js';
import { componentLogger } from './lib/logger.js';

export interface RunDeps extends PipelineDeps {
  createSender?: SenderFactory;
}

export interface RunSummary {
  outcome: PipelineOutcome;
  exitCode: 0 | 1;
}

export async function runScraper(deps: RunDeps): Promise<RunSummary> {
  const { config, fetch, logger } = deps;
  const driverLogger = componentLogger(logger, 'driver');

  const outcome = await collectReading(deps).match(
    ({ reading, url }): PipelineOutcome => {
      driverLogger.info({ reading, url }, 'Reading forwarded to backend');
      return { success: true, message: '' };
    },
    (error): PipelineOutcome => {
      driverLogger.error({ code: error.code, details: error.details }, error.message);
      return { success: false, message: error.message };
    }
  );

  if (outcome.success) {
    return { outcome, exitCode: 0 };
  }

  driverLogger.error(`Something went wrong (${outcome.message})`);

  const createSender: SenderFactory =
    deps.createSender ??
    ((token) =>
      new TelegramBotClient(token, {
        apiUrl: config.telegramApiUrl,
        timeoutMs: config.fetchTimeoutMs,
        fetch,
      }));

  const notification = await notifyFailure(outcome.message, {
    token: config.telegramToken,
    chatIds: config.telegramChatIds,
    createSender,
    logger: componentLogger(logger, 'notifier'),
  });

  if (notification.isErr()) {
    driverLogger.error(
      { code: notification.error.code, details: notification.error.details },
      `Failed to send failure notification: ${notification.error.message}`
    );
  }

  return { outcome, exitCode: 1 };
}
