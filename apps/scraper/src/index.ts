import { fetch } from 'undici';

import { runScraper } from './app.js';
import { parseConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';

const start = async () => {
  const configResult = parseConfig(process.env);

  if (configResult.isErr()) {
    process.stderr.write(
      `Invalid configuration: ${JSON.stringify(configResult.error.details?.issues)}\n`
    );
    process.exitCode = 1;
    return;
  }

  const config = configResult.value;
  const logger = createLogger(config.logLevel);

  const { exitCode } = await runScraper({ config, fetch, logger });
  process.exitCode = exitCode;
};

start().catch((error: unknown) => {
  process.stderr.write(`Unexpected failure: ${String(error)}\n`);
  process.exitCode = 1;
});
