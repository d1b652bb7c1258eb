import { type Config, parseConfig } from '../../src/lib/config.js';

export const SOURCE_URL = 'https://source.test/wasserdaten/';
export const BACKEND_URL = 'http://api.test';
export const TELEGRAM_API_URL = 'https://telegram.test';
export const BOT_TOKEN = 'test-bot-token';
export const API_KEY = 'test-api-key';
export const LAKE_ID = 'test-lake';
export const BACKEND_ENDPOINT = `${BACKEND_URL}/lake/${LAKE_ID}/temperature`;

export const TEST_ENV: NodeJS.ProcessEnv = {
  LOG_LEVEL: 'silent',
  SOURCE_URL,
  BACKEND_URL,
  AARE_UUID: LAKE_ID,
  API_KEY,
  TOKEN: BOT_TOKEN,
  TELEGRAM_CHATLIST: '1001,1002',
  TELEGRAM_API_URL,
};

export function createTestConfig(overrides: NodeJS.ProcessEnv = {}): Config {
  return parseConfig({ ...TEST_ENV, ...overrides })._unsafeUnwrap();
}

export const sourcePage = (temperature: string, timestamp: string): string => `<!DOCTYPE html>
<html>
<head><title>Wasserdaten</title></head>
<body>
  <div class="water">
    <temp>${temperature}</temp>
    <temp-normal>${timestamp}</temp-normal>
  </div>
</body>
</html>`;

export const HTML_FIXTURES = {
  summer: sourcePage('18.4°C', 'Last update: 2024-06-01 14:30:00'),

  belowZero: sourcePage('-1.0°C', 'Last update: 2024-06-01 14:30:00'),

  withoutTemperature: `<!DOCTYPE html>
<html>
<body>
  <temp-normal>Last update: 2024-06-01 14:30:00</temp-normal>
</body>
</html>`,

  maintenance: `<!DOCTYPE html>
<html>
<head><title>Wartung</title></head>
<body><p>Die Seite wird gewartet.</p></body>
</html>`,
};
