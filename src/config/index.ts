import { LIBRARY_NAME, LIBRARY_VERSION, TIMEOUT } from './constants.js';
import { parseBoolean, parseInteger, parseLogLevel } from './env-parsers.js';

export const config = {
  library: {
    name: LIBRARY_NAME,
    version: LIBRARY_VERSION,
  },
  fetcher: {
    maxRetries: parseInteger(process.env.FETCH_MAX_RETRIES, 3, 1, 10),
    maxRedirects: 5,
    slowRequestMs: TIMEOUT.SLOW_REQUEST_WARN_MS,
  },
  logging: {
    enabled: parseBoolean(process.env.LOG_ENABLED, true),
    level: parseLogLevel(process.env.LOG_LEVEL),
    file: process.env.LOG_FILE,
  },
};
