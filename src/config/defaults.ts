import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 3000,
    host: '0.0.0.0',
    env: 'development',
  },
  database: {
    type: 'sqlite3',
    filename: './data/watchlog.sqlite',
  },
  tmdb: {
    baseUrl: 'https://api.themoviedb.org/3',
    language: 'en-US',
    includeAdult: false,
    rateLimit: 40,
    rateLimitWindow: 10, // 40 requests per 10 seconds
    cacheTtl: 3600,
    timeout: 10000,
  },
  auth: {
    tokenTtlHours: 24 * 14,
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSizeMb: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
