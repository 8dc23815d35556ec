import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  env: 'development',
  database: {
    type: 'sqlite3',
    database: 'channelkeep',
    filename: './data/channelkeep.sqlite',
  },
  storage: {
    downloadRoot: './downloads',
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  jobs: {
    workers: 2,
    pollIntervalMs: 1000,
    maxRetries: 3,
    retryDelays: [1000, 5000, 30000], // 1s, 5s, 30s
  },
  reconciler: {
    escalateMediaFailures: ['download-metadata'],
  },
};
