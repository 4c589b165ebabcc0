import dotenv from 'dotenv';
import type { AppConfig } from '../types/index.js';

dotenv.config();

export function loadConfig(): AppConfig {
  return {
    dataPath: process.env.DATA_PATH || 'data',
    trashPath: process.env.TRASH_PATH || 'trash',
    settingsPath: process.env.SETTINGS_PATH || '.',
    server: {
      port: parseInt(process.env.PORT || '3000', 10),
      host: process.env.HOST || '0.0.0.0',
    },
    logLevel: process.env.LOG_LEVEL || 'info',
  };
}
