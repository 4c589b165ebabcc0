import { promises as fs } from 'fs';
import path from 'path';
import logger from '../utils/logger.js';

export type Settings = Record<string, string>;

/**
 * JSON file-based settings store
 * Keeps string key/value settings in a local JSON file
 */
export class JsonSettingsStore {
  private baseDir: string;
  private readonly fileName = 'notetree-settings.json';
  private settings: Settings = {};

  constructor(baseDir: string = '.') {
    this.baseDir = baseDir;
  }

  /**
   * Get the full file path for the settings file
   */
  getFilePath(): string {
    return path.join(this.baseDir, this.fileName);
  }

  /**
   * Load settings from disk. A missing or unreadable file leaves the store empty.
   */
  async load(): Promise<void> {
    const filePath = this.getFilePath();
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      this.settings = {};
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') this.settings[key] = value;
        }
      }
      logger.debug({ filePath, keys: Object.keys(this.settings) }, 'Settings loaded');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug({ filePath }, 'Settings file not found, starting empty');
        return;
      }
      logger.warn({ error, filePath }, 'Failed to load settings, starting empty');
    }
  }

  get(key: string, defaultValue: string = ''): string {
    return this.settings[key] ?? defaultValue;
  }

  set(key: string, value: string): void {
    this.settings[key] = value;
  }

  /**
   * Write settings to disk. Returns false instead of throwing on failure.
   */
  async save(): Promise<boolean> {
    const filePath = this.getFilePath();
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(this.settings, null, 2), 'utf-8');
      logger.debug({ filePath }, 'Settings saved');
      return true;
    } catch (error) {
      logger.error({ error, filePath }, 'Failed to save settings');
      return false;
    }
  }
}
