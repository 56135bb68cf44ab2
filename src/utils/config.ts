import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import type { z } from 'zod';
import { NotesConfigSchema } from '../types/config.js';
import type { NotesConfig } from '../types/config.js';
import { ValidationError, FileError, ConfigurationError } from './errors.js';

export type NotesConfigInput = z.input<typeof NotesConfigSchema>;

export class ConfigManager {
  private configPath: string;
  private configDir: string;

  constructor(customPath?: string) {
    if (customPath) {
      this.configPath = path.resolve(customPath);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = this.getDefaultConfigDir();
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  /**
   * `NOTES_LEDGER_CONFIG_PATH` names a directory; otherwise `~/.notes-ledger`.
   */
  private getDefaultConfigDir(): string {
    const fromEnv = process.env['NOTES_LEDGER_CONFIG_PATH'];
    if (fromEnv) {
      return path.resolve(fromEnv);
    }
    return path.join(os.homedir(), '.notes-ledger');
  }

  getDefaultDatabasePath(): string {
    return path.join(this.configDir, 'database.db');
  }

  getDefaultExportDir(): string {
    return path.join(this.configDir, 'exports');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load and validate the configuration file, filling in derived paths.
   */
  async load(): Promise<NotesConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as { code?: string }).code === 'ENOENT') {
        throw new FileError('Configuration file not found. Run "notes-ledger init" to create one.');
      }
      throw new FileError(`Failed to load configuration: ${String(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ValidationError('Configuration file contains invalid JSON');
    }

    return this.resolve(data);
  }

  /**
   * Load the configuration file when present, otherwise the defaults.
   */
  async loadOrDefault(): Promise<NotesConfig> {
    if (await this.exists()) {
      return this.load();
    }
    return this.createDefault();
  }

  createDefault(): NotesConfig {
    return this.resolve({});
  }

  async save(config: NotesConfigInput): Promise<NotesConfig> {
    const resolved = this.resolve(config);

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, `${JSON.stringify(resolved, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }

    return resolved;
  }

  async delete(): Promise<void> {
    try {
      await fs.rm(this.configPath, { force: true });
    } catch (error) {
      throw new FileError(`Failed to delete configuration: ${String(error)}`);
    }
  }

  private resolve(data: unknown): NotesConfig {
    const result = NotesConfigSchema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    const config = result.data;
    if (!config.database.path) {
      config.database.path = this.getDefaultDatabasePath();
    }
    if (!config.export.directory) {
      config.export.directory = this.getDefaultExportDir();
    }
    return config;
  }
}

/**
 * The configured OpenAI key, falling back to `OPENAI_API_KEY`.
 */
export function resolveOpenAIApiKey(config: NotesConfig): string {
  const apiKey = config.providers.openai?.apiKey || process.env['OPENAI_API_KEY'];
  if (!apiKey) {
    throw new ConfigurationError('OpenAI API key is not configured. Run "notes-ledger init" or set OPENAI_API_KEY.');
  }
  return apiKey;
}
