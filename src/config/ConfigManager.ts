import dotenv from 'dotenv';
import { AppConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Server configuration
    config.server.port = this.getNumber('PORT', config.server.port);
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, [
      'development',
      'production',
      'test',
    ]);

    // Database configuration
    config.database.filename = this.getString('DB_FILE', config.database.filename);

    // TMDB (optional - enrichment and search are disabled without a key)
    config.tmdb.apiKey = process.env.TMDB_API_KEY || undefined;
    config.tmdb.baseUrl = this.getString('TMDB_BASE_URL', config.tmdb.baseUrl);
    config.tmdb.language = this.getString('TMDB_LANGUAGE', config.tmdb.language);
    config.tmdb.cacheTtl = this.getNumber('TMDB_CACHE_TTL', config.tmdb.cacheTtl);

    // Auth tokens
    config.auth.tokenTtlHours = this.getNumber('AUTH_TOKEN_TTL_HOURS', config.auth.tokenTtlHours);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (!match) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /**
   * Returns non-fatal configuration warnings; throws on fatal problems.
   */
  validate(): string[] {
    const warnings: string[] = [];

    if (this.config.auth.tokenTtlHours <= 0) {
      throw new ConfigurationError('AUTH_TOKEN_TTL_HOURS', 'AUTH_TOKEN_TTL_HOURS must be positive');
    }

    if (!this.config.tmdb.apiKey) {
      warnings.push('TMDB API key not provided - search and enrichment will be disabled');
    }

    return warnings;
  }
}
