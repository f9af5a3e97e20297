export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface DatabaseConfig {
  type: 'sqlite3';
  filename: string;
}

export interface TmdbConfig {
  apiKey?: string | undefined;
  baseUrl: string;
  language: string;
  includeAdult: boolean;
  rateLimit: number;
  rateLimitWindow: number; // seconds
  cacheTtl: number; // seconds
  timeout: number; // milliseconds
}

export interface AuthConfig {
  tokenTtlHours: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSizeMb: number;
    maxFiles: number; // days
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  tmdb: TmdbConfig;
  auth: AuthConfig;
  logging: LoggingConfig;
}
