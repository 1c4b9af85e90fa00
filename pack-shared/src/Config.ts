import dotenv from 'dotenv';
import path from 'path';

export enum ConfigKeys {
  OPENAI_API_KEY = 'OPENAI_API_KEY',
  OPENAI_BASE_URL = 'OPENAI_BASE_URL',
  OPENAI_REALTIME_URL = 'OPENAI_REALTIME_URL',
  HTTP_TIMEOUT_MS = 'HTTP_TIMEOUT_MS',
  LOG_LEVEL = 'LOG_LEVEL',
  LOG_SESSION_ID = 'LOG_SESSION_ID',
}

export class Config {
  private static config: Map<ConfigKeys, string> | null = null;

  private constructor() {
    // Private constructor to prevent instantiation
  }

  private static load(): Map<ConfigKeys, string> {
    if (Config.config) {
      return Config.config;
    }

    const isTest = process.env.NODE_ENV === 'test';
    const envFile = isTest ? '.env.test' : '.env';
    const envPath = path.resolve(__dirname, '../../', envFile);
    dotenv.config({ path: envPath });

    const config = new Map<ConfigKeys, string>();
    for (const key of Object.values(ConfigKeys)) {
      const value = process.env[key];
      if (value) {
        config.set(key, value);
      }
    }

    Config.config = config;
    return config;
  }

  public static reset(): void {
    Config.config = null;
  }

  public static get(key: ConfigKeys): string {
    const value = Config.load().get(key);
    if (!value) {
      throw new Error(`Configuration key '${key}' not found`);
    }
    return value;
  }

  public static getOrDefault(key: ConfigKeys, fallback: string): string {
    return Config.load().get(key) ?? fallback;
  }

  public static getNumber(key: ConfigKeys, fallback: number): number {
    const raw = Config.load().get(key);
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || value <= 0) {
      throw new Error(`Configuration key '${key}' is not a positive integer: ${raw}`);
    }
    return value;
  }

  public static has(key: ConfigKeys): boolean {
    return Config.load().has(key);
  }
}
