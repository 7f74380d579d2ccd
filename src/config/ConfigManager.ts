/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { readFileSync, existsSync } from 'fs';
import { logger, setLogLevel } from '../core/Logger.js';
import { ValidationError } from '../core/errors.js';
import type { RetryOptions } from '../core/retry.js';
import { appConfigSchema, type AppConfig } from './schema.js';

/**
 * Raw provider settings from the environment, validated by the provider factory
 */
export interface ProviderEnvironment {
  cloudflare: {
    apiToken?: string;
    zoneName?: string;
    zoneId?: string;
  };
  digitalocean: {
    apiToken?: string;
    domain?: string;
  };
}

/**
 * Read environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

/**
 * Read environment variable as integer
 */
function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(key: string): string | undefined {
  const secretPath = `/run/secrets/${key.toLowerCase()}`;
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Failed to read Docker secret');
    }
  }

  return process.env[key];
}

export class ConfigManager {
  private _app: AppConfig;
  private _providers: ProviderEnvironment;

  constructor() {
    const parsed = appConfigSchema.safeParse({
      logLevel: getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
      retryAttempts: getEnvInt('RETRY_ATTEMPTS', 3),
      retryBaseDelay: getEnvInt('RETRY_BASE_DELAY', 1000),
      retryMaxDelay: getEnvInt('RETRY_MAX_DELAY', 30000),
      providerType: getEnv('DNS_PROVIDER'),
    });

    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid configuration');
    }
    this._app = parsed.data;

    setLogLevel(this._app.logLevel);

    this._providers = {
      cloudflare: {
        apiToken: getSecret('CLOUDFLARE_TOKEN'),
        zoneName: getEnv('CLOUDFLARE_ZONE'),
        zoneId: getEnv('CLOUDFLARE_ZONE_ID'),
      },
      digitalocean: {
        apiToken: getSecret('DO_TOKEN'),
        domain: getEnv('DO_DOMAIN'),
      },
    };

    logger.debug({
      logLevel: this._app.logLevel,
      provider: this._app.providerType,
      retryAttempts: this._app.retryAttempts,
    }, 'Configuration loaded');
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get providers(): Readonly<ProviderEnvironment> {
    return this._providers;
  }

  /**
   * Retry policy for registrar calls
   */
  get retry(): RetryOptions {
    return {
      attempts: this._app.retryAttempts,
      baseDelayMs: this._app.retryBaseDelay,
      maxDelayMs: Math.max(this._app.retryBaseDelay, this._app.retryMaxDelay),
    };
  }
}

// Export singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
