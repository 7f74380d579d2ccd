/**
 * DNS Provider Factory
 * Creates registrar clients based on configuration
 */
import { logger } from '../core/Logger.js';
import { ValidationError } from '../core/errors.js';
import { cloudflareCredentialsSchema, digitalOceanCredentialsSchema } from '../config/schema.js';
import type { ConfigManager, ProviderEnvironment } from '../config/ConfigManager.js';
import type { RegistrarClient } from './base/RegistrarClient.js';
import { CloudflareProvider } from './cloudflare/index.js';
import { DigitalOceanProvider } from './digitalocean/index.js';
import type { ProviderType } from '../types/index.js';

export interface CreateProviderOptions {
  name?: string;
  type: ProviderType;
  /** Raw credentials, validated against the provider's schema */
  credentials: unknown;
}

export interface ProviderOverrides {
  type?: ProviderType;
  /** Zone to reconcile, overriding the provider's zone setting */
  zone?: string;
}

/**
 * Create a registrar client
 */
export function createProvider(options: CreateProviderOptions): RegistrarClient {
  const { name, type, credentials } = options;

  logger.debug({ type, name }, 'Creating DNS provider');

  switch (type) {
    case 'cloudflare': {
      const parsed = cloudflareCredentialsSchema.safeParse(credentials);
      if (!parsed.success) {
        throw ValidationError.fromZod(parsed.error, 'Invalid Cloudflare credentials');
      }
      return new CloudflareProvider(parsed.data, name);
    }

    case 'digitalocean': {
      const parsed = digitalOceanCredentialsSchema.safeParse(credentials);
      if (!parsed.success) {
        throw ValidationError.fromZod(parsed.error, 'Invalid DigitalOcean credentials');
      }
      return new DigitalOceanProvider(parsed.data, name);
    }
  }
}

/**
 * Provider types whose token is present in the environment
 */
export function detectProvidersFromEnv(env: Readonly<ProviderEnvironment>): ProviderType[] {
  const detected: ProviderType[] = [];
  if (env.cloudflare.apiToken) detected.push('cloudflare');
  if (env.digitalocean.apiToken) detected.push('digitalocean');
  return detected;
}

function detectSingleProvider(env: Readonly<ProviderEnvironment>): ProviderType {
  const detected = detectProvidersFromEnv(env);
  const [only] = detected;
  if (!only) {
    throw new ValidationError('No DNS provider configured: set DNS_PROVIDER and its API token');
  }
  if (detected.length > 1) {
    throw new ValidationError(`Several DNS providers configured (${detected.join(', ')}): set DNS_PROVIDER`);
  }
  return only;
}

/**
 * Create the registrar client for this run.
 *
 * The provider is the override, then DNS_PROVIDER, then the only provider
 * with a token configured. The zone is the override, then the provider's
 * own zone variable.
 */
export function createProviderFromConfig(config: ConfigManager, overrides: ProviderOverrides = {}): RegistrarClient {
  const env = config.providers;
  const type = overrides.type ?? config.app.providerType ?? detectSingleProvider(env);

  switch (type) {
    case 'cloudflare':
      return createProvider({
        type,
        credentials: {
          apiToken: env.cloudflare.apiToken,
          zoneName: overrides.zone ?? env.cloudflare.zoneName,
          // A configured zone ID only applies to the configured zone
          zoneId: overrides.zone ? undefined : env.cloudflare.zoneId,
        },
      });

    case 'digitalocean':
      return createProvider({
        type,
        credentials: {
          apiToken: env.digitalocean.apiToken,
          domain: overrides.zone ?? env.digitalocean.domain,
        },
      });
  }
}

/**
 * Validate provider credentials without creating an instance
 */
export function validateCredentials(type: ProviderType, credentials: unknown): boolean {
  switch (type) {
    case 'cloudflare':
      return cloudflareCredentialsSchema.safeParse(credentials).success;
    case 'digitalocean':
      return digitalOceanCredentialsSchema.safeParse(credentials).success;
  }
}

/**
 * Get supported provider types
 */
export function getSupportedProviders(): ProviderType[] {
  return ['cloudflare', 'digitalocean'];
}
