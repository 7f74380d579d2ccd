/**
 * ProviderFactory unit tests
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createProvider,
  createProviderFromConfig,
  detectProvidersFromEnv,
  getSupportedProviders,
  validateCredentials,
} from '../../../src/providers/ProviderFactory.js';
import { CloudflareProvider } from '../../../src/providers/cloudflare/index.js';
import { DigitalOceanProvider } from '../../../src/providers/digitalocean/index.js';
import { ConfigManager } from '../../../src/config/ConfigManager.js';
import { ValidationError } from '../../../src/core/errors.js';

describe('ProviderFactory', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('createProvider', () => {
    it('should create a Cloudflare provider', () => {
      const provider = createProvider({
        type: 'cloudflare',
        credentials: { apiToken: 'test-token', zoneName: 'Example.com' },
      });

      expect(provider).toBeInstanceOf(CloudflareProvider);
      expect(provider.getZoneName()).toBe('example.com');
      expect(provider.getProviderName()).toBe('Cloudflare');
    });

    it('should create a DigitalOcean provider with a custom name', () => {
      const provider = createProvider({
        name: 'do-primary',
        type: 'digitalocean',
        credentials: { apiToken: 'test-token', domain: 'example.org' },
      });

      expect(provider).toBeInstanceOf(DigitalOceanProvider);
      expect(provider.getProviderName()).toBe('do-primary');
    });

    it('should name the missing setting', () => {
      expect(() => createProvider({ type: 'cloudflare', credentials: { zoneName: 'example.com' } })).toThrow(
        new ValidationError('Invalid Cloudflare credentials: apiToken: CLOUDFLARE_TOKEN is required')
      );
      expect(() => createProvider({ type: 'digitalocean', credentials: { apiToken: 'test-token' } })).toThrow(
        'Invalid DigitalOcean credentials: domain: zone is required (--zone, file zone or DO_DOMAIN)'
      );
    });
  });

  describe('detectProvidersFromEnv', () => {
    it('should list providers with a token', () => {
      expect(detectProvidersFromEnv({ cloudflare: { apiToken: 'test-token' }, digitalocean: {} })).toEqual([
        'cloudflare',
      ]);
      expect(
        detectProvidersFromEnv({ cloudflare: { apiToken: 'test-token' }, digitalocean: { apiToken: 'test-token' } })
      ).toEqual(['cloudflare', 'digitalocean']);
      expect(detectProvidersFromEnv({ cloudflare: { apiToken: '' }, digitalocean: {} })).toEqual([]);
    });
  });

  describe('createProviderFromConfig', () => {
    function stubProviders(): void {
      vi.stubEnv('CLOUDFLARE_TOKEN', 'test-token');
      vi.stubEnv('CLOUDFLARE_ZONE', 'example.com');
      vi.stubEnv('CLOUDFLARE_ZONE_ID', 'zone-123');
      vi.stubEnv('DO_TOKEN', 'test-do-token');
      vi.stubEnv('DO_DOMAIN', 'example.org');
    }

    it('should follow DNS_PROVIDER', () => {
      stubProviders();
      vi.stubEnv('DNS_PROVIDER', 'digitalocean');

      const provider = createProviderFromConfig(new ConfigManager());

      expect(provider).toBeInstanceOf(DigitalOceanProvider);
      expect(provider.getZoneName()).toBe('example.org');
    });

    it('should let the overrides pick the provider and zone', () => {
      stubProviders();
      vi.stubEnv('DNS_PROVIDER', 'digitalocean');

      const provider = createProviderFromConfig(new ConfigManager(), { type: 'cloudflare', zone: 'example.net' });

      expect(provider).toBeInstanceOf(CloudflareProvider);
      expect(provider.getZoneName()).toBe('example.net');
    });

    it('should report a missing zone', () => {
      vi.stubEnv('DNS_PROVIDER', 'cloudflare');
      vi.stubEnv('CLOUDFLARE_TOKEN', 'test-token');
      vi.stubEnv('CLOUDFLARE_ZONE', '');

      expect(() => createProviderFromConfig(new ConfigManager())).toThrow(
        'Invalid Cloudflare credentials: zoneName: zone is required'
      );
    });
  });

  describe('validateCredentials', () => {
    it('should check credentials against the provider schema', () => {
      expect(validateCredentials('cloudflare', { apiToken: 'test-token', zoneName: 'example.com' })).toBe(true);
      expect(validateCredentials('digitalocean', { apiToken: 'test-token' })).toBe(false);
    });
  });

  describe('getSupportedProviders', () => {
    it('should list every provider', () => {
      expect(getSupportedProviders()).toEqual(['cloudflare', 'digitalocean']);
    });
  });
});
