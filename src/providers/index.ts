/**
 * Providers module exports
 */
export { RegistrarClient, OWNERSHIP_MARKER } from './base/index.js';
export { CloudflareProvider, type CloudflareProviderCredentials } from './cloudflare/index.js';
export { DigitalOceanProvider, type DigitalOceanProviderCredentials } from './digitalocean/index.js';
export {
  createProvider,
  createProviderFromConfig,
  detectProvidersFromEnv,
  validateCredentials,
  getSupportedProviders,
  type CreateProviderOptions,
  type ProviderOverrides,
} from './ProviderFactory.js';
