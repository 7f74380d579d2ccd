/**
 * Cloudflare provider exports
 */
export { CloudflareProvider, type CloudflareProviderCredentials } from './CloudflareProvider.js';
