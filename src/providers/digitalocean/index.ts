export { DigitalOceanProvider, type DigitalOceanProviderCredentials } from './DigitalOceanProvider.js';
