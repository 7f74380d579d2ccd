/**
 * Base provider exports
 */
export { RegistrarClient, OWNERSHIP_MARKER } from './RegistrarClient.js';
