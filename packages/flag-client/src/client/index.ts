export { createFlagClient, CLIENT_VERSION } from './flag-client.js';
export { withFlagClient, withFlagClientSync } from './scoped.js';
