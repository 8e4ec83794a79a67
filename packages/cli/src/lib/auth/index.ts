/**
 * Authentication Module
 *
 * - `rfc-8628.ts` - Device Authorization Grant provider (RFC 8628)
 * - `credentials.ts` - Local token storage for the standalone CLI
 *
 * For platform API endpoints (user, repository), see `../api/`.
 */

// Credential Storage
export {
  type CredentialsFile,
  clearAllCredentials,
  clearCredentials,
  getCredentials,
  getCredentialsPath,
  type StoredCredentials,
  saveCredentials,
} from "./credentials";
// RFC 8628 - Device Authorization Grant
export {
  createDeviceAuthorizationProvider,
  type DeviceProviderOptions,
} from "./rfc-8628";
