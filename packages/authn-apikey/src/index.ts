/**
 * @tollgate/authn-apikey
 *
 * API Key Authentication Provider
 *
 * Authenticates callers presenting a tg_sk_ key. Keys are stored as SHA-256
 * digests in the api_keys table.
 */

export { ApiKeyAuthProvider } from './provider.js';
export { API_KEY_PREFIX, generateApiKey, hashApiKey, isValidApiKeyFormat } from './keys.js';
export { issueApiKey, type IssueApiKeyRequest, type IssuedApiKey } from './issuance.js';
