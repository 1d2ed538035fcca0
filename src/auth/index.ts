/**
 * Authentication providers for the Pinata client.
 */

import { apiKeyHint, validateKeys } from '../config';

/** Header carrying the public API key. */
export const API_KEY_HEADER = 'pinata_api_key';

/** Header carrying the secret API key. */
export const SECRET_API_KEY_HEADER = 'pinata_secret_api_key';

/**
 * Authentication provider interface.
 */
export interface AuthProvider {
  /**
   * Returns the headers attached to every request.
   */
  getAuthHeaders(): Record<string, string>;

  /**
   * Returns a hint of the API key for debugging (last 4 chars).
   */
  getApiKeyHint(): string;
}

/**
 * Key pair authentication: both keys travel as fixed request headers.
 */
export class ApiKeyAuthProvider implements AuthProvider {
  private readonly apiKey: string;
  private readonly secretApiKey: string;

  constructor(apiKey: string, secretApiKey: string) {
    validateKeys(apiKey, secretApiKey);
    this.apiKey = apiKey;
    this.secretApiKey = secretApiKey;
  }

  getAuthHeaders(): Record<string, string> {
    return {
      [API_KEY_HEADER]: this.apiKey,
      [SECRET_API_KEY_HEADER]: this.secretApiKey,
    };
  }

  getApiKeyHint(): string {
    return apiKeyHint(this.apiKey);
  }
}

export function createApiKeyAuth(apiKey: string, secretApiKey: string): AuthProvider {
  return new ApiKeyAuthProvider(apiKey, secretApiKey);
}
