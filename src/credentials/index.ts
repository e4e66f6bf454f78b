/**
 * Credentials for the REST transport.
 *
 * Credential resolution is supplied by the caller; this module only adapts
 * the configured credentials to a token source.
 */

import type { Credentials } from "../config/index.js";

/**
 * Authentication provider interface.
 */
export interface AuthProvider {
  /**
   * Get a valid access token, or an empty string when no authentication
   * is required.
   */
  getAccessToken(): Promise<string>;
}

/**
 * Provider for unauthenticated endpoints such as the emulator.
 */
export class NoAuthProvider implements AuthProvider {
  async getAccessToken(): Promise<string> {
    return "";
  }
}

/**
 * Provider returning a fixed access token.
 */
export class StaticTokenAuthProvider implements AuthProvider {
  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}

/**
 * Create an auth provider from credentials configuration.
 */
export function createAuthProvider(credentials: Credentials): AuthProvider {
  switch (credentials.type) {
    case "none":
      return new NoAuthProvider();
    case "access_token":
      return new StaticTokenAuthProvider(credentials.token);
    case "provider":
      return credentials.provider;
  }
}
