/**
 * OAuth manager for the Gmail installed-app flow
 */

import { readFile } from 'fs/promises';
import { google } from 'googleapis';
import { Credentials, OAuth2Client } from 'google-auth-library';
import { OAuthTokens } from './TokenStore';
import { throwValidationError, validateGoogleCredentials } from '../../models/validation';

export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Reads the OAuth client file downloaded from the Google Cloud console
 * @param credentialsPath - Path to credentials.json
 * @returns OAuth client configuration
 */
export async function readOAuthConfig(credentialsPath: string): Promise<OAuthConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(credentialsPath, 'utf-8'));
  } catch (error) {
    console.error(`❌ Failed to read OAuth client file ${credentialsPath}:`, error);
    throw new Error(`Could not read Google OAuth credentials from ${credentialsPath}`);
  }

  const result = validateGoogleCredentials(parsed);
  if (result.error) throwValidationError(result);

  const secrets = result.value.installed ?? result.value.web;
  if (!secrets) {
    throw new Error('OAuth client file has neither an "installed" nor a "web" section');
  }

  return {
    clientId: secrets.client_id,
    clientSecret: secrets.client_secret,
    redirectUri: secrets.redirect_uris[0]
  };
}

export class OAuthManager {
  private readonly oauth2Client: OAuth2Client;
  private readonly scopes = [
    'https://www.googleapis.com/auth/gmail.readonly',
    'https://www.googleapis.com/auth/gmail.send'
  ];

  constructor(private readonly config: OAuthConfig) {
    this.oauth2Client = new google.auth.OAuth2(
      config.clientId,
      config.clientSecret,
      config.redirectUri
    );
  }

  /**
   * Generates OAuth authorization URL
   * @returns authorization URL
   */
  getAuthorizationUrl(): string {
    return this.oauth2Client.generateAuthUrl({
      access_type: 'offline',
      scope: this.scopes,
      prompt: 'consent' // Force consent to get refresh token
    });
  }

  /**
   * Exchanges authorization code for tokens
   * @param code - Authorization code from the consent redirect
   * @returns OAuth tokens
   */
  async exchangeCodeForTokens(code: string): Promise<OAuthTokens> {
    try {
      const { tokens } = await this.oauth2Client.getToken(code);

      if (!tokens.access_token || !tokens.refresh_token) {
        throw new Error('Missing required tokens in OAuth response');
      }

      return {
        accessToken: tokens.access_token,
        refreshToken: tokens.refresh_token,
        expiresAt: this.expiryFrom(tokens)
      };
    } catch (error) {
      console.error('Failed to exchange code for tokens:', error);
      throw new Error('Failed to complete OAuth authentication');
    }
  }

  /**
   * Creates an authenticated OAuth2 client for API calls
   * @param tokens - OAuth tokens
   * @param onRefresh - Called with the updated tokens whenever the client refreshes them
   * @returns configured OAuth2 client
   */
  createAuthenticatedClient(tokens: OAuthTokens, onRefresh?: (tokens: OAuthTokens) => void): OAuth2Client {
    const client = new google.auth.OAuth2(
      this.config.clientId,
      this.config.clientSecret,
      this.config.redirectUri
    );

    client.setCredentials({
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      expiry_date: tokens.expiresAt.getTime()
    });

    if (onRefresh) {
      client.on('tokens', (refreshed: Credentials) => {
        if (!refreshed.access_token) return;
        onRefresh({
          accessToken: refreshed.access_token,
          refreshToken: refreshed.refresh_token || tokens.refreshToken, // Keep existing if not provided
          expiresAt: this.expiryFrom(refreshed)
        });
      });
    }

    return client;
  }

  private expiryFrom(credentials: Credentials): Date {
    return credentials.expiry_date
      ? new Date(credentials.expiry_date)
      : new Date(Date.now() + 3600 * 1000); // Default 1 hour
  }
}
