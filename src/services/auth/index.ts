/**
 * Authentication service exports
 */

import { google, gmail_v1 } from 'googleapis';
import { OAuthManager, readOAuthConfig } from './OAuthManager';
import { TokenStore } from './TokenStore';

export { OAuthManager, readOAuthConfig, type OAuthConfig } from './OAuthManager';
export { TokenStore, type OAuthTokens } from './TokenStore';

/**
 * Builds a Gmail API client from the stored tokens; refreshed tokens are
 * written back to the token file
 */
export async function createGmailClient(settings: { credentialsPath: string; tokenPath: string }): Promise<gmail_v1.Gmail> {
  const oauthManager = new OAuthManager(await readOAuthConfig(settings.credentialsPath));
  const tokenStore = new TokenStore(settings.tokenPath);
  const tokens = await tokenStore.requireTokens();

  const auth = oauthManager.createAuthenticatedClient(tokens, refreshed => {
    tokenStore.storeTokens(refreshed).catch(error => {
      console.error('❌ Failed to persist refreshed Gmail tokens:', error);
    });
  });

  console.log('✅ Signed into Gmail');
  return google.gmail({ version: 'v1', auth });
}
