/**
 * File-backed OAuth token storage
 */

import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { throwValidationError, validateStoredTokenFile } from '../../models/validation';

export interface OAuthTokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}

export class TokenStore {
  constructor(private readonly tokenPath: string) {}

  /**
   * Stores OAuth tokens
   * @param tokens - OAuth tokens to store
   */
  async storeTokens(tokens: OAuthTokens): Promise<void> {
    const contents = {
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      expiry_date: tokens.expiresAt.toISOString()
    };

    // Owner-only: the refresh token grants mailbox access
    await writeFile(this.tokenPath, JSON.stringify(contents, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * Retrieves stored OAuth tokens
   * @returns OAuth tokens or null if none have been stored yet
   */
  async getTokens(): Promise<OAuthTokens | null> {
    if (!existsSync(this.tokenPath)) {
      return null;
    }

    const result = validateStoredTokenFile(JSON.parse(await readFile(this.tokenPath, 'utf-8')));
    if (result.error) throwValidationError(result);

    return {
      accessToken: result.value.access_token,
      refreshToken: result.value.refresh_token,
      expiresAt: new Date(result.value.expiry_date)
    };
  }

  /**
   * Retrieves tokens, failing with instructions when the consent step has not run
   */
  async requireTokens(): Promise<OAuthTokens> {
    const tokens = await this.getTokens();
    if (!tokens) {
      throw new Error(
        `No Gmail tokens found at ${this.tokenPath}. Run "auth-url", approve access, then "auth-code <code>".`
      );
    }
    return tokens;
  }
}
