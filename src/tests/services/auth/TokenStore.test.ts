import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TokenStore, OAuthTokens } from '../../../services/auth/TokenStore';
import { ValidationError } from '../../../models/validation';

describe('TokenStore', () => {
  let dir: string;
  let tokenPath: string;
  let tokenStore: TokenStore;

  const mockTokens: OAuthTokens = {
    accessToken: 'test-access',
    refreshToken: 'test-refresh',
    expiresAt: new Date('2030-01-01T00:00:00.000Z')
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'digest-tokens-'));
    tokenPath = join(dir, 'token.json');
    tokenStore = new TokenStore(tokenPath);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('storeTokens', () => {
    it('should write the tokens as JSON', async () => {
      await tokenStore.storeTokens(mockTokens);

      expect(JSON.parse(readFileSync(tokenPath, 'utf-8'))).toEqual({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expiry_date: '2030-01-01T00:00:00.000Z'
      });
    });

    it('should make the file readable by its owner only', async () => {
      await tokenStore.storeTokens(mockTokens);

      expect(statSync(tokenPath).mode & 0o077).toBe(0);
    });
  });

  describe('getTokens', () => {
    it('should read back stored tokens', async () => {
      await tokenStore.storeTokens(mockTokens);

      await expect(tokenStore.getTokens()).resolves.toEqual(mockTokens);
    });

    it('should return null before any tokens are stored', async () => {
      await expect(tokenStore.getTokens()).resolves.toBeNull();
    });

    it('should reject a token file with missing fields', async () => {
      writeFileSync(tokenPath, JSON.stringify({ access_token: 'test-access' }));

      await expect(tokenStore.getTokens()).rejects.toThrow(ValidationError);
    });
  });

  describe('requireTokens', () => {
    it('should explain how to authorize when no tokens exist', async () => {
      await expect(tokenStore.requireTokens()).rejects.toThrow(
        `No Gmail tokens found at ${tokenPath}. Run "auth-url", approve access, then "auth-code <code>".`
      );
    });

    it('should return stored tokens', async () => {
      await tokenStore.storeTokens(mockTokens);

      await expect(tokenStore.requireTokens()).resolves.toEqual(mockTokens);
    });
  });
});
