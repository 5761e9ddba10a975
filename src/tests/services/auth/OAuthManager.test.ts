import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { google } from 'googleapis';
import { OAuthManager, OAuthConfig, readOAuthConfig } from '../../../services/auth/OAuthManager';
import { ValidationError } from '../../../models/validation';

const mockOAuth2Client = {
  generateAuthUrl: jest.fn(),
  getToken: jest.fn(),
  setCredentials: jest.fn(),
  on: jest.fn()
};

// Mock googleapis
jest.mock('googleapis', () => ({
  google: {
    auth: {
      OAuth2: jest.fn(() => mockOAuth2Client)
    }
  }
}));

describe('OAuthManager', () => {
  let oauthManager: OAuthManager;
  let consoleErrorSpy: jest.SpyInstance;

  const mockConfig: OAuthConfig = {
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    redirectUri: 'http://localhost:8002'
  };

  beforeEach(() => {
    jest.clearAllMocks();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    oauthManager = new OAuthManager(mockConfig);
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('constructor', () => {
    it('should create the OAuth2 client from the config', () => {
      expect(google.auth.OAuth2).toHaveBeenCalledWith('test-client-id', 'test-client-secret', 'http://localhost:8002');
    });
  });

  describe('getAuthorizationUrl', () => {
    it('should request offline Gmail read and send access', () => {
      mockOAuth2Client.generateAuthUrl.mockReturnValue('https://accounts.google.com/o/oauth2/auth?test');

      const url = oauthManager.getAuthorizationUrl();

      expect(url).toBe('https://accounts.google.com/o/oauth2/auth?test');
      expect(mockOAuth2Client.generateAuthUrl).toHaveBeenCalledWith({
        access_type: 'offline',
        scope: ['https://www.googleapis.com/auth/gmail.readonly', 'https://www.googleapis.com/auth/gmail.send'],
        prompt: 'consent'
      });
    });
  });

  describe('exchangeCodeForTokens', () => {
    it('should map the token response', async () => {
      mockOAuth2Client.getToken.mockResolvedValue({
        tokens: { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: 1893456000000 }
      });

      const tokens = await oauthManager.exchangeCodeForTokens('test-code');

      expect(mockOAuth2Client.getToken).toHaveBeenCalledWith('test-code');
      expect(tokens).toEqual({
        accessToken: 'test-access',
        refreshToken: 'test-refresh',
        expiresAt: new Date(1893456000000)
      });
    });

    it('should fail when the refresh token is missing', async () => {
      mockOAuth2Client.getToken.mockResolvedValue({ tokens: { access_token: 'test-access' } });

      await expect(oauthManager.exchangeCodeForTokens('test-code')).rejects.toThrow(
        'Failed to complete OAuth authentication'
      );
    });

    it('should wrap token endpoint errors', async () => {
      mockOAuth2Client.getToken.mockRejectedValue(new Error('invalid_grant'));

      await expect(oauthManager.exchangeCodeForTokens('bad-code')).rejects.toThrow(
        'Failed to complete OAuth authentication'
      );
    });
  });

  describe('createAuthenticatedClient', () => {
    const tokens = {
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiresAt: new Date(1893456000000)
    };

    it('should set the stored credentials', () => {
      const client = oauthManager.createAuthenticatedClient(tokens);

      expect(client).toBe(mockOAuth2Client);
      expect(mockOAuth2Client.setCredentials).toHaveBeenCalledWith({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expiry_date: 1893456000000
      });
      expect(mockOAuth2Client.on).not.toHaveBeenCalled();
    });

    it('should report refreshed tokens and keep the refresh token when none is returned', () => {
      const onRefresh = jest.fn();
      oauthManager.createAuthenticatedClient(tokens, onRefresh);

      const [event, listener] = mockOAuth2Client.on.mock.calls[0];
      listener({ access_token: 'new-access', expiry_date: 1893459600000 });

      expect(event).toBe('tokens');
      expect(onRefresh).toHaveBeenCalledWith({
        accessToken: 'new-access',
        refreshToken: 'test-refresh',
        expiresAt: new Date(1893459600000)
      });
    });
  });

  describe('readOAuthConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'digest-oauth-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read an installed-app client file', async () => {
      const path = join(dir, 'credentials.json');
      writeFileSync(
        path,
        JSON.stringify({
          installed: {
            client_id: 'test-client-id',
            client_secret: 'test-client-secret',
            redirect_uris: ['http://localhost:8002']
          }
        })
      );

      await expect(readOAuthConfig(path)).resolves.toEqual(mockConfig);
    });

    it('should default the redirect URI of a web client file', async () => {
      const path = join(dir, 'credentials.json');
      writeFileSync(path, JSON.stringify({ web: { client_id: 'web-id', client_secret: 'web-secret' } }));

      await expect(readOAuthConfig(path)).resolves.toEqual({
        clientId: 'web-id',
        clientSecret: 'web-secret',
        redirectUri: 'http://localhost:8002'
      });
    });

    it('should reject a file without a client section', async () => {
      const path = join(dir, 'credentials.json');
      writeFileSync(path, JSON.stringify({ client_id: 'test-client-id' }));

      await expect(readOAuthConfig(path)).rejects.toThrow(ValidationError);
    });

    it('should fail clearly when the file is missing', async () => {
      const path = join(dir, 'missing.json');

      await expect(readOAuthConfig(path)).rejects.toThrow(`Could not read Google OAuth credentials from ${path}`);
    });
  });
});
