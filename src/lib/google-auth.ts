import { GoogleAuth } from 'google-auth-library';
import { TransportError, getErrorMessage } from '@/lib/errors';
import type { AccessTokenProvider } from '@/interfaces/video-generation-client.interface';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

/**
 * Service-account credentials for Vertex AI. The client caches the token and
 * refreshes it when it is about to expire, so every call can ask for one.
 */
export class GoogleAccessTokenProvider implements AccessTokenProvider {
  private readonly auth: GoogleAuth;

  constructor(credentialsPath: string) {
    this.auth = new GoogleAuth({
      keyFilename: credentialsPath,
      scopes: [CLOUD_PLATFORM_SCOPE],
    });
  }

  async getAccessToken(): Promise<string> {
    let token: string | null | undefined;
    try {
      token = await this.auth.getAccessToken();
    } catch (error) {
      throw new TransportError(`Failed to obtain access token: ${getErrorMessage(error)}`);
    }

    if (!token) {
      throw new TransportError('Failed to obtain access token: empty token');
    }
    return token;
  }
}
