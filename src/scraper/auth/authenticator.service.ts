import { Injectable, Logger } from '@nestjs/common';
import { AuthenticationError } from '../errors/scraper.errors';
import { HttpClientFactory } from '../http/http-client.factory';
import { Credentials, LoginResponse, Token } from '../interfaces/credentials.interface';

const DEFAULT_TOKEN_TYPE = 'Bearer';

/**
 * Pull a human readable message out of an error body, if the API sent one
 */
function serverMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    return body.trim() || undefined;
  }
  if (body && typeof body === 'object') {
    for (const key of ['detail', 'message', 'error']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value) {
        return value;
      }
    }
  }
  return undefined;
}

@Injectable()
export class AuthenticatorService {
  private readonly logger = new Logger(AuthenticatorService.name);

  constructor(private readonly httpClientFactory: HttpClientFactory) {}

  /**
   * Exchange client credentials for a token and attach it to `credentials`.
   * A single attempt; any status other than 200 throws AuthenticationError.
   */
  async authenticate(credentials: Credentials): Promise<Token> {
    const client = this.httpClientFactory.createApiClient();
    const response = await client.post<LoginResponse>('/auth/login', {
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
    });

    if (response.status !== 200 || typeof response.data?.access_token !== 'string') {
      throw new AuthenticationError(response.status, serverMessage(response.data));
    }

    const token: Token = {
      accessToken: response.data.access_token,
      tokenType: response.data.token_type || DEFAULT_TOKEN_TYPE,
    };
    credentials.token = token;
    this.logger.debug(`Authenticated as ${credentials.clientId}`);
    return token;
  }
}
