import { Inject, Injectable, Optional } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance, CreateAxiosDefaults } from 'axios';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { MissingTokenError } from '../errors/scraper.errors';
import { Credentials } from '../interfaces/credentials.interface';

/**
 * Optional axios adapter used by every client. Unset in production, where axios picks its http adapter.
 */
export const HTTP_ADAPTER = 'HTTP_ADAPTER';

@Injectable()
export class HttpClientFactory {
  constructor(
    @Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig,
    @Optional() @Inject(HTTP_ADAPTER) private readonly adapter?: AxiosAdapter,
  ) {}

  /**
   * Client for the provider API without credentials, used for login
   */
  createApiClient(): AxiosInstance {
    return this.create({
      baseURL: this.config.api.baseUrl,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * Client for the provider API carrying the token attached to `credentials`
   */
  createAuthenticatedClient(credentials: Credentials): AxiosInstance {
    const { token } = credentials;
    if (!token) {
      throw new MissingTokenError();
    }
    return this.create({
      baseURL: this.config.api.baseUrl,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `${token.tokenType} ${token.accessToken}`,
      },
    });
  }

  /**
   * Client for provider pages, which live on arbitrary hosts
   */
  createPageClient(): AxiosInstance {
    return this.create({
      responseType: 'text',
      headers: { 'User-Agent': this.config.scraping.userAgent },
    });
  }

  private create(defaults: CreateAxiosDefaults): AxiosInstance {
    return axios.create({
      ...defaults,
      timeout: this.config.scraping.requestTimeout,
      // Statuses are inspected by the callers, only transport failures reject
      validateStatus: () => true,
      ...(this.adapter ? { adapter: this.adapter } : {}),
    });
  }
}
