import { Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { DirectoryFetchError } from '../errors/scraper.errors';
import { Provider, ProviderReference, ProviderResponse } from '../interfaces/provider.interface';

function isProviderReference(entry: unknown): entry is ProviderReference {
  return (
    typeof entry === 'object' &&
    entry !== null &&
    'id' in entry &&
    typeof entry.id === 'number'
  );
}

function isProviderResponse(body: unknown): body is ProviderResponse {
  if (!isProviderReference(body)) return false;
  const lastAccessed: unknown = Reflect.get(body, 'last_accessed');
  return (
    ['name', 'url', 'html_element'].every((key) => typeof Reflect.get(body, key) === 'string') &&
    (lastAccessed === undefined || lastAccessed === null || typeof lastAccessed === 'string')
  );
}

@Injectable()
export class ProviderDirectoryService {
  private readonly logger = new Logger(ProviderDirectoryService.name);

  /**
   * List the providers due for scraping. Only the ids are used; full records are fetched per provider.
   */
  async listProviderIds(client: AxiosInstance): Promise<ProviderReference[]> {
    const response = await client.get<unknown>('/scraping_runs/providers');
    if (response.status !== 200) {
      throw new DirectoryFetchError('providers', response.status);
    }
    if (!Array.isArray(response.data)) {
      throw new DirectoryFetchError('providers');
    }

    const references: ProviderReference[] = [];
    for (const entry of response.data) {
      if (isProviderReference(entry)) {
        references.push({ id: entry.id });
      } else {
        this.logger.warn(`Ignoring provider entry without a numeric id: ${JSON.stringify(entry)}`);
      }
    }
    return references;
  }

  async getProvider(client: AxiosInstance, id: number): Promise<Provider> {
    const response = await client.get<unknown>(`/providers/${id}`);
    if (response.status !== 200) {
      throw new DirectoryFetchError(`provider ${id}`, response.status);
    }
    if (!isProviderResponse(response.data)) {
      throw new DirectoryFetchError(`provider ${id}`);
    }

    const { name, url, html_element, last_accessed } = response.data;
    return {
      id: response.data.id,
      name,
      url,
      htmlElement: html_element,
      lastAccessed: last_accessed ?? null,
    };
  }
}
