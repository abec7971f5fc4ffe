import { Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { errorMessage } from '../errors/scraper.errors';

@Injectable()
export class PriceReporterService {
  private readonly logger = new Logger(PriceReporterService.name);

  /**
   * Add a price for a provider.
   * @returns true if the API accepted the price (200 or 201)
   */
  async reportPrice(client: AxiosInstance, providerId: number, price: number): Promise<boolean> {
    const response = await client.post(`/providers/${providerId}/prices`, { price });
    return response.status === 200 || response.status === 201;
  }

  /**
   * Mark the provider as accessed. Failures are logged and never propagate.
   */
  async markLastAccessed(client: AxiosInstance, providerId: number): Promise<void> {
    try {
      const response = await client.put(`/providers/${providerId}/last_accessed`);
      if (response.status < 200 || response.status >= 300) {
        this.logger.warn(
          `Failed to update last accessed time for provider ${providerId}, status: ${response.status}`,
        );
      }
    } catch (error) {
      this.logger.warn(
        `Failed to update last accessed time for provider ${providerId}: ${errorMessage(error)}`,
      );
    }
  }
}
