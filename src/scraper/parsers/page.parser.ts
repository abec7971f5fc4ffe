import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { PriceParseError } from '../errors/scraper.errors';
import { HttpClientFactory } from '../http/http-client.factory';
import { ScrapeOutcome } from '../interfaces/price.interface';
import { Provider } from '../interfaces/provider.interface';
import { normalizePrice } from './price-normalizer';

@Injectable()
export class PageParser {
  private readonly logger = new Logger(PageParser.name);

  constructor(private readonly httpClientFactory: HttpClientFactory) {}

  /**
   * Fetch HTML content from the provider URL.
   * Resolves with the status and body; transport errors reject.
   */
  protected async fetchHtml(url: string): Promise<{ status: number; html: string }> {
    const response = await this.httpClientFactory.createPageClient().get<string>(url);
    return {
      status: response.status,
      html: String(response.data ?? ''),
    };
  }

  /**
   * Extract the text of the first element matching `selector`, or null when nothing matches
   */
  parse(html: string, selector: string): string | null {
    const $ = cheerio.load(html);
    const $element = $(selector).first();
    return $element.length > 0 ? $element.text() : null;
  }

  /**
   * Scrape a single provider page and normalize the price found under its selector
   */
  async scrape(provider: Provider): Promise<ScrapeOutcome> {
    const { status, html } = await this.fetchHtml(provider.url);
    if (status !== 200) {
      this.logger.warn(`Failed to scrape provider ${provider.name}, status: ${status}`);
      return { status: 'http-error', httpStatus: status };
    }

    const rawText = this.parse(html, provider.htmlElement);
    if (rawText === null) {
      this.logger.warn(`No price found for provider ${provider.name}`);
      return { status: 'not-found' };
    }

    try {
      return { status: 'found', price: normalizePrice(rawText), rawText };
    } catch (error) {
      if (!(error instanceof PriceParseError)) {
        throw error;
      }
      this.logger.warn(`Error processing price for provider ${provider.name}: ${error.message}`);
      return { status: 'parse-failed', rawText, reason: error.message };
    }
  }
}
