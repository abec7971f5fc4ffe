import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AxiosInstance } from 'axios';
import { AuthenticatorService } from './auth/authenticator.service';
import { SCRAPER_CONFIG, ScraperConfig } from './config/scraper.config';
import { errorMessage } from './errors/scraper.errors';
import { HttpClientFactory } from './http/http-client.factory';
import { Credentials } from './interfaces/credentials.interface';
import { ProviderRunResult, RunReport, ScrapeOutcome } from './interfaces/price.interface';
import { ProviderReference } from './interfaces/provider.interface';
import { PageParser } from './parsers/page.parser';
import { ProviderDirectoryService } from './providers/provider-directory.service';
import { PriceReporterService } from './reporting/price-reporter.service';
import { RunReporterService } from './runs/run-reporter.service';

export const RUN_TIMEOUT_NAME = 'scraping-run';

function describeSkip(outcome: Exclude<ScrapeOutcome, { status: 'found' }>): string {
  switch (outcome.status) {
    case 'http-error':
      return `page responded with status ${outcome.httpStatus}`;
    case 'not-found':
      return 'no element matched the price selector';
    case 'parse-failed':
      return outcome.reason;
  }
}

@Injectable()
export class ScraperService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(ScraperService.name);
  private readonly credentials: Credentials;
  private lastRun: RunReport | null = null;
  private isScraping = false;
  private stopped = true;

  constructor(
    @Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig,
    private readonly httpClientFactory: HttpClientFactory,
    private readonly authenticator: AuthenticatorService,
    private readonly providerDirectory: ProviderDirectoryService,
    private readonly pageParser: PageParser,
    private readonly priceReporter: PriceReporterService,
    private readonly runReporter: RunReporterService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.credentials = {
      clientId: config.api.clientId,
      clientSecret: config.api.clientSecret,
    };
  }

  /**
   * Run one full cycle: authenticate, list providers, scrape all of them concurrently, report the run.
   * Never throws; an authentication or listing failure yields an aborted report.
   * Returns null when a run is already in progress.
   */
  async runOnce(): Promise<RunReport | null> {
    if (this.isScraping) {
      this.logger.warn('Scraping already in progress, skipping...');
      return null;
    }

    this.isScraping = true;
    const startTime = new Date();
    // Each run logs in afresh
    this.credentials.token = undefined;

    try {
      let client: AxiosInstance;
      let providers: ProviderReference[];
      try {
        await this.authenticator.authenticate(this.credentials);
        client = this.httpClientFactory.createAuthenticatedClient(this.credentials);
        providers = await this.providerDirectory.listProviderIds(client);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Scraping run aborted: ${message}`);
        return this.finish({ startTime, endTime: new Date(), status: 'aborted', results: [], error: message });
      }

      this.logger.log(`Scraping ${providers.length} providers...`);
      const results = await this.scrapeAll(client, providers);

      const endTime = new Date();
      await this.runReporter.reportRun(client, { startTime, endTime });

      const reported = results.filter((result) => result.status === 'reported').length;
      this.logger.log(`Finished scraping run: ${reported}/${results.length} prices reported`);
      return this.finish({ startTime, endTime, status: 'completed', results });
    } finally {
      this.isScraping = false;
    }
  }

  /**
   * Start the run loop: run, sleep the configured interval, repeat until stopped.
   * Resolves once the first run finished and the next one is scheduled.
   */
  async start(): Promise<void> {
    if (!this.stopped) return;
    this.stopped = false;
    await this.loop();
  }

  stop(): void {
    this.stopped = true;
    if (this.schedulerRegistry.doesExist('timeout', RUN_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(RUN_TIMEOUT_NAME);
    }
  }

  getLastRun(): RunReport | null {
    return this.lastRun;
  }

  isRunning(): boolean {
    return this.isScraping;
  }

  /**
   * Start the loop on service start.
   * Non-blocking - the server starts even while the first run is in progress.
   */
  onModuleInit(): void {
    if (!this.config.scraping.runOnStartup) {
      this.logger.log('Scraping on startup disabled');
      return;
    }
    this.start().catch((error: unknown) => {
      this.logger.error(`Scraping loop failed to start: ${errorMessage(error)}`);
    });
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  private async loop(): Promise<void> {
    if (this.stopped) return;

    this.logger.log('Starting scraping run');
    await this.runOnce();
    if (this.stopped) return;

    const { intervalSeconds } = this.config.scraping;
    this.logger.log(`Scrape finished, sleeping for ${intervalSeconds}s`);
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(RUN_TIMEOUT_NAME);
      this.loop().catch((error: unknown) => {
        this.logger.error(`Scheduled scraping run failed: ${errorMessage(error)}`);
      });
    }, intervalSeconds * 1000);
    this.schedulerRegistry.addTimeout(RUN_TIMEOUT_NAME, timeout);
  }

  private finish(report: RunReport): RunReport {
    this.lastRun = report;
    return report;
  }

  /**
   * Scrape all providers in parallel. Each task catches its own failure so siblings always complete.
   */
  private async scrapeAll(
    client: AxiosInstance,
    providers: ProviderReference[],
  ): Promise<ProviderRunResult[]> {
    const settledResults = await Promise.allSettled(
      providers.map((reference) => this.scrapeProvider(client, reference.id)),
    );

    return settledResults.map((result, index): ProviderRunResult => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      this.logger.error(`Unexpected error in scraper promise: ${errorMessage(result.reason)}`);
      return { providerId: providers[index].id, status: 'failed', reason: errorMessage(result.reason) };
    });
  }

  private async scrapeProvider(client: AxiosInstance, providerId: number): Promise<ProviderRunResult> {
    let name: string | undefined;
    try {
      const provider = await this.providerDirectory.getProvider(client, providerId);
      name = provider.name;

      const outcome = await this.pageParser.scrape(provider);
      if (outcome.status !== 'found') {
        return { providerId, provider: name, status: 'skipped', reason: describeSkip(outcome) };
      }

      const { price } = outcome;
      if (price <= 0) {
        this.logger.warn(`Failed to add price for provider: ${name} (price ${price} is not positive)`);
        return { providerId, provider: name, status: 'skipped', price, reason: 'price is not positive' };
      }

      const accepted = await this.priceReporter.reportPrice(client, provider.id, price);
      if (!accepted) {
        this.logger.warn(`Failed to add price for provider: ${name}`);
        return { providerId, provider: name, status: 'report-failed', price };
      }

      await this.priceReporter.markLastAccessed(client, provider.id);
      this.logger.log(`Price added for provider: ${name}`);
      return { providerId, provider: name, status: 'reported', price };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Failed to scrape provider ${name ?? providerId}: ${message}`);
      return { providerId, provider: name, status: 'failed', reason: message };
    }
  }
}
