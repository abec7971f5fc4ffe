import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { AuthenticatorService } from './auth/authenticator.service';
import { loadScraperConfig, SCRAPER_CONFIG } from './config/scraper.config';
import { HttpClientFactory } from './http/http-client.factory';
import { PageParser } from './parsers/page.parser';
import { ProviderDirectoryService } from './providers/provider-directory.service';
import { PriceReporterService } from './reporting/price-reporter.service';
import { RunReporterService } from './runs/run-reporter.service';
import { ScraperService } from './scraper.service';

@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [
    { provide: SCRAPER_CONFIG, useFactory: () => loadScraperConfig() },
    HttpClientFactory,
    AuthenticatorService,
    ProviderDirectoryService,
    PageParser,
    PriceReporterService,
    RunReporterService,
    ScraperService,
  ],
  exports: [ScraperService],
})
export class ScraperModule {}
