import { Controller, Get, HttpCode, Logger, Post } from '@nestjs/common';
import { AppService, ServiceStatus } from './app.service';
import { errorMessage } from './scraper/errors/scraper.errors';
import { RunReport } from './scraper/interfaces/price.interface';
import { ScraperService } from './scraper/scraper.service';

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(
    private readonly appService: AppService,
    private readonly scraperService: ScraperService,
  ) {}

  @Get()
  getStatus(): ServiceStatus {
    return this.appService.getStatus();
  }

  @Get('api/runs/latest')
  getLatestRun(): RunReport | null {
    return this.scraperService.getLastRun();
  }

  @Post('api/runs/refresh')
  @HttpCode(202)
  refreshPrices(): { started: boolean } {
    if (this.scraperService.isRunning()) {
      return { started: false };
    }
    // Start scraping in background (don't await)
    this.scraperService.runOnce().catch((error: unknown) => {
      this.logger.error(`Scraping error: ${errorMessage(error)}`);
    });
    return { started: true };
  }
}
