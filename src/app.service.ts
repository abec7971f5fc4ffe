import { Injectable } from '@nestjs/common';
import { ScraperService } from './scraper/scraper.service';

export interface ServiceStatus {
  status: 'ok';
  running: boolean;
  lastRunStatus: 'completed' | 'aborted' | null;
  lastRunFinishedAt: string | null;
}

@Injectable()
export class AppService {
  constructor(private readonly scraperService: ScraperService) {}

  getStatus(): ServiceStatus {
    const lastRun = this.scraperService.getLastRun();
    return {
      status: 'ok',
      running: this.scraperService.isRunning(),
      lastRunStatus: lastRun?.status ?? null,
      lastRunFinishedAt: lastRun ? lastRun.endTime.toISOString() : null,
    };
  }
}
