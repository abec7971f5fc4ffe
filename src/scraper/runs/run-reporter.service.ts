import { Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { errorMessage } from '../errors/scraper.errors';
import { RunTiming } from '../interfaces/price.interface';

@Injectable()
export class RunReporterService {
  private readonly logger = new Logger(RunReporterService.name);

  /**
   * Post the timing of a finished run
   */
  async reportRun(client: AxiosInstance, run: RunTiming): Promise<boolean> {
    try {
      const response = await client.post('/scraping_runs', {
        start_time: run.startTime.toISOString(),
        end_time: run.endTime.toISOString(),
      });
      if (response.status >= 200 && response.status < 300) {
        return true;
      }
      this.logger.warn(`Failed to report scraping run, status: ${response.status}`);
    } catch (error) {
      this.logger.warn(`Failed to report scraping run: ${errorMessage(error)}`);
    }
    return false;
  }
}
