export type ScrapeOutcome =
  | { status: 'found'; price: number; rawText: string }
  | { status: 'http-error'; httpStatus: number }
  | { status: 'not-found' }
  | { status: 'parse-failed'; rawText: string; reason: string };

export type ProviderRunStatus = 'reported' | 'skipped' | 'report-failed' | 'failed';

export interface ProviderRunResult {
  providerId: number;
  provider?: string; // name, once the record was fetched
  status: ProviderRunStatus;
  price?: number;
  reason?: string;
}

export interface RunTiming {
  startTime: Date;
  endTime: Date;
}

export interface RunReport extends RunTiming {
  status: 'completed' | 'aborted';
  results: ProviderRunResult[];
  error?: string; // Why the run was aborted
}
