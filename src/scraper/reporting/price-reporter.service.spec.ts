import { Logger } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { AxiosInstance } from 'axios';
import { API_BASE, FakeApi } from '../../../test/fake-api';
import { createScraperTestingModule } from '../../../test/testing-module';
import { HttpClientFactory } from '../http/http-client.factory';
import { PriceReporterService } from './price-reporter.service';

describe('PriceReporterService', () => {
  let api: FakeApi;
  let module: TestingModule;
  let reporter: PriceReporterService;
  let client: AxiosInstance;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    api = new FakeApi();
    module = await createScraperTestingModule(api);
    reporter = module.get(PriceReporterService);
    client = module.get(HttpClientFactory).createAuthenticatedClient({
      clientId: 'scraper-test',
      clientSecret: 'test-secret',
      token: { accessToken: 'token-1', tokenType: 'Bearer' },
    });
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await module.close();
  });

  describe('reportPrice', () => {
    it.each([200, 201])('succeeds on %i', async (status) => {
      api.on('POST', `${API_BASE}/providers/3/prices`, { status, data: {} });

      await expect(reporter.reportPrice(client, 3, 12.5)).resolves.toBe(true);
      expect(api.calls('POST', `${API_BASE}/providers/3/prices`)[0].body).toEqual({ price: 12.5 });
    });

    it.each([204, 400, 500])('fails on %i', async (status) => {
      api.on('POST', `${API_BASE}/providers/3/prices`, { status });

      await expect(reporter.reportPrice(client, 3, 12.5)).resolves.toBe(false);
    });
  });

  describe('markLastAccessed', () => {
    it('puts the last accessed marker', async () => {
      api.on('PUT', `${API_BASE}/providers/3/last_accessed`, { status: 200, data: {} });

      await reporter.markLastAccessed(client, 3);

      const [put] = api.calls('PUT', `${API_BASE}/providers/3/last_accessed`);
      expect(put.authorization).toBe('Bearer token-1');
      expect(warn).not.toHaveBeenCalled();
    });

    it('logs a failed update instead of throwing', async () => {
      api.on('PUT', `${API_BASE}/providers/3/last_accessed`, { status: 500 });

      await expect(reporter.markLastAccessed(client, 3)).resolves.toBeUndefined();
      expect(warn).toHaveBeenCalledWith('Failed to update last accessed time for provider 3, status: 500');
    });

    it('logs a transport error instead of throwing', async () => {
      api.on('PUT', `${API_BASE}/providers/3/last_accessed`, () => {
        throw new Error('socket hang up');
      });

      await expect(reporter.markLastAccessed(client, 3)).resolves.toBeUndefined();
      expect(warn).toHaveBeenCalledWith('Failed to update last accessed time for provider 3: socket hang up');
    });
  });
});
